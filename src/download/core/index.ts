/**
 * Core index - exports all core components
 */

export * from './types';
export * from './ErrorClassifier';
export { BatchState, CookieModeLock, describeCookieSource, sameCookieSource } from './BatchState';
export { CookieNegotiator, isVerifiedSuccess } from './CookieNegotiator';
export type { CookieSourceProvider, NegotiationObserver, AttemptConfigFactory } from './CookieNegotiator';
export { ExportDriver } from './ExportDriver';
export type { ExportObserver } from './ExportDriver';
export { BatchAggregator, formatSummary } from './BatchAggregator';
export { BatchOrchestrator, failureReason } from './BatchOrchestrator';
export type { BatchOrchestratorDeps } from './BatchOrchestrator';
