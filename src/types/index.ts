/**
 * Type definitions for linkharvest
 */

export * from './config';
export * from './app';
