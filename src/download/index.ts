/**
 * Download System - Main Entry Point
 * Exports all components of the batch download system
 */

// Core components
export * from './core';

// Engines
export * from './providers';

// Formats
export * from './formats';
