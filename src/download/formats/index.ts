/**
 * Formats index - export format menu and attempt configuration
 */

export * from './FormatCatalog';
export * from './AttemptConfigBuilder';
