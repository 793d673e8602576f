import { logger } from './logger';

export type SessionCommand =
  | { kind: 'exit' }
  | { kind: 'file' }
  | { kind: 'reset' }
  | { kind: 'text'; text: string };

/**
 * InputValidator - Sanitizes operator input read from the terminal
 */
export class InputValidator {
  /**
   * Validates and sanitizes text input
   * @param maxLength - Maximum allowed length (default: 1 MiB of characters)
   * @returns Sanitized text or null if nothing is left
   */
  static sanitizeText(
    input: string | undefined,
    maxLength: number = 1024 * 1024,
  ): string | null {
    if (!input) {
      return null;
    }

    const trimmed = input.trim();
    if (trimmed.length === 0) {
      return null;
    }

    let text = trimmed;
    if (text.length > maxLength) {
      logger.warn('Input exceeds maximum length', {
        length: text.length,
        maxLength,
      });
      text = text.substring(0, maxLength);
    }

    // Remove null bytes and other control characters (except newlines and tabs)
    const sanitized = text.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');
    return sanitized.length > 0 ? sanitized : null;
  }

  /**
   * Interpret the first line typed at the top-level prompt
   */
  static parseCommand(input: string): SessionCommand {
    const text = InputValidator.sanitizeText(input);
    if (text === null) {
      return { kind: 'exit' };
    }

    const word = text.toLowerCase();
    if (word === 'f' || word === 'file') {
      return { kind: 'file' };
    }
    if (word === 'r' || word === 'reset') {
      return { kind: 'reset' };
    }
    return { kind: 'text', text };
  }
}
