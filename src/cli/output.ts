import chalk from 'chalk';
import { formatSummary } from '../download/core/BatchAggregator';
import { BatchEvent, BatchSummary } from '../download/core/types';

function str(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

function num(value: unknown): number {
  return typeof value === 'number' ? value : 0;
}

/**
 * One progress line per batch event, or null for events the terminal skips
 */
export function formatEvent(event: BatchEvent): string | null {
  const data = event.data ?? {};

  switch (event.type) {
    case 'url:started':
      return chalk.cyan(`[${num(data.index)}/${num(data.total)}] ${event.url ?? ''}`);
    case 'url:invalid':
      return chalk.red(`  ✗ invalid: ${str(data.reason)}`);
    case 'format:started':
      return chalk.gray(`  → ${str(data.format)}`);
    case 'attempt:failed':
      return chalk.gray(`    cookies=${str(data.cookies)} ${str(data.errorClass)}: ${str(data.error)}`);
    case 'cookie:locked':
      return chalk.yellow(`  🔒 cookie mode locked: ${str(data.cookies)}`);
    case 'format:completed': {
      const artifacts = Array.isArray(data.artifacts) ? data.artifacts.map(str) : [];
      return chalk.green(`  ✓ ${str(data.format)}: ${artifacts.join(', ')}`);
    }
    case 'format:failed':
      return chalk.red(`  ✗ ${str(data.format)}: ${str(data.error) || 'failed'}`);
    default:
      return null;
  }
}

/**
 * Batch summary under a heading, counts line coloured by outcome
 */
export function renderSummary(summary: BatchSummary): string {
  const [counts, ...rest] = formatSummary(summary).split('\n');
  const colour =
    summary.failedCount > 0 ? chalk.red : summary.invalidCount > 0 ? chalk.yellow : chalk.green;
  return ['', chalk.bold('Summary'), colour(counts), ...rest].join('\n');
}
