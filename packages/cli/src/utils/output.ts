/**
 * Output formatting shared by commands
 */

import type { SummaryStats } from '@docsite/core';

// ANSI colors
const COLORS = {
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
};

type Color = keyof typeof COLORS;

export function paint(text: string, color: Color, enabled: boolean): string {
  return enabled ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

/**
 * One-line verdict after a check, e.g. `✗ 2 error(s), 1 warning(s)`.
 */
export function formatStatus(stats: SummaryStats, color: boolean): string {
  const errors = stats.fatal + stats.errors;
  if (errors > 0) {
    return paint(`✗ ${errors} error(s), ${stats.warnings} warning(s)`, 'red', color);
  }
  if (stats.warnings > 0) {
    return paint(`⚠ ${stats.warnings} warning(s)`, 'yellow', color);
  }
  return paint('✓ Config is valid', 'green', color);
}
