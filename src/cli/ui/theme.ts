import chalk from 'chalk';

import type { OutcomeTone } from '../../core/status.js';

// ── Semantic Colors ─────────────────────────────────────────────────────────
// Respects NO_COLOR / FORCE_COLOR via chalk.

export const theme = {
  bold: chalk.bold,
  dim: chalk.dim,

  warning: chalk.yellow,
  error: chalk.red,

  check: chalk.green('✔'),
  cross: chalk.red('✖'),

  tone: (tone: OutcomeTone) => TONES[tone]
} as const;

const TONES: Record<OutcomeTone, (text: string) => string> = {
  success: chalk.green,
  error: chalk.red,
  warning: chalk.yellow,
  muted: chalk.dim
};

// ── Layout Constants ────────────────────────────────────────────────────────

export const INDENT = '  ';

export const RULE_WIDTH = 56;
