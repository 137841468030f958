import { theme, INDENT, RULE_WIDTH } from './theme.js';

function padRight(str: string, width: number): string {
  if (str.length >= width) return str;
  return str + ' '.repeat(width - str.length);
}

/**
 * "  Budget        5m"
 */
export function keyValue(label: string, value: string, labelWidth: number = 14): string {
  return INDENT + theme.dim(padRight(label, labelWidth)) + value;
}

/**
 * A section banner:  ── Estimate ────────────────────────
 */
export function sectionBanner(title: string, width: number = RULE_WIDTH): string {
  const prefix = '── ';
  const suffixLen = Math.max(4, width - prefix.length - title.length - 1);
  return theme.dim(prefix) + theme.bold(title) + theme.dim(' ' + '─'.repeat(suffixLen));
}
