import type { ExecutionResult } from './task/types.js';
import { firstLine, formatMs } from '../utils/format.js';

export type OutcomeTone = 'success' | 'error' | 'warning' | 'muted';

export interface OutcomeDescription {
  icon: string;
  tone: OutcomeTone;
  text: string;
}

/** One line per terminal outcome, for status bars and CLI summaries. */
export function describeOutcome(result: ExecutionResult): OutcomeDescription {
  const d = result.diagnostic;
  switch (result.state) {
    case 'succeeded':
      return { icon: '✔', tone: 'success', text: `Completed in ${formatMs(result.durationMs)}${result.fromCache ? ' (cached)' : ''}` };
    case 'cancelled':
      return { icon: '◼', tone: 'muted', text: `Cancelled after ${formatMs(result.durationMs)}` };
    case 'timed_out': {
      const text = d?.message ?? `Timed out after ${formatMs(result.durationMs)}`;
      return { icon: '⏱', tone: 'warning', text: d?.hint ? `${text}. ${d.hint}` : text };
    }
    case 'failed':
      if (d?.kind === 'tool_not_found') {
        const command = typeof d.details?.command === 'string' ? d.details.command : 'unknown';
        return { icon: '✖', tone: 'error', text: `Tool not found: ${command}.${d.hint ? ` ${d.hint}` : ''}` };
      }
      if (result.exitCode !== null) {
        const reason = firstLine(result.stderr);
        return { icon: '✖', tone: 'error', text: `Failed with exit code ${result.exitCode}${reason ? `: ${reason}` : ''}` };
      }
      return { icon: '✖', tone: 'error', text: `Failed: ${d?.message ?? 'unknown error'}` };
  }
}

export function formatStatusLine(result: ExecutionResult): string {
  const { icon, text } = describeOutcome(result);
  return `${icon} ${text}`;
}

/** Conventional shell exit codes: timeout(1) uses 124, SIGINT 130, a missing command 127. */
export function exitCodeFor(result: ExecutionResult): number {
  switch (result.state) {
    case 'succeeded':
      return 0;
    case 'timed_out':
      return 124;
    case 'cancelled':
      return 130;
    case 'failed':
      if (result.diagnostic?.kind === 'tool_not_found') return 127;
      return result.exitCode !== null && result.exitCode !== 0 ? result.exitCode : 1;
  }
}
