import Convert from 'ansi-to-html';

import type { Logger } from '../../utils/logger.js';
import { errorMessage } from '../../utils/logger.js';
import { classifyOutput } from './classifier.js';

export type RenderedOutput = { kind: 'plain'; text: string } | { kind: 'markup'; html: string };

export interface RenderOptions {
  logger?: Logger;
  /** Replace the default converter (tests, alternative themes). */
  convert?: (text: string) => string;
}

/**
 * Undecorated text passes through untouched. Decorated text (escape sequences, box drawing) is
 * converted to HTML with colours and styles kept and entities escaped; if conversion throws, the
 * raw text is returned as plain output.
 */
export function renderOutput(text: string, opts: RenderOptions = {}): RenderedOutput {
  const { decorated, markers } = classifyOutput(text);
  if (!decorated) return { kind: 'plain', text };

  const convert = opts.convert ?? ansiToHtml;
  try {
    return { kind: 'markup', html: convert(text) };
  } catch (err) {
    opts.logger?.warn('output conversion failed; keeping plain text', { markers, error: errorMessage(err) });
    return { kind: 'plain', text };
  }
}

export function ansiToHtml(text: string): string {
  // A fresh converter per call: `stream: false` still keeps style state on the instance.
  const converter = new Convert({ escapeXML: true, newline: false, stream: false });
  return converter.toHtml(text);
}

