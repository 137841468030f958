import { TextDecoder } from 'node:util';

import type { Logger } from '../../utils/logger.js';

/**
 * Default priority: UTF-8 first, then the legacy CJK code pages the wrapped tools most often emit
 * on localized systems, then UTF-16LE (Windows console redirection).
 */
export const DEFAULT_ENCODING_CANDIDATES: readonly string[] = ['utf-8', 'big5', 'gbk', 'utf-16le'];

/** Single-byte table that maps every byte; decoding with it cannot fail. */
export const DEFAULT_FALLBACK_ENCODING = 'latin1';

export interface DecodedText {
  text: string;
  /** Canonical WHATWG name of the encoding that produced `text`. */
  encoding: string;
  /** True when every candidate failed and the permissive fallback was used. */
  fallback: boolean;
}

export interface DecodeOptions {
  fallback?: string;
  logger?: Logger;
}

/**
 * Build the ordered candidate list: the command's encoding hint (if any) first, then the configured list,
 * lower-cased and without duplicates.
 */
export function resolveCandidates(hint: string | undefined, configured: readonly string[]): string[] {
  const out: string[] = [];
  for (const raw of [hint, ...configured]) {
    if (!raw) continue;
    const label = raw.trim().toLowerCase();
    if (label && !out.includes(label)) out.push(label);
  }
  return out;
}

/**
 * Decode `bytes` with the first candidate that does not raise a hard decoding error. If all of
 * them fail, decode with the fallback table (substituting where needed). Never throws.
 */
export function decodeWithFallback(
  bytes: Uint8Array,
  candidates: readonly string[],
  opts: DecodeOptions = {}
): DecodedText {
  for (const label of candidates) {
    const decoder = createDecoder(label, true);
    if (!decoder) {
      opts.logger?.debug('skipping unsupported encoding', { label });
      continue;
    }
    try {
      return { text: decoder.decode(bytes), encoding: decoder.encoding, fallback: false };
    } catch {
      continue;
    }
  }

  const fallbackLabel = opts.fallback ?? DEFAULT_FALLBACK_ENCODING;
  const decoder = createDecoder(fallbackLabel, false) ?? new TextDecoder('utf-8', { fatal: false });
  opts.logger?.warn('no candidate encoding decoded cleanly; using fallback', {
    candidates: [...candidates],
    fallback: decoder.encoding,
    bytes: bytes.byteLength
  });
  return { text: decoder.decode(bytes), encoding: decoder.encoding, fallback: true };
}

export function isSupportedEncoding(label: string): boolean {
  return createDecoder(label, false) !== null;
}

function createDecoder(label: string, fatal: boolean): TextDecoder | null {
  try {
    return new TextDecoder(label, { fatal });
  } catch {
    // RangeError: label unknown to this runtime's ICU build.
    return null;
  }
}
