import isBinaryPath from 'is-binary-path';
import type { Encoding } from '@repodump/shared';

/** Bytes inspected from the head of each file. */
export const SAMPLE_BYTES = 8192;
/** Strict mode: share of control bytes above which a file is binary. */
export const CONTROL_RATIO_LIMIT = 0.3;

// Backspace, tab, newline, vertical tab, form feed, carriage return, escape.
const TEXT_CONTROLS = new Set([8, 9, 10, 11, 12, 13, 27]);

/**
 * Returns why a file looks binary, or undefined when it reads as text.
 *
 * Known binary extensions are rejected in both modes, as are NUL bytes in the
 * sample. Strict mode also rejects samples dominated by control bytes.
 * UTF-16 text is full of NULs, so only the extension check applies to it.
 */
export function detectBinary(
  filePath: string,
  bytes: Uint8Array,
  strict: boolean,
  encoding: Encoding = 'utf-8',
): string | undefined {
  if (isBinaryPath(filePath)) {
    return 'binary file extension';
  }
  if (encoding === 'utf-16le') {
    return undefined;
  }

  const sample = bytes.subarray(0, SAMPLE_BYTES);
  if (sample.length === 0) return undefined; // Empty file is text-safe

  let controls = 0;
  for (const byte of sample) {
    if (byte === 0) {
      return 'contains NUL bytes';
    }
    if ((byte < 32 && !TEXT_CONTROLS.has(byte)) || byte === 127) {
      controls++;
    }
  }

  if (strict && controls / sample.length > CONTROL_RATIO_LIMIT) {
    return `${Math.round((controls / sample.length) * 100)}% control bytes`;
  }
  return undefined;
}

export interface DecodedText {
  text: string;
  /** True when invalid sequences were replaced with U+FFFD. */
  lossy: boolean;
}

export function decodeText(bytes: Uint8Array, encoding: Encoding): DecodedText {
  try {
    return { text: new TextDecoder(encoding, { fatal: true }).decode(bytes), lossy: false };
  } catch (error) {
    if (!(error instanceof TypeError)) throw error;
    return { text: new TextDecoder(encoding).decode(bytes), lossy: true };
  }
}
