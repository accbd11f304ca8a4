import { describe, it, expect } from 'vitest';
import { decodeText, detectBinary } from './utils';

const bytes = (...values: number[]) => Uint8Array.from(values);
const ascii = (text: string) => new TextEncoder().encode(text);

describe('detectBinary', () => {
  it('rejects known binary extensions without looking at content', () => {
    expect(detectBinary('assets/logo.png', ascii('plain text'), false)).toBe('binary file extension');
  });

  it('rejects NUL bytes in both modes', () => {
    expect(detectBinary('data.bin.txt', bytes(65, 0, 66), false)).toBe('contains NUL bytes');
    expect(detectBinary('data.txt', bytes(65, 0, 66), true)).toBe('contains NUL bytes');
  });

  it('flags control-heavy content only in strict mode', () => {
    const noisy = bytes(1, 2, 3, 65, 66);
    expect(detectBinary('noise.txt', noisy, true)).toBe('60% control bytes');
    expect(detectBinary('noise.txt', noisy, false)).toBeUndefined();
  });

  it('accepts text with tabs, newlines and ANSI escapes', () => {
    expect(detectBinary('build.log', ascii('\u001b[32mok\u001b[0m\r\n\tdone\n'), true)).toBeUndefined();
  });

  it('accepts empty files and non-ASCII UTF-8', () => {
    expect(detectBinary('empty.txt', bytes(), true)).toBeUndefined();
    expect(detectBinary('greeting.txt', ascii('¡hola, señor!'), true)).toBeUndefined();
  });

  it('skips content sniffing for UTF-16 text', () => {
    expect(detectBinary('wide.txt', bytes(65, 0, 66, 0), true, 'utf-16le')).toBeUndefined();
  });
});

describe('decodeText', () => {
  it('decodes valid UTF-8 exactly', () => {
    expect(decodeText(ascii('héllo'), 'utf-8')).toEqual({ text: 'héllo', lossy: false });
  });

  it('falls back to a lossy decode with replacement characters', () => {
    expect(decodeText(bytes(104, 105, 0xff), 'utf-8')).toEqual({ text: 'hi�', lossy: true });
  });

  it('decodes UTF-16LE', () => {
    expect(decodeText(bytes(104, 0, 105, 0), 'utf-16le')).toEqual({ text: 'hi', lossy: false });
  });
});
