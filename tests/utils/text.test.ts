import { describe, it, expect } from 'vitest';
import { compareNames, decodeUtf8, indentLines, isBlank } from '../../src/utils/text';

describe('text helpers', () => {
  it('indents non-empty lines only', () => {
    expect(indentLines('a\n\nb\n')).toBe('    a\n\n    b\n');
    expect(indentLines('')).toBe('');
  });

  it('composes across nesting levels', () => {
    expect(indentLines(indentLines('x\n'))).toBe('        x\n');
  });

  it('treats whitespace-only lines as blank', () => {
    expect(isBlank(' \t ')).toBe(true);
    expect(isBlank(' x ')).toBe(false);
  });

  it('compares by codepoint', () => {
    expect(['abc', 'abb', 'adc', 'acc', ''].sort(compareNames)).toEqual(['', 'abb', 'abc', 'acc', 'adc']);
    expect(compareNames('Z', 'a')).toBe(-1);
    expect(compareNames('a', 'a')).toBe(0);
  });

  it('decodes strict UTF-8 only', () => {
    expect(decodeUtf8(new Uint8Array([0x6e, 0x6f, 0x70, 0xc3, 0xa9]))).toBe('nop\u00e9');
    expect(decodeUtf8(new Uint8Array([0x66, 0xff, 0xfe]))).toBeNull();
    expect(decodeUtf8(new Uint8Array([0xc3]))).toBeNull();
  });
});
