/**
 * @fileoverview Tests for folding typed characters to storable ASCII
 */

import { describe, it, expect } from 'vitest';
import { foldToAscii } from '../src/char-folding.js';

function fold(input: string): string {
  return String.fromCharCode(foldToAscii(input));
}

describe('foldToAscii', () => {
  it('should pass ASCII through', () => {
    expect(fold('a')).toBe('a');
    expect(fold('~')).toBe('~');
    expect(foldToAscii('\n')).toBe(10);
  });

  it('should fold accented letters to their base letter', () => {
    expect(fold('é')).toBe('e');
    expect(fold('Ä')).toBe('A');
    expect(fold('ñ')).toBe('n');
    expect(fold('Ø')).toBe('O');
    expect(fold('ß')).toBe('s');
  });

  it('should fold typographic punctuation', () => {
    expect(fold('“')).toBe('"');
    expect(fold('’')).toBe("'");
    expect(fold('—')).toBe('-');
    expect(fold('\u00a0')).toBe(' ');
  });

  it('should store unknown characters as ?', () => {
    expect(fold('ж')).toBe('?');
    expect(fold('😀')).toBe('?');
    expect(fold('')).toBe('?');
  });

  it('should only look at the first character', () => {
    expect(fold('éa')).toBe('e');
  });
});
