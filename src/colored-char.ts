/**
 * @fileoverview Constructors and comparisons for stored characters and lines.
 *
 * @module colored-char
 */

import type { ColorTag } from './color-tag.js';
import type { ColoredChar, Line, NoteLines } from './types.js';

const SPACE_CODE = 0x20;

/** ColoredChar values are frozen, so lines may share them safely. */
export function coloredChar(char: number, color: ColorTag = 'none'): ColoredChar {
  return Object.freeze({ char, color });
}

/** Same code and same color. Used for persistence round-trips. */
export function charsEqual(a: ColoredChar, b: ColoredChar): boolean {
  return a.char === b.char && a.color === b.color;
}

export function isSpace(c: ColoredChar): boolean {
  return c.char === SPACE_CODE;
}

export function linesEqual(a: readonly Line[], b: readonly Line[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((line, i) => {
    const other = b[i];
    return line.length === other.length && line.every((c, j) => charsEqual(c, other[j]));
  });
}

/** Copies every line array. The result shares no line with the input. */
export function cloneLines(lines: readonly Line[]): NoteLines {
  return lines.map((line) => [...line]);
}

/** Build a line from ASCII text. Callers fold non-ASCII input first. */
export function lineFromText(text: string, color: ColorTag = 'none'): Line {
  return Array.from(text, (ch) => coloredChar(ch.charCodeAt(0), color));
}

/** Build note lines from text, splitting on `\n`. */
export function linesFromText(text: string, color: ColorTag = 'none'): NoteLines {
  return text.split('\n').map((row) => lineFromText(row, color));
}

export function lineToText(line: readonly ColoredChar[]): string {
  return String.fromCharCode(...line.map((c) => c.char));
}
