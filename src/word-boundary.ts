/**
 * @fileoverview Word scans for word-wise navigation and deletion.
 *
 * A word is a maximal run of non-space characters. Both scans stop at the
 * line edges, so a word that ends exactly at the end of the line (even a
 * one-character word) is covered in full.
 *
 * @module word-boundary
 */

import { isSpace } from './colored-char.js';
import type { ColoredChar } from './types.js';

/**
 * Column of the first char of the word left of `column`, after skipping the
 * spaces directly left of it.
 *
 * Ex: `My name is John Smith` with `column` 11 (before "John") returns 8
 * (the "i" of "is").
 */
export function findPreviousWordStart(line: readonly ColoredChar[], column: number): number {
  let col = Math.min(Math.max(column, 0), line.length);

  while (col > 0 && isSpace(line[col - 1])) col--;
  while (col > 0 && !isSpace(line[col - 1])) col--;

  return col;
}

/**
 * Column just past the word right of `column` and the spaces that follow it,
 * after skipping the spaces directly right of `column`.
 *
 * Ex: `My name is John Smith` with `column` 11 returns 16 (the "S" of "Smith").
 */
export function findNextWordEnd(line: readonly ColoredChar[], column: number): number {
  let col = Math.min(Math.max(column, 0), line.length);

  while (col < line.length && isSpace(line[col])) col++;
  while (col < line.length && !isSpace(line[col])) col++;
  while (col < line.length && isSpace(line[col])) col++;

  return col;
}
