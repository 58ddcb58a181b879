/**
 * @fileoverview Fold typed characters down to the 7-bit range notes can store.
 *
 * The folding table lives in `data/diacritic-folds.json` as
 * `{ asciiBase: "variants" }` and is loaded on first use.
 *
 * @module char-folding
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { MAX_CHAR_CODE } from './config/editor-limits.js';

/** Stored when a character has no ASCII equivalent */
export const UNKNOWN_CHAR = '?';

const FOLD_TABLE_URL = new URL('../data/diacritic-folds.json', import.meta.url);

const FoldTableSchema = z.record(
  z.string().length(1).refine((base) => base.charCodeAt(0) <= MAX_CHAR_CODE, {
    message: 'Fold target must be ASCII',
  }),
  z.string().min(1),
);

let foldMap: Map<number, number> | null = null;

function loadFoldMap(): Map<number, number> {
  if (foldMap) return foldMap;

  const table = FoldTableSchema.parse(JSON.parse(readFileSync(FOLD_TABLE_URL, 'utf-8')));
  const map = new Map<number, number>();
  for (const [base, variants] of Object.entries(table)) {
    for (const variant of variants) {
      const codePoint = variant.codePointAt(0);
      if (codePoint !== undefined) map.set(codePoint, base.charCodeAt(0));
    }
  }
  foldMap = map;
  return map;
}

/**
 * Map the first character of `input` to a storable code: ASCII passes
 * through, known accented letters and typographic marks fold to their base
 * ("é" → "e", "“" → '"'), anything else becomes `?`.
 */
export function foldToAscii(input: string): number {
  const codePoint = input.codePointAt(0);
  if (codePoint === undefined) return UNKNOWN_CHAR.charCodeAt(0);
  if (codePoint <= MAX_CHAR_CODE) return codePoint;
  return loadFoldMap().get(codePoint) ?? UNKNOWN_CHAR.charCodeAt(0);
}
