/**
 * @fileoverview Display colors a character can carry, and their byte encoding.
 *
 * The byte values are the indexes of the standard 16-color terminal palette.
 * Byte 0 (black in the palette) is reserved for "no color", so black text
 * cannot be stored.
 *
 * @module color-tag
 */

import { NoteFormatError } from './errors.js';

/** Ordered by byte value: `COLOR_TAGS[byte]` is the tag stored as `byte`. */
export const COLOR_TAGS = [
  'none',
  'maroon',
  'green',
  'olive',
  'navy',
  'purple',
  'teal',
  'silver',
  'grey',
  'red',
  'lime',
  'yellow',
  'blue',
  'fuchsia',
  'aqua',
  'white',
] as const;

export type ColorTag = (typeof COLOR_TAGS)[number];

const BYTE_BY_TAG = new Map<ColorTag, number>(COLOR_TAGS.map((tag, index) => [tag, index] as const));
const TAG_NAMES: ReadonlySet<string> = new Set<string>(COLOR_TAGS);

export function isColorTag(value: string): value is ColorTag {
  return TAG_NAMES.has(value);
}

export function encodeColorTag(tag: ColorTag): number {
  const byte = BYTE_BY_TAG.get(tag);
  // Unreachable for a well-typed tag
  if (byte === undefined) {
    throw new NoteFormatError('InvalidColorTag', `Unknown color tag: ${String(tag)}`);
  }
  return byte;
}

/**
 * Decode a stored color byte.
 *
 * @throws NoteFormatError with code `InvalidColorTag` for bytes outside the palette
 */
export function decodeColorTag(byte: number, offset: number | null = null): ColorTag {
  const tag: ColorTag | undefined = Number.isInteger(byte) ? COLOR_TAGS[byte] : undefined;
  if (tag === undefined) {
    const where = offset === null ? '' : ` at byte ${offset}`;
    throw new NoteFormatError('InvalidColorTag', `Invalid color tag ${byte}${where}`, offset);
  }
  return tag;
}

/**
 * Resolve a configured color. Accepts a palette name (any case) or the
 * palette byte, as a number or a numeric string ("12" is blue).
 *
 * @throws NoteFormatError with code `InvalidColorTag` when nothing matches
 */
export function resolveColorName(value: string | number): ColorTag {
  if (typeof value === 'number') {
    return decodeColorTag(value);
  }
  const trimmed = value.trim().toLowerCase();
  if (/^\d+$/.test(trimmed)) {
    return decodeColorTag(Number(trimmed));
  }
  // "gray" is a common spelling of the palette's grey
  const name = trimmed === 'gray' ? 'grey' : trimmed;
  if (isColorTag(name)) {
    return name;
  }
  throw new NoteFormatError('InvalidColorTag', `Unknown color name: ${value}`);
}
