/**
 * @fileoverview Persisted note format and the fit-to-viewport policy.
 *
 * A note is stored as a flat byte stream of (char, color) pairs. A pair whose
 * char is a newline separates two lines; there is no trailing separator, and
 * an empty stream is a note with one empty line.
 *
 * @module note-codec
 */

import { decodeColorTag, encodeColorTag } from './color-tag.js';
import { cloneLines, coloredChar, lineFromText } from './colored-char.js';
import {
  BYTES_PER_CHAR,
  LINE_ELLIPSIS,
  MAX_CHAR_CODE,
  NEWLINE_CODE,
  NEWLINE_COLOR_BYTE,
  OVERFLOW_MARKER,
} from './config/editor-limits.js';
import { NoteFormatError } from './errors.js';
import type { EditorMode, Line, NoteLines, Viewport } from './types.js';

export interface FitResult {
  lines: NoteLines;
  /** Something was cut to make the note fit */
  truncated: boolean;
  mode: EditorMode;
}

/**
 * Decode a stored note.
 *
 * @throws NoteFormatError `MalformedLength` for an odd byte count,
 *   `InvalidEncoding` for a char byte above 127, `InvalidColorTag` for an
 *   unknown color byte
 */
export function decodeNote(bytes: Uint8Array): NoteLines {
  if (bytes.length % BYTES_PER_CHAR !== 0) {
    throw new NoteFormatError(
      'MalformedLength',
      `Note has an odd byte count (${bytes.length}); expected char/color pairs`,
    );
  }

  const lines: NoteLines = [[]];
  for (let i = 0; i < bytes.length; i += BYTES_PER_CHAR) {
    const char = bytes[i];
    const colorByte = bytes[i + 1];

    if (char > MAX_CHAR_CODE) {
      throw new NoteFormatError('InvalidEncoding', `Invalid character byte ${char} at byte ${i}`, i);
    }

    if (char === NEWLINE_CODE) {
      lines.push([]);
      continue;
    }

    lines[lines.length - 1].push(coloredChar(char, decodeColorTag(colorByte, i + 1)));
  }
  return lines;
}

/** Encode note lines. Inverse of {@link decodeNote}. */
export function encodeNote(lines: readonly Line[]): Uint8Array {
  const charCount = lines.reduce((sum, line) => sum + line.length, 0);
  const separators = Math.max(0, lines.length - 1);
  const bytes = new Uint8Array((charCount + separators) * BYTES_PER_CHAR);

  let offset = 0;
  lines.forEach((line, index) => {
    for (const c of line) {
      bytes[offset++] = c.char;
      bytes[offset++] = encodeColorTag(c.color);
    }
    if (index !== lines.length - 1) {
      bytes[offset++] = NEWLINE_CODE;
      bytes[offset++] = NEWLINE_COLOR_BYTE;
    }
  });
  return bytes;
}

/**
 * Cut a note down to the viewport. Never throws and never mutates `lines`.
 *
 * Extra lines are dropped and the last visible line becomes `...`; long lines
 * keep their first `width - 4` chars followed by ` ...`. Anything cut puts the
 * editor in `viewable` mode.
 */
export function fitToViewport(lines: readonly Line[], viewport: Viewport): FitResult {
  const { width, height } = viewport;
  const fitted = cloneLines(lines);
  let truncated = false;

  if (fitted.length > height) {
    fitted.length = height;
    fitted[height - 1] = lineFromText(OVERFLOW_MARKER);
    truncated = true;
  }

  for (let i = 0; i < fitted.length; i++) {
    if (fitted[i].length > width) {
      fitted[i] = truncateLine(fitted[i], width);
      truncated = true;
    }
  }

  return { lines: fitted, truncated, mode: truncated ? 'viewable' : 'editable' };
}

function truncateLine(line: Line, width: number): Line {
  const keep = Math.max(0, width - LINE_ELLIPSIS.length);
  return [...line.slice(0, keep), ...lineFromText(LINE_ELLIPSIS)].slice(0, width);
}
