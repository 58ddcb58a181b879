/**
 * @fileoverview notecell library entry point.
 *
 * Re-exports the editing core (engine, history, codec) and the thin
 * collaborators around it (settings, note storage, sessions).
 *
 * @module index
 */

export { BufferEngine } from './buffer-engine.js';
export {
  HistoryManager,
  cloneSnapshot,
  type EditGranularity,
  type HistoryManagerOptions,
  type HistorySnapshot,
} from './history-manager.js';
export { decodeNote, encodeNote, fitToViewport, type FitResult } from './note-codec.js';
export {
  COLOR_TAGS,
  decodeColorTag,
  encodeColorTag,
  isColorTag,
  resolveColorName,
  type ColorTag,
} from './color-tag.js';
export {
  charsEqual,
  cloneLines,
  coloredChar,
  isSpace,
  lineFromText,
  linesEqual,
  linesFromText,
  lineToText,
} from './colored-char.js';
export { foldToAscii, UNKNOWN_CHAR } from './char-folding.js';
export { findNextWordEnd, findPreviousWordStart } from './word-boundary.js';
export {
  EditorSettingsSchema,
  ViewportSchema,
  resolveEngineConfig,
  type EditorSettings,
  type EditorSettingsInput,
} from './settings.js';
export { FileNoteStore, NoteIdSchema, createNoteId, isValidNoteId } from './note-store.js';
export { NoteSession } from './note-session.js';
export {
  NoteFormatError,
  NoteNotFoundError,
  isNoteFormatError,
  isNoteNotFoundError,
  type NoteFormatErrorCode,
} from './errors.js';
export { LimitedStack } from './utils/index.js';
export * from './types.js';
