/**
 * @fileoverview Error types raised while loading notes.
 *
 * Editing operations never throw; only loading a stored note (or resolving a
 * configured color) can fail.
 *
 * @module errors
 */

/** Why a stored note could not be decoded */
export type NoteFormatErrorCode = 'InvalidEncoding' | 'InvalidColorTag' | 'MalformedLength';

export class NoteFormatError extends Error {
  readonly code: NoteFormatErrorCode;
  /** Byte offset of the offending byte, when the failure is tied to one */
  readonly offset: number | null;

  constructor(code: NoteFormatErrorCode, message: string, offset: number | null = null) {
    super(message);
    this.name = 'NoteFormatError';
    this.code = code;
    this.offset = offset;
  }
}

export class NoteNotFoundError extends Error {
  readonly noteId: string;

  constructor(noteId: string) {
    super(`Note ${noteId} not found`);
    this.name = 'NoteNotFoundError';
    this.noteId = noteId;
  }
}

export function isNoteFormatError(err: unknown): err is NoteFormatError {
  return err instanceof NoteFormatError;
}

export function isNoteNotFoundError(err: unknown): err is NoteNotFoundError {
  return err instanceof NoteNotFoundError;
}
