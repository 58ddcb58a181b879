/**
 * @fileoverview File-backed storage for raw note bytes.
 *
 * Each note is one file, `<noteId>.note`, under the store's root directory
 * (`~/.notecell/notes` by default). The directory is created on first write.
 *
 * @module note-store
 */

import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { MAX_NOTE_ID_LENGTH } from './config/editor-limits.js';
import type { NoteStorage } from './types.js';

const NOTE_FILE_EXTENSION = '.note';

/** Letters, digits, dash, underscore and dot; no traversal */
export const NoteIdSchema = z
  .string()
  .min(1)
  .max(MAX_NOTE_ID_LENGTH)
  .regex(/^[a-zA-Z0-9._-]+$/, { message: 'Note id may only contain letters, digits, ".", "_" and "-"' })
  .refine((id) => !id.includes('..'), { message: 'Note id must not contain ".."' });

export function isValidNoteId(noteId: string): boolean {
  return NoteIdSchema.safeParse(noteId).success;
}

/** Identifier for a brand new note */
export function createNoteId(): string {
  return uuidv4();
}

/**
 * Stores notes as files in one directory.
 *
 * @example
 * ```typescript
 * const store = new FileNoteStore();
 * const bytes = store.read('groceries');  // null when missing
 * store.write('groceries', engine.serialize());
 * ```
 */
export class FileNoteStore implements NoteStorage {
  readonly rootDir: string;

  constructor(rootDir?: string) {
    this.rootDir = rootDir || join(homedir(), '.notecell', 'notes');
  }

  /**
   * Absolute path of a note's file.
   *
   * @throws ZodError for an invalid note id
   */
  notePath(noteId: string): string {
    return join(this.rootDir, NoteIdSchema.parse(noteId) + NOTE_FILE_EXTENSION);
  }

  read(noteId: string): Uint8Array | null {
    try {
      return new Uint8Array(readFileSync(this.notePath(noteId)));
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
      throw err;
    }
  }

  write(noteId: string, bytes: Uint8Array): void {
    const path = this.notePath(noteId);
    this.ensureDir();
    writeFileSync(path, bytes);
  }

  exists(noteId: string): boolean {
    return existsSync(this.notePath(noteId));
  }

  remove(noteId: string): boolean {
    const path = this.notePath(noteId);
    if (!existsSync(path)) return false;
    rmSync(path);
    return true;
  }

  private ensureDir(): void {
    if (!existsSync(this.rootDir)) {
      mkdirSync(this.rootDir, { recursive: true });
      console.log(`[FileNoteStore] Created notes directory ${this.rootDir}`);
    }
  }
}
