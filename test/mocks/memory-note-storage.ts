/**
 * Shared in-memory NoteStorage for tests.
 *
 * All methods are vi.fn() spies over a Map, so tests can assert writes
 * or override return values as needed.
 */
import { vi } from 'vitest';
import type { NoteStorage } from '../../src/types.js';

export class MemoryNoteStorage implements NoteStorage {
  notes = new Map<string, Uint8Array>();

  read = vi.fn((noteId: string): Uint8Array | null => {
    const bytes = this.notes.get(noteId);
    return bytes ? bytes.slice() : null;
  });
  write = vi.fn((noteId: string, bytes: Uint8Array): void => {
    this.notes.set(noteId, bytes.slice());
  });
  exists = vi.fn((noteId: string): boolean => this.notes.has(noteId));
  remove = vi.fn((noteId: string): boolean => this.notes.delete(noteId));

  /** Seed a note from bytes */
  put(noteId: string, bytes: ArrayLike<number>): void {
    this.notes.set(noteId, Uint8Array.from(bytes));
  }

  /** Reset all notes and mocks for clean test isolation */
  reset(): void {
    this.notes.clear();
    vi.clearAllMocks();
  }
}
