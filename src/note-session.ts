/**
 * @fileoverview One open note: its storage location, engine and viewport.
 *
 * Opening another note means creating another session; nothing is shared
 * between sessions. Saving is an explicit, synchronous whole-note write.
 *
 * @module note-session
 */

import { v4 as uuidv4 } from 'uuid';
import { BufferEngine } from './buffer-engine.js';
import { isNoteFormatError, NoteNotFoundError } from './errors.js';
import { createNoteId } from './note-store.js';
import type { EditorMode, EngineConfig, NoteStorage, Viewport } from './types.js';

/**
 * Editing session for a single note.
 *
 * @example
 * ```typescript
 * const session = NoteSession.open(store, 'groceries', config);
 * session.engine.insertChar('x');
 * session.save();
 * ```
 */
export class NoteSession {
  readonly id: string = uuidv4();
  readonly noteId: string;
  private engineValue: BufferEngine;
  private config: EngineConfig;
  private readonly storage: NoteStorage;

  private constructor(storage: NoteStorage, noteId: string, config: EngineConfig, engine: BufferEngine) {
    this.storage = storage;
    this.noteId = noteId;
    this.config = config;
    this.engineValue = engine;
  }

  /**
   * Open a stored note.
   *
   * @throws NoteNotFoundError when the note does not exist
   * @throws NoteFormatError when the stored bytes are corrupt
   */
  static open(storage: NoteStorage, noteId: string, config: EngineConfig): NoteSession {
    const engine = loadEngine(storage, noteId, config);
    const session = new NoteSession(storage, noteId, config, engine);
    session.logOpened('Opened');
    return session;
  }

  /** Create an empty note (written immediately) and open it. */
  static create(storage: NoteStorage, config: EngineConfig, noteId: string = createNoteId()): NoteSession {
    const engine = new BufferEngine(config);
    storage.write(noteId, engine.serialize());
    const session = new NoteSession(storage, noteId, config, engine);
    console.log(`[NoteSession ${session.id}] Created note ${noteId}`);
    return session;
  }

  get engine(): BufferEngine {
    return this.engineValue;
  }

  get viewport(): Viewport {
    return this.engineValue.viewport;
  }

  /**
   * Write the note if it has unsaved changes.
   *
   * @returns Whether anything was written
   */
  save(): boolean {
    if (!this.engineValue.unsavedChanges) return false;

    const bytes = this.engineValue.serialize();
    this.storage.write(this.noteId, bytes);
    this.engineValue.markSaved();
    console.log(`[NoteSession ${this.id}] Saved note ${this.noteId} (${bytes.length} bytes)`);
    return true;
  }

  /**
   * Re-read the note from storage, dropping unsaved edits and history.
   * The current viewport is kept.
   */
  reload(): void {
    this.engineValue = loadEngine(this.storage, this.noteId, { ...this.config, viewport: this.viewport });
    this.logOpened('Reloaded');
  }

  /** Apply a new viewport size. */
  resize(viewport: Viewport): EditorMode {
    const before = this.engineValue.mode;
    const after = this.engineValue.resize(viewport);
    this.config = { ...this.config, viewport: this.engineValue.viewport };

    if (before !== after) {
      const { width, height } = this.engineValue.viewport;
      console.log(
        `[NoteSession ${this.id}] Note ${this.noteId} is now ${after} at ${width}x${height}`,
      );
    }
    return after;
  }

  private logOpened(verb: string): void {
    const { lineCount, typingDisabled } = this.engineValue.status;
    const suffix = typingDisabled ? ', truncated to fit the viewport (typing disabled)' : '';
    console.log(`[NoteSession ${this.id}] ${verb} note ${this.noteId} (${lineCount} lines${suffix})`);
  }
}

function loadEngine(storage: NoteStorage, noteId: string, config: EngineConfig): BufferEngine {
  const bytes = storage.read(noteId);
  if (bytes === null) {
    throw new NoteNotFoundError(noteId);
  }

  try {
    return BufferEngine.fromBytes(bytes, config);
  } catch (err) {
    if (isNoteFormatError(err)) {
      console.error(`[NoteSession] Note ${noteId} is corrupt (${err.code}): ${err.message}`);
    }
    throw err;
  }
}
