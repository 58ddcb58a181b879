/**
 * @fileoverview Tests for NoteSession: opening, creating, saving, reloading and resizing notes
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { NoteSession } from '../src/note-session.js';
import { NoteFormatError, NoteNotFoundError, isNoteNotFoundError } from '../src/errors.js';
import { createEngineConfig } from '../src/types.js';
import { MemoryNoteStorage, textBytes } from './mocks/index.js';

const config = createEngineConfig({ viewport: { width: 20, height: 4 } });

describe('NoteSession', () => {
  let storage: MemoryNoteStorage;

  beforeEach(() => {
    storage = new MemoryNoteStorage();
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('open', () => {
    it('should load the stored note', () => {
      storage.put('todo', textBytes('milk\neggs'));

      const session = NoteSession.open(storage, 'todo', config);

      expect(session.noteId).toBe('todo');
      expect(session.engine.getText()).toBe('milk\neggs');
      expect(session.engine.unsavedChanges).toBe(false);
      expect(console.log).toHaveBeenCalledWith(`[NoteSession ${session.id}] Opened note todo (2 lines)`);
    });

    it('should say when a note opens truncated', () => {
      storage.put('wide', textBytes('x'.repeat(25)));

      const session = NoteSession.open(storage, 'wide', config);

      expect(session.engine.typingDisabled).toBe(true);
      expect(console.log).toHaveBeenCalledWith(
        `[NoteSession ${session.id}] Opened note wide (1 lines, truncated to fit the viewport (typing disabled))`,
      );
    });

    it('should throw NoteNotFoundError for a missing note', () => {
      expect(() => NoteSession.open(storage, 'nope', config)).toThrow(NoteNotFoundError);
      expect(() => NoteSession.open(storage, 'nope', config)).toThrow('Note nope not found');
    });

    it('should report the missing note id', () => {
      let caught: unknown;
      try {
        NoteSession.open(storage, 'nope', config);
      } catch (err) {
        caught = err;
      }

      expect(isNoteNotFoundError(caught)).toBe(true);
      expect(isNoteNotFoundError(caught) && caught.noteId).toBe('nope');
      expect(isNoteNotFoundError(new Error('Note nope not found'))).toBe(false);
    });

    it('should log and rethrow a corrupt note', () => {
      storage.put('bad', [0x61, 0, 0xff, 0]);

      expect(() => NoteSession.open(storage, 'bad', config)).toThrow(NoteFormatError);
      expect(console.error).toHaveBeenCalledWith(
        '[NoteSession] Note bad is corrupt (InvalidEncoding): Invalid character byte 255 at byte 2',
      );
    });

    it('should give each session its own id', () => {
      storage.put('n', textBytes('a'));

      const a = NoteSession.open(storage, 'n', config);
      const b = NoteSession.open(storage, 'n', config);

      expect(a.id).not.toBe(b.id);
    });
  });

  describe('create', () => {
    it('should write an empty note under the given id', () => {
      const session = NoteSession.create(storage, config, 'fresh');

      expect(storage.write).toHaveBeenCalledTimes(1);
      expect(storage.notes.get('fresh')?.length).toBe(0);
      expect(session.engine.getText()).toBe('');
      expect(console.log).toHaveBeenCalledWith(`[NoteSession ${session.id}] Created note fresh`);
    });

    it('should generate an id when none is given', () => {
      const session = NoteSession.create(storage, config);

      expect(session.noteId.length).toBeGreaterThan(0);
      expect(storage.exists(session.noteId)).toBe(true);
    });
  });

  describe('save', () => {
    it('should not write without unsaved changes', () => {
      storage.put('n', textBytes('a'));
      const session = NoteSession.open(storage, 'n', config);

      expect(session.save()).toBe(false);
      expect(storage.write).not.toHaveBeenCalled();
    });

    it('should write the note and clear the unsaved flag', () => {
      storage.put('n', textBytes('a'));
      const session = NoteSession.open(storage, 'n', config);
      session.engine.moveToLineEnd();
      session.engine.insertChar('b');

      expect(session.save()).toBe(true);
      expect(Array.from(storage.notes.get('n') ?? [])).toEqual([0x61, 0, 0x62, 0]);
      expect(session.engine.unsavedChanges).toBe(false);
      expect(console.log).toHaveBeenCalledWith(`[NoteSession ${session.id}] Saved note n (4 bytes)`);
    });

    it('should save the full note while it is shown truncated', () => {
      storage.put('tall', textBytes('1\n2\n3\n4\n5'));
      const session = NoteSession.open(storage, 'tall', config);
      session.resize({ width: 20, height: 6 });
      session.engine.deleteLine();
      session.resize({ width: 20, height: 3 });

      session.save();

      expect(Array.from(storage.notes.get('tall') ?? [])).toEqual(Array.from(textBytes('2\n3\n4\n5')));
    });
  });

  describe('reload', () => {
    it('should drop unsaved edits and history', () => {
      storage.put('n', textBytes('keep'));
      const session = NoteSession.open(storage, 'n', config);
      session.engine.deleteLine();

      session.reload();

      expect(session.engine.getText()).toBe('keep');
      expect(session.engine.unsavedChanges).toBe(false);
      expect(session.engine.status.canUndo).toBe(false);
      expect(console.log).toHaveBeenCalledWith(`[NoteSession ${session.id}] Reloaded note n (1 lines)`);
    });

    it('should keep the current viewport', () => {
      storage.put('n', textBytes('a'));
      const session = NoteSession.open(storage, 'n', config);
      session.resize({ width: 12, height: 7 });

      session.reload();

      expect(session.viewport).toEqual({ width: 12, height: 7 });
    });
  });

  describe('resize', () => {
    it('should log mode changes only', () => {
      storage.put('n', textBytes('abcdefghij'));
      const session = NoteSession.open(storage, 'n', config);
      vi.mocked(console.log).mockClear();

      expect(session.resize({ width: 15, height: 4 })).toBe('editable');
      expect(console.log).not.toHaveBeenCalled();

      expect(session.resize({ width: 8, height: 4 })).toBe('viewable');
      expect(console.log).toHaveBeenCalledWith(`[NoteSession ${session.id}] Note n is now viewable at 8x4`);

      expect(session.resize({ width: 10, height: 4 })).toBe('editable');
      expect(console.log).toHaveBeenLastCalledWith(`[NoteSession ${session.id}] Note n is now editable at 10x4`);
    });
  });
});
