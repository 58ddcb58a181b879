/**
 * @fileoverview Undo/redo history for one open note.
 *
 * Snapshots are taken before mutations. Typing is grouped: one snapshot per
 * `snapshotInterval` character-level edits. Coarse edits (line insert/delete,
 * word delete, line moves) always snapshot.
 *
 * @module history-manager
 */

import { cloneLines } from './colored-char.js';
import type { CursorPosition, NoteLines } from './types.js';
import { LimitedStack } from './utils/index.js';

export interface HistorySnapshot {
  lines: NoteLines;
  cursor: CursorPosition;
}

/** `char` edits are throttled, `coarse` edits always snapshot */
export type EditGranularity = 'char' | 'coarse';

export interface HistoryManagerOptions {
  /** Maximum undo snapshots kept; the oldest is evicted beyond it */
  capacity: number;
  /** Character-level edits per undo step */
  snapshotInterval: number;
}

export function cloneSnapshot(snapshot: HistorySnapshot): HistorySnapshot {
  return {
    lines: cloneLines(snapshot.lines),
    cursor: { ...snapshot.cursor },
  };
}

/**
 * Bounded undo stack plus redo stack.
 *
 * The redo stack needs no bound of its own: undo and redo move one entry
 * between the stacks, so together they never hold more than `capacity`.
 *
 * @example
 * ```typescript
 * const history = new HistoryManager({ capacity: 10, snapshotInterval: 10 });
 * history.recordIfDue(() => current(), 'coarse');
 * applyEdit();
 * const previous = history.undo(current());
 * if (previous) restore(previous);
 * ```
 */
export class HistoryManager {
  private readonly undoStack: LimitedStack<HistorySnapshot>;
  private redoStack: HistorySnapshot[] = [];
  private readonly snapshotInterval: number;
  private editsSinceSnapshot = 0;

  constructor(options: HistoryManagerOptions) {
    if (!Number.isInteger(options.snapshotInterval) || options.snapshotInterval < 1) {
      throw new RangeError(`snapshotInterval must be a positive integer, got ${options.snapshotInterval}`);
    }
    this.undoStack = new LimitedStack<HistorySnapshot>(options.capacity);
    this.snapshotInterval = options.snapshotInterval;
  }

  get capacity(): number {
    return this.undoStack.capacity;
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  get canUndo(): boolean {
    return !this.undoStack.isEmpty;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Call before every mutation. Invalidates redo, then snapshots the state
   * from `capture` when the edit is coarse or the typing group is full.
   *
   * @returns Whether a snapshot was pushed
   */
  recordIfDue(capture: () => HistorySnapshot, granularity: EditGranularity): boolean {
    this.redoStack = [];

    if (granularity === 'char' && this.editsSinceSnapshot > 0) {
      this.editsSinceSnapshot = (this.editsSinceSnapshot + 1) % this.snapshotInterval;
      return false;
    }

    this.push(capture());
    this.editsSinceSnapshot = granularity === 'char' ? 1 % this.snapshotInterval : 0;
    return true;
  }

  /**
   * Step back. `current` is kept on the redo stack.
   *
   * @returns The state to restore, or `undefined` when there is nothing to undo
   */
  undo(current: HistorySnapshot): HistorySnapshot | undefined {
    const previous = this.undoStack.pop();
    if (!previous) return undefined;

    this.redoStack.push(cloneSnapshot(current));
    this.closeStep();
    return previous;
  }

  /**
   * Step forward again. `current` goes back on the undo stack.
   *
   * @returns The state to restore, or `undefined` when there is nothing to redo
   */
  redo(current: HistorySnapshot): HistorySnapshot | undefined {
    const next = this.redoStack.pop();
    if (!next) return undefined;

    this.undoStack.push(cloneSnapshot(current));
    this.closeStep();
    return next;
  }

  /** End the current typing group so the next char edit snapshots. */
  closeStep(): void {
    this.editsSinceSnapshot = 0;
  }

  clear(): void {
    this.undoStack.clear();
    this.redoStack = [];
    this.editsSinceSnapshot = 0;
  }

  private push(snapshot: HistorySnapshot): void {
    this.undoStack.push(cloneSnapshot(snapshot));
  }
}
