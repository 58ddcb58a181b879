/**
 * @fileoverview Bounded text-buffer engine: the editing core of a note.
 *
 * The buffer is a grid of lines that can never outgrow the viewport. Typing
 * into a full line, splitting lines past the viewport height, or merging
 * lines into one that would be too wide are rejected as no-ops instead of
 * failing, so the editing surface never throws.
 *
 * A note that does not fit the viewport on load (or after a resize) is shown
 * truncated in `viewable` mode. Editing is disabled until a resize lets the
 * full note fit again; the untruncated content is kept aside meanwhile and is
 * what gets serialized.
 *
 * @module buffer-engine
 */

import { cloneLines, coloredChar, lineToText } from './colored-char.js';
import { foldToAscii } from './char-folding.js';
import { NEWLINE_CODE } from './config/editor-limits.js';
import { HistoryManager, type EditGranularity, type HistorySnapshot } from './history-manager.js';
import { decodeNote, encodeNote, fitToViewport } from './note-codec.js';
import { findNextWordEnd, findPreviousWordStart } from './word-boundary.js';
import type { ColorTag } from './color-tag.js';
import type {
  ActiveColorSelection,
  ColorSelection,
  CursorPosition,
  EditorMode,
  EditorStatus,
  EngineConfig,
  Line,
  NoteLines,
  RenderedCell,
  Viewport,
  WriteMode,
} from './types.js';

const TAB_CODE = 0x09;
const SPACE_CODE = 0x20;
const DELETE_CODE = 0x7f;

/**
 * Editing state of one open note.
 *
 * Edit operations return `true` when they changed the note and `false` when
 * they were a no-op (boundary reached, line full, typing disabled).
 *
 * @example
 * ```typescript
 * const engine = BufferEngine.fromBytes(bytes, config);
 * engine.insertChar('h');
 * engine.insertChar('i');
 * engine.insertLine();
 * if (engine.status.unsavedChanges) storage.write(id, engine.serialize());
 * ```
 */
export class BufferEngine {
  private lines: NoteLines = [[]];
  /** Full content while the displayed lines are truncated, otherwise null */
  private fullLines: NoteLines | null = null;
  private cursorPos: CursorPosition = { line: 0, column: 0 };
  private modeValue: EditorMode = 'editable';
  private writeModeValue: WriteMode;
  private activeColorValue: ActiveColorSelection = 'none';
  private unsaved = false;
  private viewportValue: Viewport;
  private readonly colors: EngineConfig['colors'];
  private readonly tabSize: number;
  private readonly history: HistoryManager;

  /** @throws RangeError for a non-finite or non-positive viewport size */
  constructor(config: EngineConfig, lines: readonly Line[] = [[]]) {
    this.viewportValue = normalizeViewport(config.viewport);
    this.writeModeValue = config.writeMode;
    this.colors = { ...config.colors };
    this.tabSize = config.tabSize;
    this.history = new HistoryManager({
      capacity: config.historyCapacity,
      snapshotInterval: config.snapshotInterval,
    });
    this.applyFit(lines.length > 0 ? lines : [[]]);
  }

  /**
   * Load a stored note.
   *
   * @throws NoteFormatError when the bytes are not a valid note
   */
  static fromBytes(bytes: Uint8Array, config: EngineConfig): BufferEngine {
    return new BufferEngine(config, decodeNote(bytes));
  }

  // ========== Queries ==========

  get cursor(): CursorPosition {
    return { ...this.cursorPos };
  }

  get mode(): EditorMode {
    return this.modeValue;
  }

  get typingDisabled(): boolean {
    return this.modeValue === 'viewable';
  }

  get unsavedChanges(): boolean {
    return this.unsaved;
  }

  get writeMode(): WriteMode {
    return this.writeModeValue;
  }

  get activeColor(): ActiveColorSelection {
    return this.activeColorValue;
  }

  get viewport(): Viewport {
    return { ...this.viewportValue };
  }

  get lineCount(): number {
    return this.lines.length;
  }

  /** Characters in the displayed note, separators excluded */
  get charCount(): number {
    return this.lines.reduce((sum, line) => sum + line.length, 0);
  }

  get status(): EditorStatus {
    return {
      unsavedChanges: this.unsaved,
      typingDisabled: this.typingDisabled,
      mode: this.modeValue,
      truncated: this.fullLines !== null,
      lineFull: this.lineIsFull(),
      bufferFull: this.lines.length >= this.viewportValue.height,
      lineCount: this.lineCount,
      charCount: this.charCount,
      cursor: this.cursor,
      writeMode: this.writeModeValue,
      activeColor: this.activeColorValue,
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
    };
  }

  /** Copy of the displayed lines */
  getLines(): NoteLines {
    return cloneLines(this.lines);
  }

  /** Displayed lines as cells for the rendering layer */
  renderLines(): RenderedCell[][] {
    return this.lines.map((line) =>
      line.map((c) => ({ char: String.fromCharCode(c.char), color: c.color })),
    );
  }

  /** Displayed note as plain text, lines joined by `\n` */
  getText(): string {
    return this.lines.map(lineToText).join('\n');
  }

  // ========== Persistence ==========

  /** Encode the full note. Truncated display lines are never written. */
  serialize(): Uint8Array {
    return encodeNote(this.fullLines ?? this.lines);
  }

  /** The note was written out. Typing after this starts a new undo step. */
  markSaved(): void {
    this.unsaved = false;
    this.history.closeStep();
  }

  /**
   * Fit the full note to a new viewport. A truncated note becomes editable
   * once it fits; an editable note that no longer fits becomes viewable.
   *
   * @returns The mode after the resize
   * @throws RangeError for a non-finite or non-positive size; the previous viewport is kept
   */
  resize(viewport: Viewport): EditorMode {
    const content = this.fullLines ?? this.lines;
    this.viewportValue = normalizeViewport(viewport);
    this.applyFit(content);
    return this.modeValue;
  }

  // ========== Modes ==========

  setWriteMode(mode: WriteMode): void {
    this.writeModeValue = mode;
  }

  toggleWriteMode(): WriteMode {
    this.writeModeValue = this.writeModeValue === 'insert' ? 'overwrite' : 'insert';
    return this.writeModeValue;
  }

  setActiveColor(selection: ActiveColorSelection): void {
    this.activeColorValue = selection;
  }

  /** Turn a selection color on (clearing any other) or, if it is on, off. */
  toggleColor(selection: ColorSelection): ActiveColorSelection {
    this.activeColorValue = this.activeColorValue === selection ? 'none' : selection;
    return this.activeColorValue;
  }

  // ========== Character Editing ==========

  /**
   * Type one character at the cursor. Non-ASCII input is folded to ASCII,
   * `\n` splits the line and `\t` inserts a tab; other control codes are ignored.
   */
  insertChar(input: string): boolean {
    if (!this.canEdit() || input.length === 0) return false;

    const code = foldToAscii(input);
    if (code === NEWLINE_CODE) return this.insertLine();
    if (code === TAB_CODE) return this.insertTab();
    if (code < SPACE_CODE || code === DELETE_CODE) return false;
    if (!this.canPlaceChar()) return false;

    this.mutate('char', () => this.placeChar(code));
    return true;
  }

  /** Insert `tabSize` spaces as a single edit, only if all of them fit. */
  insertTab(): boolean {
    if (!this.canEdit()) return false;

    const line = this.currentLine();
    const { width } = this.viewportValue;
    const fitsAll = line.length + this.tabSize <= width;
    if (this.writeModeValue === 'insert' && !fitsAll) return false;
    if (this.writeModeValue === 'overwrite' && !fitsAll && this.cursorPos.column + this.tabSize > width) {
      return false;
    }

    this.mutate('char', () => {
      for (let i = 0; i < this.tabSize && this.canPlaceChar(); i++) {
        this.placeChar(SPACE_CODE);
      }
    });
    return true;
  }

  /** Backspace. At column 0 the line is merged into the previous one. */
  deleteCharBackward(): boolean {
    if (!this.canEdit()) return false;

    const { column } = this.cursorPos;
    if (column === 0) return this.mergeWithPrevious();

    this.mutate('char', () => {
      this.currentLine().splice(column - 1, 1);
      this.cursorPos.column--;
    });
    return true;
  }

  /** Delete key. At line end the next line is merged into this one. */
  deleteCharForward(): boolean {
    if (!this.canEdit()) return false;

    const { column } = this.cursorPos;
    if (column === this.currentLine().length) return this.mergeWithNext();

    this.mutate('char', () => {
      this.currentLine().splice(column, 1);
    });
    return true;
  }

  // ========== Word Editing ==========

  /** Delete back to the start of the previous word, or merge at column 0. */
  deleteWordBackward(): boolean {
    if (!this.canEdit()) return false;

    const { column } = this.cursorPos;
    if (column === 0) return this.mergeWithPrevious();

    const start = findPreviousWordStart(this.currentLine(), column);
    this.mutate('coarse', () => {
      this.currentLine().splice(start, column - start);
      this.cursorPos.column = start;
    });
    return true;
  }

  /** Delete through the next word and its trailing spaces, or merge at line end. */
  deleteWordForward(): boolean {
    if (!this.canEdit()) return false;

    const line = this.currentLine();
    const { column } = this.cursorPos;
    if (column === line.length) return this.mergeWithNext();

    const end = findNextWordEnd(line, column);
    this.mutate('coarse', () => {
      this.currentLine().splice(column, end - column);
    });
    return true;
  }

  // ========== Line Editing ==========

  /** Enter: split the line at the cursor. No-op at max height. */
  insertLine(): boolean {
    if (!this.canEdit()) return false;
    if (this.lines.length >= this.viewportValue.height) return false;

    this.mutate('coarse', () => {
      const { line, column } = this.cursorPos;
      const rest = this.lines[line].splice(column);
      this.lines.splice(line + 1, 0, rest);
      this.cursorPos = { line: line + 1, column: 0 };
    });
    return true;
  }

  /** Remove the current line. The only line is cleared instead. */
  deleteLine(): boolean {
    if (!this.canEdit()) return false;
    if (this.lines.length === 1 && this.lines[0].length === 0) return false;

    this.mutate('coarse', () => {
      if (this.lines.length === 1) {
        this.lines[0] = [];
      } else {
        this.lines.splice(this.cursorPos.line, 1);
        if (this.cursorPos.line === this.lines.length) {
          this.cursorPos.line--;
        }
      }
      this.cursorPos.column = 0;
    });
    return true;
  }

  moveLineUp(): boolean {
    if (!this.canEdit()) return false;
    const { line } = this.cursorPos;
    if (line === 0) return false;

    this.mutate('coarse', () => {
      this.swapLines(line, line - 1);
      this.cursorPos.line = line - 1;
    });
    return true;
  }

  moveLineDown(): boolean {
    if (!this.canEdit()) return false;
    const { line } = this.cursorPos;
    if (line === this.lines.length - 1) return false;

    this.mutate('coarse', () => {
      this.swapLines(line, line + 1);
      this.cursorPos.line = line + 1;
    });
    return true;
  }

  // ========== History ==========

  undo(): boolean {
    if (!this.canEdit()) return false;
    const previous = this.history.undo(this.snapshot());
    if (!previous) return false;
    this.restore(previous);
    return true;
  }

  redo(): boolean {
    if (!this.canEdit()) return false;
    const next = this.history.redo(this.snapshot());
    if (!next) return false;
    this.restore(next);
    return true;
  }

  // ========== Navigation ==========

  /** Up one line. No-op on the first line. */
  moveUp(): void {
    if (this.cursorPos.line === 0) return;
    this.cursorPos.line--;
    this.clampColumn();
  }

  /** Down one line. On the last line the cursor goes to the line end. */
  moveDown(): void {
    if (this.onLastLine()) {
      this.cursorPos.column = this.currentLine().length;
      return;
    }
    this.cursorPos.line++;
    this.clampColumn();
  }

  moveLeft(): void {
    if (this.cursorPos.column > 0) {
      this.cursorPos.column--;
    } else if (this.cursorPos.line > 0) {
      this.cursorPos.line--;
      this.cursorPos.column = this.currentLine().length;
    }
  }

  moveRight(): void {
    if (this.cursorPos.column < this.currentLine().length) {
      this.cursorPos.column++;
    } else if (!this.onLastLine()) {
      this.cursorPos = { line: this.cursorPos.line + 1, column: 0 };
    }
  }

  moveToLineStart(): void {
    this.cursorPos.column = 0;
  }

  moveToLineEnd(): void {
    this.cursorPos.column = this.currentLine().length;
  }

  moveToBufferStart(): void {
    this.cursorPos = { line: 0, column: 0 };
  }

  moveToBufferEnd(): void {
    const last = this.lines.length - 1;
    this.cursorPos = { line: last, column: this.lines[last].length };
  }

  /** Start of the previous word; wraps to the previous line end at column 0. */
  moveWordLeft(): void {
    if (this.cursorPos.column === 0) {
      this.moveLeft();
      return;
    }
    this.cursorPos.column = findPreviousWordStart(this.currentLine(), this.cursorPos.column);
  }

  /** Past the next word; wraps to the next line start at line end. */
  moveWordRight(): void {
    if (this.cursorPos.column === this.currentLine().length) {
      this.moveRight();
      return;
    }
    this.cursorPos.column = findNextWordEnd(this.currentLine(), this.cursorPos.column);
  }

  /** Jump to a 1-based line number, clamped to the note. A non-finite number is ignored. */
  goToLine(lineNumber: number): void {
    if (!Number.isFinite(lineNumber)) return;
    const target = Math.floor(lineNumber) - 1;
    this.cursorPos = {
      line: Math.min(Math.max(target, 0), this.lines.length - 1),
      column: 0,
    };
  }

  // ========== Internals ==========

  private canEdit(): boolean {
    return this.modeValue === 'editable';
  }

  private currentLine(): Line {
    return this.lines[this.cursorPos.line];
  }

  private onLastLine(): boolean {
    return this.cursorPos.line === this.lines.length - 1;
  }

  private lineIsFull(): boolean {
    return this.currentLine().length >= this.viewportValue.width;
  }

  private canPlaceChar(): boolean {
    if (!this.lineIsFull()) return true;
    // A full line only accepts overwrites inside it
    return this.writeModeValue === 'overwrite' && this.cursorPos.column < this.currentLine().length;
  }

  private placeChar(code: number): void {
    const line = this.currentLine();
    const c = coloredChar(code, this.selectionColor());
    const { column } = this.cursorPos;

    if (column === line.length) {
      line.push(c);
    } else if (this.writeModeValue === 'insert') {
      line.splice(column, 0, c);
    } else {
      line[column] = c;
    }
    this.cursorPos.column++;
  }

  private selectionColor(): ColorTag {
    return this.activeColorValue === 'none' ? 'none' : this.colors[this.activeColorValue];
  }

  private mergeWithPrevious(): boolean {
    const { line } = this.cursorPos;
    if (line === 0) return false;

    const previous = this.lines[line - 1];
    const current = this.lines[line];
    if (previous.length + current.length > this.viewportValue.width) return false;

    this.mutate('coarse', () => {
      const joinAt = this.lines[line - 1].length;
      this.lines[line - 1].push(...this.lines[line]);
      this.lines.splice(line, 1);
      this.cursorPos = { line: line - 1, column: joinAt };
    });
    return true;
  }

  private mergeWithNext(): boolean {
    const { line } = this.cursorPos;
    if (line === this.lines.length - 1) return false;

    const current = this.lines[line];
    const next = this.lines[line + 1];
    if (current.length + next.length > this.viewportValue.width) return false;

    this.mutate('coarse', () => {
      this.lines[line].push(...this.lines[line + 1]);
      this.lines.splice(line + 1, 1);
    });
    return true;
  }

  private swapLines(a: number, b: number): void {
    const temp = this.lines[a];
    this.lines[a] = this.lines[b];
    this.lines[b] = temp;
  }

  /** Record history for the edit, apply it, mark the note dirty. */
  private mutate(granularity: EditGranularity, apply: () => void): void {
    this.history.recordIfDue(() => this.snapshot(), granularity);
    apply();
    this.unsaved = true;
  }

  /** Live state; the history manager copies what it keeps. */
  private snapshot(): HistorySnapshot {
    return { lines: this.lines, cursor: this.cursorPos };
  }

  private restore(snapshot: HistorySnapshot): void {
    // A snapshot taken under a larger viewport may no longer fit
    this.applyFit(snapshot.lines);
    this.cursorPos = { ...snapshot.cursor };
    this.clampCursor();
    this.unsaved = true;
  }

  private applyFit(content: readonly Line[]): void {
    const result = fitToViewport(content, this.viewportValue);
    this.lines = result.lines;
    this.fullLines = result.truncated ? cloneLines(content) : null;
    this.modeValue = result.mode;
    this.clampCursor();
  }

  private clampColumn(): void {
    this.cursorPos.column = Math.min(this.cursorPos.column, this.currentLine().length);
  }

  private clampCursor(): void {
    const line = Math.min(Math.max(this.cursorPos.line, 0), this.lines.length - 1);
    const column = Math.min(Math.max(this.cursorPos.column, 0), this.lines[line].length);
    this.cursorPos = { line, column };
  }
}

function normalizeViewport(viewport: Viewport): Viewport {
  const width = Math.floor(viewport.width);
  const height = Math.floor(viewport.height);
  if (!Number.isFinite(width) || !Number.isFinite(height) || width < 1 || height < 1) {
    throw new RangeError(`Invalid viewport ${viewport.width}x${viewport.height}`);
  }
  return { width, height };
}
