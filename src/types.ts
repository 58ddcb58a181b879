/**
 * @fileoverview Shared types for the bounded note editor.
 *
 * @module types
 */

import type { ColorTag } from './color-tag.js';
import {
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_SNAPSHOT_INTERVAL,
  DEFAULT_TAB_SIZE,
  DEFAULT_VIEWPORT_HEIGHT,
  DEFAULT_VIEWPORT_WIDTH,
} from './config/editor-limits.js';

/** One stored character: an ASCII code (0-127) plus its display color. */
export interface ColoredChar {
  readonly char: number;
  readonly color: ColorTag;
}

/** One row of the note. Never longer than the viewport width while editable. */
export type Line = ColoredChar[];

/** The whole note. Always holds at least one line. */
export type NoteLines = Line[];

export interface CursorPosition {
  line: number;
  /** May equal the line length ("after the last char") */
  column: number;
}

export interface Viewport {
  /** Width in character cells */
  width: number;
  /** Height in character cells */
  height: number;
}

export type WriteMode = 'insert' | 'overwrite';

/** Which selection color (if any) tags newly typed characters */
export type ActiveColorSelection = 'none' | 'primary' | 'secondary' | 'tertiary';

/** A selection that maps to a configured color */
export type ColorSelection = Exclude<ActiveColorSelection, 'none'>;

/**
 * `viewable` means the note did not fit the viewport and is shown truncated.
 * Typing stays disabled until a resize lets the full note fit again.
 */
export type EditorMode = 'editable' | 'viewable';

export interface SelectionColors {
  primary: ColorTag;
  secondary: ColorTag;
  tertiary: ColorTag;
}

export interface EngineConfig {
  viewport: Viewport;
  /** Write mode the editor starts in */
  writeMode: WriteMode;
  colors: SelectionColors;
  /** Spaces inserted by a tab */
  tabSize: number;
  /** Maximum number of undo snapshots kept */
  historyCapacity: number;
  /** Character-level edits grouped into one undo step */
  snapshotInterval: number;
}

export interface EditorStatus {
  unsavedChanges: boolean;
  typingDisabled: boolean;
  mode: EditorMode;
  /** The displayed note was cut to fit the viewport */
  truncated: boolean;
  /** The cursor's line is at max width */
  lineFull: boolean;
  /** The note is at max height */
  bufferFull: boolean;
  lineCount: number;
  charCount: number;
  cursor: CursorPosition;
  writeMode: WriteMode;
  activeColor: ActiveColorSelection;
  canUndo: boolean;
  canRedo: boolean;
}

/** A cell handed to the rendering layer */
export interface RenderedCell {
  char: string;
  color: ColorTag;
}

/**
 * Raw byte storage for notes, addressed by note identifier.
 */
export interface NoteStorage {
  /** Returns null when the note does not exist */
  read(noteId: string): Uint8Array | null;
  write(noteId: string, bytes: Uint8Array): void;
  exists(noteId: string): boolean;
  remove(noteId: string): boolean;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  viewport: { width: DEFAULT_VIEWPORT_WIDTH, height: DEFAULT_VIEWPORT_HEIGHT },
  writeMode: 'insert',
  colors: {
    primary: 'blue',
    secondary: 'green',
    tertiary: 'red',
  },
  tabSize: DEFAULT_TAB_SIZE,
  historyCapacity: DEFAULT_HISTORY_CAPACITY,
  snapshotInterval: DEFAULT_SNAPSHOT_INTERVAL,
};

/** Returns a fresh config so callers can modify it without touching the defaults. */
export function createEngineConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...DEFAULT_ENGINE_CONFIG,
    ...overrides,
    viewport: { ...DEFAULT_ENGINE_CONFIG.viewport, ...overrides.viewport },
    colors: { ...DEFAULT_ENGINE_CONFIG.colors, ...overrides.colors },
  };
}
