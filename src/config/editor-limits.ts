/**
 * @fileoverview Centralized limits and constants for the note editor.
 *
 * The viewport defaults match a plain 80x24 terminal once the editor panel
 * border (2 rows) is taken off. Real callers pass their own viewport.
 *
 * @module config/editor-limits
 */

// ============================================================================
// Note Format
// ============================================================================

/** Highest character code a note may store (7-bit ASCII) */
export const MAX_CHAR_CODE = 127;

/** Character code that separates lines in the persisted format */
export const NEWLINE_CODE = 0x0a;

/** Byte stored after a line separator */
export const NEWLINE_COLOR_BYTE = 0;

/** Bytes per stored character (char + color) */
export const BYTES_PER_CHAR = 2;

// ============================================================================
// Truncation
// ============================================================================

/** Suffix appended to lines cut to fit the viewport width */
export const LINE_ELLIPSIS = ' ...';

/** Replaces the last visible line when a note has more lines than fit */
export const OVERFLOW_MARKER = '...';

// ============================================================================
// Editing Defaults
// ============================================================================

/** Spaces inserted by a tab */
export const DEFAULT_TAB_SIZE = 4;

/** Maximum undo snapshots kept per note */
export const DEFAULT_HISTORY_CAPACITY = 10;

/** Typed characters grouped into one undo step */
export const DEFAULT_SNAPSHOT_INTERVAL = 10;

/** Default viewport width in cells */
export const DEFAULT_VIEWPORT_WIDTH = 80;

/** Default viewport height in cells */
export const DEFAULT_VIEWPORT_HEIGHT = 22;

// ============================================================================
// Settings Bounds
// ============================================================================

export const MAX_TAB_SIZE = 16;

export const MAX_HISTORY_CAPACITY = 1000;

export const MAX_SNAPSHOT_INTERVAL = 1000;

/** Longest accepted note identifier */
export const MAX_NOTE_ID_LENGTH = 200;
