/**
 * @fileoverview Editor settings validation and resolution to an engine config.
 *
 * Settings arrive as a plain object (however the caller stores them) and are
 * validated here. Missing keys fall back to the defaults the editor has
 * always shipped with.
 *
 * @module settings
 */

import { z } from 'zod';
import { resolveColorName } from './color-tag.js';
import {
  DEFAULT_HISTORY_CAPACITY,
  DEFAULT_SNAPSHOT_INTERVAL,
  DEFAULT_TAB_SIZE,
  MAX_HISTORY_CAPACITY,
  MAX_SNAPSHOT_INTERVAL,
  MAX_TAB_SIZE,
} from './config/editor-limits.js';
import type { EngineConfig, Viewport } from './types.js';

/** A color given by palette name ("blue") or palette byte (12 or "12") */
const ColorSettingSchema = z.union([z.string().min(1).max(32), z.number().int().min(0).max(255)]);

export const EditorSettingsSchema = z.object({
  writeMode: z.enum(['insert', 'overwrite']).default('insert'),
  primaryColor: ColorSettingSchema.default('blue'),
  secondaryColor: ColorSettingSchema.default('green'),
  tertiaryColor: ColorSettingSchema.default('red'),
  tabSize: z.number().int().min(1).max(MAX_TAB_SIZE).default(DEFAULT_TAB_SIZE),
  historyCapacity: z.number().int().min(1).max(MAX_HISTORY_CAPACITY).default(DEFAULT_HISTORY_CAPACITY),
  snapshotInterval: z.number().int().min(1).max(MAX_SNAPSHOT_INTERVAL).default(DEFAULT_SNAPSHOT_INTERVAL),
});

/** Settings as the caller supplies them (every key optional) */
export type EditorSettingsInput = z.input<typeof EditorSettingsSchema>;

/** Settings after defaults are applied */
export type EditorSettings = z.output<typeof EditorSettingsSchema>;

export const ViewportSchema = z.object({
  width: z.number().int().min(1),
  height: z.number().int().min(1),
});

/**
 * Validate settings and a viewport and build the engine configuration.
 *
 * @throws ZodError when a setting or the viewport is out of range
 * @throws NoteFormatError with code `InvalidColorTag` for an unknown color
 */
export function resolveEngineConfig(settings: unknown, viewport: Viewport): EngineConfig {
  const parsed = EditorSettingsSchema.parse(settings ?? {});
  const size = ViewportSchema.parse(viewport);

  return {
    viewport: size,
    writeMode: parsed.writeMode,
    colors: {
      primary: resolveColorName(parsed.primaryColor),
      secondary: resolveColorName(parsed.secondaryColor),
      tertiary: resolveColorName(parsed.tertiaryColor),
    },
    tabSize: parsed.tabSize,
    historyCapacity: parsed.historyCapacity,
    snapshotInterval: parsed.snapshotInterval,
  };
}
