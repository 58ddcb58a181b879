/**
 * @fileoverview Tests for editor settings validation and engine config resolution
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { EditorSettingsSchema, resolveEngineConfig } from '../src/settings.js';
import { NoteFormatError } from '../src/errors.js';

const VIEWPORT = { width: 40, height: 10 };

describe('EditorSettingsSchema', () => {
  it('should fill every default', () => {
    expect(EditorSettingsSchema.parse({})).toEqual({
      writeMode: 'insert',
      primaryColor: 'blue',
      secondaryColor: 'green',
      tertiaryColor: 'red',
      tabSize: 4,
      historyCapacity: 10,
      snapshotInterval: 10,
    });
  });

  it('should reject out-of-range numbers', () => {
    expect(EditorSettingsSchema.safeParse({ tabSize: 0 }).success).toBe(false);
    expect(EditorSettingsSchema.safeParse({ tabSize: 17 }).success).toBe(false);
    expect(EditorSettingsSchema.safeParse({ historyCapacity: 2.5 }).success).toBe(false);
    expect(EditorSettingsSchema.safeParse({ snapshotInterval: 0 }).success).toBe(false);
  });

  it('should reject an unknown write mode', () => {
    expect(EditorSettingsSchema.safeParse({ writeMode: 'replace' }).success).toBe(false);
  });
});

describe('resolveEngineConfig', () => {
  it('should build the default config from no settings', () => {
    expect(resolveEngineConfig(undefined, VIEWPORT)).toEqual({
      viewport: { width: 40, height: 10 },
      writeMode: 'insert',
      colors: { primary: 'blue', secondary: 'green', tertiary: 'red' },
      tabSize: 4,
      historyCapacity: 10,
      snapshotInterval: 10,
    });
  });

  it('should resolve colors given by name or by byte', () => {
    const config = resolveEngineConfig(
      { primaryColor: 'Aqua', secondaryColor: 5, tertiaryColor: '13' },
      VIEWPORT,
    );

    expect(config.colors).toEqual({ primary: 'aqua', secondary: 'purple', tertiary: 'fuchsia' });
  });

  it('should carry the remaining settings through', () => {
    const config = resolveEngineConfig(
      { writeMode: 'overwrite', tabSize: 2, historyCapacity: 50, snapshotInterval: 1 },
      VIEWPORT,
    );

    expect(config.writeMode).toBe('overwrite');
    expect(config.tabSize).toBe(2);
    expect(config.historyCapacity).toBe(50);
    expect(config.snapshotInterval).toBe(1);
  });

  it('should reject an unknown color name', () => {
    expect(() => resolveEngineConfig({ primaryColor: 'chartreuse' }, VIEWPORT)).toThrow(NoteFormatError);
  });

  it('should reject a color byte outside the palette', () => {
    expect(() => resolveEngineConfig({ primaryColor: 16 }, VIEWPORT)).toThrow(NoteFormatError);
  });

  it('should reject invalid settings and viewports', () => {
    expect(() => resolveEngineConfig({ tabSize: 'wide' }, VIEWPORT)).toThrow(ZodError);
    expect(() => resolveEngineConfig({}, { width: 0, height: 10 })).toThrow(ZodError);
  });
});
