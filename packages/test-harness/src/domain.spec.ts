import { describe, expect, it } from 'vitest';
import {
  DEFAULT_MODEL,
  PersistedStateSchema,
  SCHEMA_VERSION,
  SettingsSchema,
  migrateToCurrent,
  reconcileSettings,
} from '@keyprompt/core';

const parseState = (payload: unknown) => PersistedStateSchema.parse(payload);

describe('settings schema', () => {
  it('fills defaults', () => {
    const settings = SettingsSchema.parse({});
    expect(settings).toMatchObject({
      activeTrigger: '/craig ',
      supportedTriggers: ['/craig ', '/ask ', '/ai '],
      mentionMarker: '@craig',
      model: DEFAULT_MODEL,
      ollamaBaseUrl: 'http://127.0.0.1:11434',
      temperature: 0.2,
      topP: 0.9,
      maxTokens: 256,
      responseAction: 'insert',
      insertSettleDelayMs: 450,
      keyboardLayout: 'us',
      firstRunCompleted: false,
    });
  });

  it('lowercases triggers and the mention marker', () => {
    const settings = SettingsSchema.parse({ activeTrigger: '/ASK ', mentionMarker: '@Bot' });
    expect(settings.activeTrigger).toBe('/ask ');
    expect(settings.mentionMarker).toBe('@bot');
  });

  it('rejects invalid values', () => {
    expect(SettingsSchema.safeParse({ mentionMarker: '@my bot' }).success).toBe(false);
    expect(SettingsSchema.safeParse({ activeTrigger: '/ask' }).success).toBe(false);
    expect(SettingsSchema.safeParse({ temperature: 2 }).success).toBe(false);
    expect(SettingsSchema.safeParse({ responseAction: 'speak' }).success).toBe(false);
  });

  it('falls back to the first supported trigger', () => {
    const settings = SettingsSchema.parse({
      activeTrigger: '/gone ',
      supportedTriggers: ['/ask ', '/ai '],
    });
    expect(reconcileSettings(settings).activeTrigger).toBe('/ask ');
  });
});

describe('state migrations', () => {
  it('parses current payloads as they are', () => {
    const state = migrateToCurrent(
      { version: SCHEMA_VERSION, payload: { settings: { model: 'phi3:mini' } } },
      parseState
    );
    expect(state.settings.model).toBe('phi3:mini');
    expect(state.settings.activeTrigger).toBe('/craig ');
  });

  it('renames flat legacy preference keys', () => {
    const state = migrateToCurrent(
      { payload: { currentTrigger: '/ask ', selectedModel: 'phi3:mini', temperature: 0.5 } },
      parseState
    );
    expect(state.settings).toMatchObject({
      activeTrigger: '/ask ',
      model: 'phi3:mini',
      temperature: 0.5,
    });
  });

  it('rejects files from a newer version', () => {
    expect(() => migrateToCurrent({ version: 2, payload: {} }, parseState)).toThrow(
      'Unsupported schema version: 2'
    );
  });
});
