import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { SettingsSchema } from '@keyprompt/core';
import { log } from '../../../apps/agent/src/main/logger';
import {
  createFileSettingsRepository,
  loadState,
  resolveDataDir,
  saveState,
  stateFilePath,
} from '../../../apps/agent/src/main/store';
import {
  exportDiagnostics,
  loadRecentErrors,
  recordError,
} from '../../../apps/agent/src/main/diagnostics';

let dataDir = '';

beforeEach(() => {
  log.transports.file.level = false;
  log.transports.console.level = false;
  dataDir = mkdtempSync(join(tmpdir(), 'keyprompt-'));
});

afterEach(() => {
  vi.restoreAllMocks();
  rmSync(dataDir, { recursive: true, force: true });
});

describe('state store', () => {
  it('resolves the data directory from the environment', () => {
    expect(resolveDataDir({ KEYPROMPT_HOME: '/srv/keyprompt' })).toBe('/srv/keyprompt');
    expect(resolveDataDir({})).toBe(join(homedir(), '.keyprompt'));
  });

  it('returns defaults when nothing is stored', () => {
    expect(loadState(dataDir).settings).toEqual(SettingsSchema.parse({}));
  });

  it('saves a versioned envelope and reads it back', () => {
    const settings = SettingsSchema.parse({ activeTrigger: '/ai ', model: 'phi3:mini' });
    saveState(dataDir, { settings });

    const envelope = JSON.parse(readFileSync(stateFilePath(dataDir), 'utf-8'));
    expect(envelope.version).toBe(1);
    expect(envelope.payload.settings.activeTrigger).toBe('/ai ');
    expect(loadState(dataDir).settings).toEqual(settings);
  });

  it('migrates legacy flat preferences', () => {
    writeFileSync(
      stateFilePath(dataDir),
      JSON.stringify({ payload: { currentTrigger: '/ask ', selectedModel: 'phi3:mini' } })
    );

    expect(loadState(dataDir).settings).toMatchObject({ activeTrigger: '/ask ', model: 'phi3:mini' });
  });

  it('falls back to defaults for a corrupted file', () => {
    const error = vi.spyOn(log, 'error');
    writeFileSync(stateFilePath(dataDir), '{ not json');

    expect(loadState(dataDir).settings).toEqual(SettingsSchema.parse({}));
    expect(error).toHaveBeenCalled();
  });

  it('reconciles an active trigger that is no longer supported', () => {
    writeFileSync(
      stateFilePath(dataDir),
      JSON.stringify({
        version: 1,
        payload: { settings: { activeTrigger: '/gone ', supportedTriggers: ['/ai '] } },
      })
    );

    expect(loadState(dataDir).settings.activeTrigger).toBe('/ai ');
  });

  it('backs the settings repository', async () => {
    const repository = createFileSettingsRepository(dataDir);
    const settings = SettingsSchema.parse({ responseAction: 'clipboard' });

    await expect(repository.get()).resolves.toEqual(SettingsSchema.parse({}));

    await repository.set(settings);

    await expect(repository.get()).resolves.toEqual(settings);
    expect(JSON.parse(readFileSync(stateFilePath(dataDir), 'utf-8'))).toEqual({
      version: 1,
      payload: { settings },
    });
  });
});

describe('diagnostics', () => {
  it('records redacted errors newest first', () => {
    recordError(dataDir, new Error('Bearer abc.def rejected'));
    recordError(dataDir, 'request failed: token=test-secret');

    expect(loadRecentErrors(dataDir).map((entry) => entry.message)).toEqual([
      'request failed: token=REDACTED',
      'Bearer REDACTED rejected',
    ]);
  });

  it('keeps the fifty most recent errors', () => {
    for (let index = 0; index < 55; index += 1) {
      recordError(dataDir, new Error(`error ${index}`));
    }

    const errors = loadRecentErrors(dataDir);
    expect(errors).toHaveLength(50);
    expect(errors[0].message).toBe('error 54');
    expect(errors[49].message).toBe('error 5');
  });

  it('ignores an unreadable error file', () => {
    writeFileSync(join(dataDir, 'recent-errors.json'), JSON.stringify({ not: 'a list' }));
    expect(loadRecentErrors(dataDir)).toEqual([]);
  });

  it('exports a diagnostics archive', async () => {
    saveState(dataDir, { settings: SettingsSchema.parse({}) });
    recordError(dataDir, new Error('boom'));

    const { filePath } = await exportDiagnostics(dataDir);

    expect(filePath.startsWith(join(dataDir, 'diagnostics'))).toBe(true);
    expect(existsSync(filePath)).toBe(true);
    expect(statSync(filePath).size).toBeGreaterThan(0);
  });
});
