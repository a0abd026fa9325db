import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  PersistedStateSchema,
  SCHEMA_VERSION,
  migrateToCurrent,
  reconcileSettings,
  type DomainEnvelope,
  type PersistedState,
  type SettingsRepository,
} from '@keyprompt/core';
import { log } from './logger';

const StoredEnvelopeSchema = z.object({
  version: z.number().int().nonnegative().optional(),
  payload: z.unknown(),
});

export const resolveDataDir = (env: NodeJS.ProcessEnv = process.env) =>
  env.KEYPROMPT_HOME ?? join(homedir(), '.keyprompt');

const defaultState = (): PersistedState => PersistedStateSchema.parse({});

export const stateFilePath = (dataDir: string) => join(dataDir, 'state.json');

export const loadState = (dataDir: string): PersistedState => {
  const filePath = stateFilePath(dataDir);
  if (!existsSync(filePath)) return defaultState();
  try {
    const envelope = StoredEnvelopeSchema.parse(JSON.parse(readFileSync(filePath, 'utf-8')));
    const state = migrateToCurrent(envelope, (payload) => PersistedStateSchema.parse(payload));
    return { ...state, settings: reconcileSettings(state.settings) };
  } catch (error) {
    log.error('Failed to load persisted state, using defaults.', error);
    return defaultState();
  }
};

export const saveState = (dataDir: string, state: PersistedState) => {
  mkdirSync(dataDir, { recursive: true });
  const envelope: DomainEnvelope = {
    version: SCHEMA_VERSION,
    payload: state,
  };
  writeFileSync(stateFilePath(dataDir), JSON.stringify(envelope, null, 2), 'utf-8');
};

export const createFileSettingsRepository = (dataDir: string): SettingsRepository => ({
  async get() {
    return loadState(dataDir).settings;
  },
  async set(settings) {
    saveState(dataDir, { ...loadState(dataDir), settings });
  },
});
