import { SCHEMA_VERSION } from './schemas';

export type Migration<T> = (input: unknown) => T;

const LEGACY_SETTINGS_KEYS: Record<string, string> = {
  currentTrigger: 'activeTrigger',
  selectedModel: 'model',
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  Boolean(value) && typeof value === 'object' && !Array.isArray(value);

/** Version 0 files stored flat preference keys at the top of the payload. */
const migrateFromV0 = (payload: unknown) => {
  if (!isRecord(payload)) return { settings: {} };
  const settings: Record<string, unknown> = {};
  Object.entries(payload).forEach(([key, value]) => {
    settings[LEGACY_SETTINGS_KEYS[key] ?? key] = value;
  });
  return { settings };
};

export const migrateToCurrent = <T>(
  input: { version?: number; payload?: unknown },
  parser: Migration<T>
) => {
  const version = input.version ?? 0;
  if (version > SCHEMA_VERSION) {
    throw new Error(`Unsupported schema version: ${version}`);
  }
  if (version === SCHEMA_VERSION) {
    return parser(input.payload);
  }
  return parser(migrateFromV0(input.payload));
};
