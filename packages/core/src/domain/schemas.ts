import { z } from 'zod';
import { DEFAULT_MODEL } from '../answers/models';
import { DEFAULT_MENTION_MARKER } from '../command/engine';
import { DEFAULT_TRIGGERS, TriggerSchema } from '../command/triggers';
import { DEFAULT_INSERT_SETTLE_DELAY_MS } from '../session/controller';

export const SCHEMA_VERSION = 1;

export const SettingsSchema = z.object({
  activeTrigger: TriggerSchema.default(DEFAULT_TRIGGERS[0]),
  supportedTriggers: z.array(TriggerSchema).min(1).default([...DEFAULT_TRIGGERS]),
  mentionMarker: z
    .string()
    .min(1)
    .regex(/^\S+$/, 'Mention marker cannot contain whitespace')
    .transform((value) => value.toLowerCase())
    .default(DEFAULT_MENTION_MARKER),
  model: z.string().min(1).default(DEFAULT_MODEL),
  ollamaBaseUrl: z.string().url().default('http://127.0.0.1:11434'),
  temperature: z.number().min(0).max(1).default(0.2),
  topP: z.number().min(0).max(1).default(0.9),
  maxTokens: z.number().int().min(32).max(8192).default(256),
  responseAction: z.enum(['insert', 'clipboard', 'preview']).default('insert'),
  insertSettleDelayMs: z.number().int().min(0).default(DEFAULT_INSERT_SETTLE_DELAY_MS),
  keyboardLayout: z.enum(['us']).default('us'),
  firstRunCompleted: z.boolean().default(false),
});
export type Settings = z.infer<typeof SettingsSchema>;

export const PersistedStateSchema = z.object({
  settings: SettingsSchema.default({}),
});
export type PersistedState = z.infer<typeof PersistedStateSchema>;

export const DomainEnvelopeSchema = z.object({
  version: z.literal(SCHEMA_VERSION),
  payload: z.unknown(),
});
export type DomainEnvelope = z.infer<typeof DomainEnvelopeSchema>;

/** Falls back to the first supported trigger when the stored one is no longer offered. */
export const reconcileSettings = (settings: Settings): Settings => {
  if (settings.supportedTriggers.includes(settings.activeTrigger)) return settings;
  return SettingsSchema.parse({ ...settings, activeTrigger: settings.supportedTriggers[0] });
};
