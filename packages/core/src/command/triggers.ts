import { z } from 'zod';

export const DEFAULT_TRIGGERS = ['/craig ', '/ask ', '/ai '] as const;

const endsWithSingleDelimiter = (value: string) => /\S $/.test(value);

export const TriggerSchema = z
  .string()
  .min(2)
  .transform((value) => value.toLowerCase())
  .refine(endsWithSingleDelimiter, {
    message: 'Trigger must end with exactly one trailing space',
  });
export type Trigger = z.infer<typeof TriggerSchema>;

export const triggerLabel = (trigger: string) => trigger.slice(0, -1);

export type TriggerChangeListener = (next: string, previous: string) => void;

export interface TriggerRegistry {
  getActive(): string;
  getLabel(): string;
  getSupported(): readonly string[];
  setActive(trigger: string): void;
  subscribe(listener: TriggerChangeListener): () => void;
}

export interface TriggerRegistryOptions {
  supported?: readonly string[];
  active?: string;
}

export const createTriggerRegistry = (options: TriggerRegistryOptions = {}): TriggerRegistry => {
  const supported = (options.supported ?? DEFAULT_TRIGGERS).map((trigger) =>
    TriggerSchema.parse(trigger)
  );
  if (!supported.length) {
    throw new Error('At least one trigger must be supported');
  }
  const listeners = new Set<TriggerChangeListener>();

  const resolve = (trigger: string) => {
    const lower = trigger.toLowerCase();
    if (!supported.includes(lower)) {
      throw new Error(`Unsupported trigger: ${JSON.stringify(trigger)}`);
    }
    return lower;
  };

  let active = options.active === undefined ? supported[0] : resolve(options.active);

  return {
    getActive: () => active,
    getLabel: () => triggerLabel(active),
    getSupported: () => supported,
    setActive: (trigger) => {
      const previous = active;
      active = resolve(trigger);
      // Synchronous: engine state is reset before setActive returns.
      listeners.forEach((listener) => listener(active, previous));
    },
    subscribe: (listener) => {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };
};
