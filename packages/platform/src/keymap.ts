import { readFileSync } from 'fs';
import { z } from 'zod';
import type { KeyboardHookEvent, Keystroke, KeystrokeModifiers } from './types';

export const KeyboardLayoutSchema = z.object({
  name: z.string(),
  controls: z.record(z.enum(['enter', 'backspace', 'escape', 'tab'])),
  keys: z.record(z.tuple([z.string(), z.string()])),
});
export type KeyboardLayout = z.infer<typeof KeyboardLayoutSchema>;

export interface LayoutState {
  capsLock: boolean;
}

export interface KeyResolver {
  resolveCharacter(
    keycode: number,
    modifiers: KeystrokeModifiers,
    layoutState: LayoutState
  ): string | null;
  toKeystroke(event: KeyboardHookEvent, layoutState: LayoutState): Keystroke;
}

export const loadKeyboardLayout = (name: string): KeyboardLayout => {
  if (!/^[a-z0-9-]+$/.test(name)) {
    throw new Error(`Invalid keyboard layout name: ${name}`);
  }
  const raw = readFileSync(new URL(`./keymaps/${name}.json`, import.meta.url), 'utf-8');
  return KeyboardLayoutSchema.parse(JSON.parse(raw));
};

const isLetter = (value: string) => value.toLowerCase() !== value.toUpperCase();

/**
 * Builds a resolver from a layout keyed by key names and the hook's own
 * name-to-keycode table. Key names missing from the table are skipped.
 */
export const createKeyResolver = (
  layout: KeyboardLayout,
  keycodes: Record<string, number>
): KeyResolver => {
  const characters = new Map<number, [string, string]>();
  const controls = new Map<number, Keystroke['key']>();
  Object.entries(layout.keys).forEach(([name, pair]) => {
    const code = keycodes[name];
    if (code !== undefined) characters.set(code, pair);
  });
  Object.entries(layout.controls).forEach(([name, key]) => {
    const code = keycodes[name];
    if (code !== undefined) controls.set(code, key);
  });

  const resolveCharacter: KeyResolver['resolveCharacter'] = (keycode, modifiers, layoutState) => {
    // Chords are shortcuts, not text.
    if (modifiers.control || modifiers.meta || modifiers.alt) return null;
    const pair = characters.get(keycode);
    if (!pair) return null;
    const [base, shifted] = pair;
    const upper = isLetter(base) && layoutState.capsLock ? !modifiers.shift : modifiers.shift;
    return upper ? shifted : base;
  };

  return {
    resolveCharacter,
    toKeystroke: (event, layoutState) => {
      const modifiers: KeystrokeModifiers = {
        shift: event.shiftKey,
        control: event.ctrlKey,
        alt: event.altKey,
        meta: event.metaKey,
      };
      return {
        character: resolveCharacter(event.keycode, modifiers, layoutState),
        key: controls.get(event.keycode) ?? 'other',
        modifiers,
      };
    },
  };
};
