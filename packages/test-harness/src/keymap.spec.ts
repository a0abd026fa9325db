import { describe, expect, it } from 'vitest';
import { createKeyResolver, loadKeyboardLayout, type KeyboardHookEvent } from '@keyprompt/platform';

const keycodes: Record<string, number> = {
  A: 30,
  1: 2,
  Quote: 40,
  Space: 57,
  Enter: 28,
  Backspace: 14,
  Tab: 15,
  Escape: 1,
};

const event = (keycode: number, overrides: Partial<KeyboardHookEvent> = {}): KeyboardHookEvent => ({
  keycode,
  shiftKey: false,
  ctrlKey: false,
  altKey: false,
  metaKey: false,
  ...overrides,
});

const resolver = createKeyResolver(loadKeyboardLayout('us'), keycodes);
const capsOff = { capsLock: false };
const capsOn = { capsLock: true };

describe('keyboard layout resolver', () => {
  it('maps printable keys with and without shift', () => {
    expect(resolver.toKeystroke(event(30), capsOff).character).toBe('a');
    expect(resolver.toKeystroke(event(30, { shiftKey: true }), capsOff).character).toBe('A');
    expect(resolver.toKeystroke(event(2, { shiftKey: true }), capsOff).character).toBe('!');
    expect(resolver.toKeystroke(event(40, { shiftKey: true }), capsOff).character).toBe('"');
    expect(resolver.toKeystroke(event(57), capsOff)).toEqual({
      character: ' ',
      key: 'other',
      modifiers: { shift: false, control: false, alt: false, meta: false },
    });
  });

  it('applies caps lock to letters only', () => {
    expect(resolver.toKeystroke(event(30), capsOn).character).toBe('A');
    expect(resolver.toKeystroke(event(30, { shiftKey: true }), capsOn).character).toBe('a');
    expect(resolver.toKeystroke(event(2), capsOn).character).toBe('1');
  });

  it('maps control keys without a character', () => {
    expect(resolver.toKeystroke(event(28), capsOff)).toMatchObject({ character: null, key: 'enter' });
    expect(resolver.toKeystroke(event(14), capsOff)).toMatchObject({
      character: null,
      key: 'backspace',
    });
    expect(resolver.toKeystroke(event(15), capsOff).key).toBe('tab');
    expect(resolver.toKeystroke(event(1), capsOff).key).toBe('escape');
  });

  it('treats chords and unknown keys as non-printable', () => {
    expect(resolver.toKeystroke(event(30, { metaKey: true }), capsOff).character).toBeNull();
    expect(resolver.toKeystroke(event(30, { ctrlKey: true }), capsOff).character).toBeNull();
    expect(resolver.toKeystroke(event(999), capsOff)).toMatchObject({ character: null, key: 'other' });
  });

  it('refuses layout names that are not plain identifiers', () => {
    expect(() => loadKeyboardLayout('../secrets')).toThrow('Invalid keyboard layout name');
  });
});
