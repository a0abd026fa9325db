export type KeystrokeKey = 'enter' | 'backspace' | 'escape' | 'tab' | 'other';

export interface KeystrokeModifiers {
  shift: boolean;
  control: boolean;
  alt: boolean;
  meta: boolean;
}

/** A key-down already translated through the active keyboard layout. */
export interface Keystroke {
  character: string | null;
  key: KeystrokeKey;
  modifiers: KeystrokeModifiers;
}

export interface KeyboardHookEvent {
  keycode: number;
  shiftKey: boolean;
  ctrlKey: boolean;
  altKey: boolean;
  metaKey: boolean;
}

export type HookVerdict = 'consume' | 'passThrough';

export type KeystrokeHandler = (keystroke: Keystroke) => HookVerdict;

export interface KeyboardHookHandle {
  /** False when the hook only observes events and cannot keep them from the focused app. */
  readonly suppressesEvents: boolean;
  stop(): Promise<void>;
}

export interface KeyboardHookOptions {
  layout?: string;
}

export interface KeyboardHookAdapter {
  start(handler: KeystrokeHandler, options?: KeyboardHookOptions): Promise<KeyboardHookHandle>;
}

export interface InputInjectorAdapter {
  deleteCharacters(count: number): Promise<void>;
  typeText(text: string): Promise<void>;
  paste(text: string): Promise<void>;
}

export interface ClipboardAdapter {
  set(text: string): Promise<void>;
  get(): Promise<string>;
}

export interface PermissionStatus {
  accessibility: 'granted' | 'denied' | 'prompt';
}

export interface PermissionsAdapter {
  check(): Promise<PermissionStatus>;
  requestGuidance(): Promise<string>;
  openSettings(): Promise<void>;
}

export interface PlatformAdapter {
  keyboard: KeyboardHookAdapter;
  injector: InputInjectorAdapter;
  clipboard: ClipboardAdapter;
  permissions: PermissionsAdapter;
}
