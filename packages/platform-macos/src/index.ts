import { createRequire } from 'module';
import { execFile, spawn } from 'child_process';
import {
  createInjectionGate,
  createKeyResolver,
  gateInjector,
  loadKeyboardLayout,
  type InputInjectorAdapter,
  type KeyboardHookEvent,
  type LayoutState,
  type PlatformAdapter,
} from '@keyprompt/platform';

const require = createRequire(import.meta.url);

const OSASCRIPT_BIN = '/usr/bin/osascript';
const ACCESSIBILITY_SETTINGS_URL =
  'x-apple.systempreferences:com.apple.preference.security?Privacy_Accessibility';
const DELETE_KEY_CODE = 51;

type IOHook = {
  on(event: 'keydown', callback: (event: KeyboardHookEvent) => void): void;
  removeListener(event: 'keydown', callback: (event: KeyboardHookEvent) => void): void;
  start(): void;
  stop(): void;
};

type UiohookModule = {
  uIOhook: IOHook;
  UiohookKey: Record<string, number>;
};

let uiohookModule: UiohookModule | null = null;

const loadUiohook = (): UiohookModule => {
  if (uiohookModule) return uiohookModule;
  let loaded: UiohookModule;
  try {
    loaded = require('uiohook-napi') as UiohookModule;
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new Error(
      `uiohook-napi failed to load. Rebuild it for this Node.js version (npm rebuild uiohook-napi). ${details}`
    );
  }
  uiohookModule = loaded;
  return loaded;
};

let hookRunning = false;

const injectionGate = createInjectionGate();

const run = (file: string, args: string[]) =>
  new Promise<string>((resolve, reject) => {
    execFile(file, args, { encoding: 'utf8' }, (error, stdout, stderr) => {
      if (error) {
        const message = stderr?.trim() || error.message;
        reject(new Error(message));
        return;
      }
      resolve((stdout ?? '').trim());
    });
  });

const runOsascript = (script: string) => run(OSASCRIPT_BIN, ['-e', script]);

export const escapeAppleScriptString = (value: string) =>
  value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');

const writeClipboard = (text: string) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn('/usr/bin/pbcopy');
    child.on('error', reject);
    child.on('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        reject(new Error(`pbcopy exited with code ${code}`));
      }
    });
    child.stdin.end(text);
  });

const osascriptInjector: InputInjectorAdapter = {
  async deleteCharacters(count) {
    if (count <= 0) return;
    await runOsascript(
      [
        'tell application "System Events"',
        `repeat ${count} times`,
        `key code ${DELETE_KEY_CODE}`,
        'end repeat',
        'end tell',
      ].join('\n')
    );
  },
  async typeText(text) {
    if (!text) return;
    await runOsascript(
      `tell application "System Events" to keystroke "${escapeAppleScriptString(text)}"`
    );
  },
  async paste(text) {
    await writeClipboard(text);
    await runOsascript('tell application "System Events" to keystroke "v" using {command down}');
  },
};

export const macosAdapter: PlatformAdapter = {
  keyboard: {
    async start(handler, options = {}) {
      if (hookRunning) {
        throw new Error('Keyboard hook is already running');
      }
      const { uIOhook, UiohookKey } = loadUiohook();
      const resolver = createKeyResolver(loadKeyboardLayout(options.layout ?? 'us'), UiohookKey);
      const layoutState: LayoutState = { capsLock: false };
      const guarded = injectionGate.guard(handler);
      const listener = (event: KeyboardHookEvent) => {
        if (event.keycode === UiohookKey.CapsLock) {
          layoutState.capsLock = !layoutState.capsLock;
          return;
        }
        // uiohook only observes; the verdict cannot hold the key back from the focused app.
        guarded(resolver.toKeystroke(event, layoutState));
      };
      uIOhook.on('keydown', listener);
      uIOhook.start();
      hookRunning = true;
      return {
        suppressesEvents: false,
        async stop() {
          if (!hookRunning) return;
          uIOhook.removeListener('keydown', listener);
          uIOhook.stop();
          hookRunning = false;
        },
      };
    },
  },
  injector: gateInjector(osascriptInjector, injectionGate),
  clipboard: {
    set: writeClipboard,
    async get() {
      return run('/usr/bin/pbpaste', []);
    },
  },
  permissions: {
    async check() {
      try {
        const enabled = await runOsascript(
          'tell application "System Events" to get UI elements enabled'
        );
        return { accessibility: enabled === 'true' ? 'granted' : 'denied' };
      } catch {
        return { accessibility: 'prompt' };
      }
    },
    async requestGuidance() {
      return [
        'keyprompt needs Accessibility permission to watch keystrokes and insert answers.',
        '1. Open System Settings',
        '2. Go to Privacy & Security > Accessibility',
        '3. Enable the terminal or Node.js process running keyprompt',
        '4. Restart keyprompt',
      ].join('\n');
    },
    async openSettings() {
      await run('/usr/bin/open', [ACCESSIBILITY_SETTINGS_URL]);
    },
  },
};
