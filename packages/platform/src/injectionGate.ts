import type { InputInjectorAdapter, KeystrokeHandler } from './types';

export const DEFAULT_ECHO_SETTLE_MS = 80;

/**
 * Tracks the adapter's own synthetic input. Key events the hook reports while an
 * injection runs, or within `settleMs` after it, are that injection's echo.
 */
export interface InjectionGate {
  run<T>(task: () => Promise<T>): Promise<T>;
  isInjecting(): boolean;
  /** Wraps a hook handler so echoed keys pass through without reaching it. */
  guard(handler: KeystrokeHandler): KeystrokeHandler;
}

export const createInjectionGate = (settleMs = DEFAULT_ECHO_SETTLE_MS): InjectionGate => {
  let pending = 0;

  const isInjecting = () => pending > 0;

  return {
    async run(task) {
      pending += 1;
      try {
        return await task();
      } finally {
        setTimeout(() => {
          pending -= 1;
        }, settleMs);
      }
    },
    isInjecting,
    guard: (handler) => (keystroke) => (isInjecting() ? 'passThrough' : handler(keystroke)),
  };
};

export const gateInjector = (
  injector: InputInjectorAdapter,
  gate: InjectionGate
): InputInjectorAdapter => ({
  deleteCharacters: (count) => gate.run(() => injector.deleteCharacters(count)),
  typeText: (text) => gate.run(() => injector.typeText(text)),
  paste: (text) => gate.run(() => injector.paste(text)),
});
