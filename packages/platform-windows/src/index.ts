import type { PlatformAdapter } from '@keyprompt/platform';

const notImplemented = async (): Promise<never> => {
  throw new Error('Not Implemented');
};

export const windowsAdapter: PlatformAdapter = {
  keyboard: {
    // TODO: implement with a low-level keyboard hook so consumed keys can be suppressed
    start: notImplemented,
  },
  injector: {
    deleteCharacters: notImplemented,
    typeText: notImplemented,
    paste: notImplemented,
  },
  clipboard: {
    set: notImplemented,
    get: notImplemented,
  },
  permissions: {
    check: notImplemented,
    requestGuidance: notImplemented,
    openSettings: notImplemented,
  },
};
