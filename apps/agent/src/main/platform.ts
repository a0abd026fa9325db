import type { PlatformAdapter } from '@keyprompt/platform';
import { macosAdapter } from '@keyprompt/platform-macos';
import { windowsAdapter } from '@keyprompt/platform-windows';

export const platformAdapter: PlatformAdapter =
  process.platform === 'darwin' ? macosAdapter : windowsAdapter;
