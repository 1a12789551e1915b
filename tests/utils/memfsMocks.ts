/**
 * fs-extra stand-ins backed by memfs.
 *
 * fs-extra is loaded from node_modules and keeps using the real disk even
 * when `fs` is mocked, so tests replace the functions the code calls.
 */

import { vol } from 'memfs';

export const memfsExtra = {
  ensureDir: async (dir: string): Promise<void> => {
    vol.mkdirSync(dir, { recursive: true });
  },
  ensureDirSync: (dir: string): void => {
    vol.mkdirSync(dir, { recursive: true });
  },
};
