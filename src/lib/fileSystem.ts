/**
 * Whole-file text access used by the CredentialsManager.
 *
 * `NodeFileSystem` writes with owner-only permissions, since the file holds
 * secret keys.
 */

import { readFile, writeFile, chmod } from 'fs/promises';
import { readFileSync, writeFileSync, chmodSync } from 'fs';
import { dirname } from 'path';
import { ensureDir, ensureDirSync } from 'fs-extra';
import { ConfigError } from '../errors.js';
import {
  nodeFileSystemOptionsSchema,
  type NodeFileSystemConfig,
  type NodeFileSystemOptions,
} from '../schemas/fileSystem.schema.js';
import { logger } from '../ui/index.js';

export interface FileSystem {
  /** Read the whole file as UTF-8 text */
  readText(path: string): Promise<string>;
  /** Create or truncate the file and write `content` */
  writeText(path: string, content: string): Promise<void>;
  readTextSync(path: string): string;
  writeTextSync(path: string, content: string): void;
}

// Only warn about Windows permissions once per process
let windowsPermissionWarningShown = false;

// chmod succeeds on Windows but only toggles the read-only bit
const warnIfWindows = (): void => {
  if (process.platform === 'win32' && !windowsPermissionWarningShown) {
    logger.warning(
      'On Windows, file permissions cannot be restricted to owner-only. ' +
        'Ensure your credentials file is in a location other users cannot read.'
    );
    windowsPermissionWarningShown = true;
  }
};

const traceChmodFailure = (path: string, error: unknown): void => {
  const message = error instanceof Error ? error.message : String(error);
  logger.debug(`Could not set permissions on ${path}: ${message}`);
};

export class NodeFileSystem implements FileSystem {
  readonly config: NodeFileSystemConfig;

  constructor(options: NodeFileSystemOptions = {}) {
    const result = nodeFileSystemOptionsSchema.safeParse(options);
    if (!result.success) {
      throw new ConfigError(`Invalid file system options: ${result.error.message}`);
    }
    this.config = result.data;
  }

  async readText(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  async writeText(path: string, content: string): Promise<void> {
    if (this.config.ensureDirectory) {
      await ensureDir(dirname(path));
    }

    await writeFile(path, content, { encoding: 'utf-8', mode: this.config.fileMode });

    // `mode` only applies when the file is created
    try {
      await chmod(path, this.config.fileMode);
    } catch (error) {
      traceChmodFailure(path, error);
    }
    warnIfWindows();
  }

  readTextSync(path: string): string {
    return readFileSync(path, 'utf-8');
  }

  writeTextSync(path: string, content: string): void {
    if (this.config.ensureDirectory) {
      ensureDirSync(dirname(path));
    }

    writeFileSync(path, content, { encoding: 'utf-8', mode: this.config.fileMode });

    try {
      chmodSync(path, this.config.fileMode);
    } catch (error) {
      traceChmodFailure(path, error);
    }
    warnIfWindows();
  }
}
