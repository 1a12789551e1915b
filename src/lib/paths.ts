import { homedir } from 'os';
import { join, sep } from 'path';
import { CREDENTIALS_DIR, CREDENTIALS_FILE } from '../constants.js';
import { PlatformError } from '../errors.js';

export type HomeDirectoryResolver = () => string;

export const resolveHomeDirectory: HomeDirectoryResolver = () => homedir();

/**
 * Resolve `<home>/.aws/credentials`.
 * Throws PlatformError when the resolver fails or yields an empty path.
 */
export const getDefaultCredentialsPath = (
  resolveHome: HomeDirectoryResolver = resolveHomeDirectory
): string => {
  let home: string;
  try {
    home = resolveHome();
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new PlatformError(message, error);
  }

  if (!home) {
    throw new PlatformError('home directory is empty');
  }

  return join(home, CREDENTIALS_DIR, CREDENTIALS_FILE);
};

export const collapsePath = (path: string): string => {
  const home = homedir();
  if (home && (path === home || path.startsWith(home + sep))) {
    return '~' + path.slice(home.length);
  }
  return path;
};
