/**
 * Test helpers for sandboxed testing
 */

import { vol } from 'memfs';
import { dirname } from 'path';

// Test environment constants
export const TEST_HOME = '/test-home';
export const TEST_AWS_DIR = '/test-home/.aws';
export const TEST_CREDENTIALS_PATH = '/test-home/.aws/credentials';

export const SAMPLE_CREDENTIALS = [
  '[default]',
  'aws_access_key_id = ACCESS_KEY',
  'aws_secret_access_key = SECRET_KEY',
  'aws_session_token = SESSION_TOKEN',
  '',
  '[other]',
  'aws_access_key_id = OTHER_KEY',
  'aws_secret_access_key = OTHER_SECRET',
  '',
].join('\n');

/**
 * Write a file into the virtual filesystem, creating its directory
 */
export const writeVirtualFile = (path: string, content: string): void => {
  vol.mkdirSync(dirname(path), { recursive: true });
  vol.writeFileSync(path, content);
};

export const readVirtualFile = (path: string): string => {
  return vol.readFileSync(path, 'utf-8').toString();
};

export const virtualFileMode = (path: string): number => {
  return Number(vol.statSync(path).mode) & 0o777;
};

export const virtualFileExists = (path: string): boolean => {
  return vol.existsSync(path);
};
