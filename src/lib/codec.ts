/**
 * Shared credentials file codec
 *
 * Parses the INI-like `[profile]` / `key = value` format into a ProfileStore
 * and writes a store back out. Both directions are pure; file access lives
 * in the CredentialsManager.
 */

import { ACCESS_KEY_ID_KEY, SECRET_ACCESS_KEY_KEY, SESSION_TOKEN_KEY } from '../constants.js';
import { ParseError } from '../errors.js';
import {
  emptyCredentials,
  type Credentials,
  type ProfileStore,
} from '../schemas/credentials.schema.js';

export interface ParseOptions {
  /**
   * Reject unknown keys, lines without `=`, assignments outside a section
   * and empty `[]` headers instead of skipping them.
   */
  strict?: boolean;
}

interface OpenSection {
  name: string;
  credentials: Credentials;
}

const isSectionHeader = (line: string): boolean => line.startsWith('[') && line.endsWith(']');

const assignField = (credentials: Credentials, key: string, value: string): boolean => {
  switch (key) {
    case ACCESS_KEY_ID_KEY:
      credentials.accessKeyId = value;
      return true;
    case SECRET_ACCESS_KEY_KEY:
      credentials.secretAccessKey = value;
      return true;
    case SESSION_TOKEN_KEY:
      credentials.sessionToken = value;
      return true;
    default:
      return false;
  }
};

// ============================================================================
// Parse
// ============================================================================

export const parseCredentials = (text: string, options: ParseOptions = {}): ProfileStore => {
  const strict = options.strict ?? false;
  const store: ProfileStore = new Map();
  const lines = text.split(/\r?\n/);

  // undefined before the first header, null inside an ignored `[]` section
  let current: OpenSection | null | undefined;

  const commit = (): void => {
    if (current) {
      store.set(current.name, current.credentials);
    }
  };

  lines.forEach((raw, index) => {
    const line = raw.trim();
    const lineNumber = index + 1;

    if (!line) {
      return;
    }

    if (isSectionHeader(line)) {
      commit();
      const name = line.slice(1, -1);
      if (!name) {
        if (strict) {
          throw new ParseError('empty profile name', lineNumber);
        }
        current = null;
        return;
      }
      current = { name, credentials: emptyCredentials() };
      return;
    }

    if (line.startsWith('#')) {
      return;
    }

    const separator = line.indexOf('=');
    if (separator === -1) {
      if (strict) {
        throw new ParseError(`expected 'key = value', got '${line}'`, lineNumber);
      }
      return;
    }

    const key = line.slice(0, separator).trim();
    const value = line.slice(separator + 1).trim();

    if (!current) {
      if (strict) {
        throw new ParseError(`'${key}' appears outside of a profile section`, lineNumber);
      }
      return;
    }

    if (!assignField(current.credentials, key, value) && strict) {
      throw new ParseError(`unknown key '${key}' in profile '${current.name}'`, lineNumber);
    }
  });

  commit();

  return store;
};

// ============================================================================
// Serialize
// ============================================================================

export const serializeCredentials = (store: ReadonlyMap<string, Credentials>): string => {
  let output = '';

  for (const [name, credentials] of store) {
    output += `[${name}]\n`;
    output += `${ACCESS_KEY_ID_KEY} = ${credentials.accessKeyId}\n`;
    output += `${SECRET_ACCESS_KEY_KEY} = ${credentials.secretAccessKey}\n`;
    if (credentials.sessionToken !== undefined) {
      output += `${SESSION_TOKEN_KEY} = ${credentials.sessionToken}\n`;
    }
    output += '\n';
  }

  return output;
};
