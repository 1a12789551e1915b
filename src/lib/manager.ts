/**
 * CredentialsManager - load, edit and save a shared credentials file
 *
 * @example
 * const credentials = await CredentialsManager.loadDefault();
 * credentials
 *   .withProfile('default')
 *   .setAccessKeyId('ACCESS_KEY')
 *   .setSecretAccessKey('SECRET_KEY');
 * await credentials.save();
 */

import {
  FileNotReadableError,
  InvalidCredentialsError,
  InvalidProfileNameError,
  ParseError,
  WriteError,
} from '../errors.js';
import {
  copyCredentials,
  credentialsSchema,
  emptyCredentials,
  type Credentials,
  type ProfileStore,
} from '../schemas/credentials.schema.js';
import { formatCount, formatPath, logger } from '../ui/index.js';
import { parseCredentials, serializeCredentials } from './codec.js';
import { NodeFileSystem, type FileSystem } from './fileSystem.js';
import { collapsePath, getDefaultCredentialsPath, type HomeDirectoryResolver } from './paths.js';
import { ProfileSetter, type MutableProfileSource } from './profileSetter.js';

export interface CredentialsManagerOptions {
  /** Defaults to a NodeFileSystem with owner-only file permissions */
  fs?: FileSystem;
  /** Used by loadDefault / loadDefaultSync. Defaults to os.homedir */
  resolveHomeDirectory?: HomeDirectoryResolver;
  /** Reject unrecognized lines when loading */
  strict?: boolean;
}

const assertProfileName = (name: string): void => {
  if (!name) {
    throw new InvalidProfileNameError(name);
  }
};

const parseLoaded = (text: string, path: string, strict: boolean): ProfileStore => {
  try {
    return parseCredentials(text, { strict });
  } catch (error) {
    if (error instanceof ParseError) {
      throw error;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ParseError(`${path}: ${message}`, undefined, error);
  }
};

export class CredentialsManager implements MutableProfileSource {
  private profiles: ProfileStore = new Map();
  private readonly fs: FileSystem;

  constructor(
    private readonly filePath: string,
    options: CredentialsManagerOptions = {}
  ) {
    this.fs = options.fs ?? new NodeFileSystem();
  }

  // ============================================================================
  // Loading
  // ============================================================================

  static async load(path: string, options: CredentialsManagerOptions = {}): Promise<CredentialsManager> {
    const manager = new CredentialsManager(path, options);

    let text: string;
    try {
      text = await manager.fs.readText(path);
    } catch (error) {
      throw new FileNotReadableError(path, error);
    }

    manager.profiles = parseLoaded(text, path, options.strict ?? false);
    logger.debug(`Loaded ${formatCount(manager.size, 'profile')} from ${formatPath(collapsePath(path))}`);
    return manager;
  }

  static loadSync(path: string, options: CredentialsManagerOptions = {}): CredentialsManager {
    const manager = new CredentialsManager(path, options);

    let text: string;
    try {
      text = manager.fs.readTextSync(path);
    } catch (error) {
      throw new FileNotReadableError(path, error);
    }

    manager.profiles = parseLoaded(text, path, options.strict ?? false);
    logger.debug(`Loaded ${formatCount(manager.size, 'profile')} from ${formatPath(collapsePath(path))}`);
    return manager;
  }

  /** Load `<home>/.aws/credentials` */
  static async loadDefault(options: CredentialsManagerOptions = {}): Promise<CredentialsManager> {
    return CredentialsManager.load(getDefaultCredentialsPath(options.resolveHomeDirectory), options);
  }

  static loadDefaultSync(options: CredentialsManagerOptions = {}): CredentialsManager {
    return CredentialsManager.loadSync(getDefaultCredentialsPath(options.resolveHomeDirectory), options);
  }

  // ============================================================================
  // Saving
  // ============================================================================

  async save(): Promise<void> {
    await this.saveAs(this.filePath);
  }

  saveSync(): void {
    this.saveAsSync(this.filePath);
  }

  /** Write to `path` without rebinding this manager to it */
  async saveAs(path: string): Promise<void> {
    const content = this.toString();
    try {
      await this.fs.writeText(path, content);
    } catch (error) {
      throw new WriteError(path, error);
    }
    logger.debug(`Wrote ${formatCount(this.size, 'profile')} to ${formatPath(collapsePath(path))}`);
  }

  saveAsSync(path: string): void {
    const content = this.toString();
    try {
      this.fs.writeTextSync(path, content);
    } catch (error) {
      throw new WriteError(path, error);
    }
    logger.debug(`Wrote ${formatCount(this.size, 'profile')} to ${formatPath(collapsePath(path))}`);
  }

  // ============================================================================
  // Profiles
  // ============================================================================

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.profiles.size;
  }

  profileNames(): string[] {
    return Array.from(this.profiles.keys());
  }

  /** Returns a copy; edits to it do not reach the store */
  getProfile(name: string): Credentials | undefined {
    const credentials = this.profiles.get(name);
    return credentials ? copyCredentials(credentials) : undefined;
  }

  /**
   * Live record backing a profile.
   * @internal Used by ProfileSetter; callers should use getProfile.
   */
  getProfileMutable(name: string): Credentials | undefined {
    return this.profiles.get(name);
  }

  setProfile(name: string, credentials: Credentials): void {
    assertProfileName(name);
    const result = credentialsSchema.safeParse(credentials);
    if (!result.success) {
      throw new InvalidCredentialsError(result.error.issues.map((issue) => issue.message).join(', '));
    }
    this.profiles.set(name, copyCredentials(result.data));
  }

  profileExists(name: string): boolean {
    return this.profiles.has(name);
  }

  removeProfile(name: string): Credentials | undefined {
    const credentials = this.profiles.get(name);
    this.profiles.delete(name);
    return credentials;
  }

  /** Returns a setter for `name`, creating an empty profile first if needed */
  withProfile(name: string): ProfileSetter {
    assertProfileName(name);
    if (!this.profiles.has(name)) {
      this.profiles.set(name, emptyCredentials());
    }
    return new ProfileSetter(this, name);
  }

  /** The file contents `save` would write */
  toString(): string {
    return serializeCredentials(this.profiles);
  }
}
