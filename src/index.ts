export { CredentialsManager, type CredentialsManagerOptions } from './lib/manager.js';
export { ProfileSetter } from './lib/profileSetter.js';
export { parseCredentials, serializeCredentials, type ParseOptions } from './lib/codec.js';
export { NodeFileSystem, type FileSystem } from './lib/fileSystem.js';
export {
  getDefaultCredentialsPath,
  resolveHomeDirectory,
  type HomeDirectoryResolver,
} from './lib/paths.js';
export { fromStsCredentials } from './lib/sts.js';
export {
  credentialsSchema,
  emptyCredentials,
  stsCredentialsSchema,
  type Credentials,
  type ProfileStore,
  type StsCredentials,
} from './schemas/credentials.schema.js';
export {
  nodeFileSystemOptionsSchema,
  type NodeFileSystemOptions,
} from './schemas/fileSystem.schema.js';
export {
  CredentialsError,
  FileNotReadableError,
  ParseError,
  WriteError,
  PlatformError,
  InvalidProfileNameError,
  InvalidCredentialsError,
  ConfigError,
  formatError,
} from './errors.js';
