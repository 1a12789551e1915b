import { z } from 'zod';
import { CREDENTIALS_FILE_MODE } from '../constants.js';

export const nodeFileSystemOptionsSchema = z.object({
  /** Permission bits applied to the credentials file after every write */
  fileMode: z.number().int().min(0).max(0o777).default(CREDENTIALS_FILE_MODE),
  /** Create the parent directory (e.g. ~/.aws) before writing */
  ensureDirectory: z.boolean().default(false),
});

export type NodeFileSystemOptions = z.input<typeof nodeFileSystemOptionsSchema>;
export type NodeFileSystemConfig = z.output<typeof nodeFileSystemOptionsSchema>;
