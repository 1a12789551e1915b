/**
 * Zod schemas for credential records
 */

import { z } from 'zod';

// ============================================================================
// Profile Credentials
// ============================================================================

export const credentialsSchema = z.object({
  accessKeyId: z.string(),
  secretAccessKey: z.string(),
  sessionToken: z.string().optional(),
});

export type Credentials = z.infer<typeof credentialsSchema>;

/**
 * Profile name to credentials. Iteration order is the order profiles are
 * written back out.
 */
export type ProfileStore = Map<string, Credentials>;

export const emptyCredentials = (): Credentials => ({
  accessKeyId: '',
  secretAccessKey: '',
});

export const copyCredentials = (credentials: Credentials): Credentials => {
  const copy: Credentials = {
    accessKeyId: credentials.accessKeyId,
    secretAccessKey: credentials.secretAccessKey,
  };
  if (credentials.sessionToken !== undefined) {
    copy.sessionToken = credentials.sessionToken;
  }
  return copy;
};

// ============================================================================
// STS Response Shape
// ============================================================================

/**
 * The `Credentials` member of an STS AssumeRole / GetSessionToken response
 */
export const stsCredentialsSchema = z.object({
  AccessKeyId: z.string({ required_error: 'Missing access key id' }),
  SecretAccessKey: z.string({ required_error: 'Missing secret access key' }),
  SessionToken: z.string().optional(),
  // The SDK returns a Date; CLI output and parsed JSON carry an ISO string
  Expiration: z.union([z.date(), z.string()]).optional(),
});

export type StsCredentials = z.input<typeof stsCredentialsSchema>;
