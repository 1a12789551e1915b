import { InvalidCredentialsError } from '../errors.js';
import { stsCredentialsSchema, type Credentials, type StsCredentials } from '../schemas/credentials.schema.js';

/**
 * Convert the credentials of an STS AssumeRole / GetSessionToken response
 * into a profile record. Expiration is not stored in the credentials file.
 */
export const fromStsCredentials = (input: Partial<StsCredentials>): Credentials => {
  const result = stsCredentialsSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidCredentialsError(result.error.issues.map((issue) => issue.message).join(', '));
  }

  const { AccessKeyId, SecretAccessKey, SessionToken } = result.data;
  const credentials: Credentials = {
    accessKeyId: AccessKeyId,
    secretAccessKey: SecretAccessKey,
  };
  if (SessionToken !== undefined) {
    credentials.sessionToken = SessionToken;
  }
  return credentials;
};
