import { describe, it, expect } from 'vitest';
import { fromStsCredentials } from '../../src/lib/sts.js';
import { InvalidCredentialsError } from '../../src/errors.js';

describe('fromStsCredentials', () => {
  it('should convert temporary credentials with a session token', () => {
    const credentials = fromStsCredentials({
      AccessKeyId: 'ASIA_TEST',
      SecretAccessKey: 'test-secret',
      SessionToken: 'test-token',
      Expiration: new Date('2030-01-01T00:00:00Z'),
    });

    expect(credentials).toStrictEqual({
      accessKeyId: 'ASIA_TEST',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-token',
    });
  });

  it('should leave the session token absent when the response has none', () => {
    const credentials = fromStsCredentials({ AccessKeyId: 'AKIA_TEST', SecretAccessKey: 'test-secret' });

    expect(credentials).toStrictEqual({ accessKeyId: 'AKIA_TEST', secretAccessKey: 'test-secret' });
  });

  it('should reject a response without an access key id', () => {
    expect(() => fromStsCredentials({ SecretAccessKey: 'test-secret' })).toThrow(InvalidCredentialsError);
    expect(() => fromStsCredentials({ SecretAccessKey: 'test-secret' })).toThrow(
      'Invalid credentials: Missing access key id'
    );
  });

  it('should reject a response without a secret access key', () => {
    expect(() => fromStsCredentials({ AccessKeyId: 'AKIA_TEST' })).toThrow(
      'Invalid credentials: Missing secret access key'
    );
  });

  it('should report every missing key', () => {
    expect(() => fromStsCredentials({})).toThrow(
      'Invalid credentials: Missing access key id, Missing secret access key'
    );
  });

  it('should accept an ISO string expiration from parsed JSON output', () => {
    const credentials = fromStsCredentials(
      JSON.parse(
        '{"AccessKeyId":"ASIA_TEST","SecretAccessKey":"test-secret","SessionToken":"test-token","Expiration":"2030-01-01T00:00:00Z"}'
      )
    );

    expect(credentials).toStrictEqual({
      accessKeyId: 'ASIA_TEST',
      secretAccessKey: 'test-secret',
      sessionToken: 'test-token',
    });
  });
});
