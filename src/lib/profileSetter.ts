import type { Credentials } from '../schemas/credentials.schema.js';

/**
 * Source of live profile records for a ProfileSetter.
 */
export interface MutableProfileSource {
  getProfileMutable(name: string): Credentials | undefined;
}

/**
 * Chainable setter for a single profile.
 *
 * The profile is looked up again on every call, so a setter whose profile
 * was removed after `withProfile` leaves the store untouched.
 */
export class ProfileSetter {
  constructor(
    private readonly source: MutableProfileSource,
    readonly profileName: string
  ) {}

  private update(apply: (credentials: Credentials) => void): this {
    const credentials = this.source.getProfileMutable(this.profileName);
    if (credentials) {
      apply(credentials);
    }
    return this;
  }

  setAccessKeyId(value: string): this {
    return this.update((credentials) => {
      credentials.accessKeyId = value;
    });
  }

  setSecretAccessKey(value: string): this {
    return this.update((credentials) => {
      credentials.secretAccessKey = value;
    });
  }

  /** Pass `undefined` to clear the token */
  setSessionToken(value: string | undefined): this {
    return this.update((credentials) => {
      if (value === undefined) {
        delete credentials.sessionToken;
      } else {
        credentials.sessionToken = value;
      }
    });
  }

  clearSessionToken(): this {
    return this.setSessionToken(undefined);
  }
}
