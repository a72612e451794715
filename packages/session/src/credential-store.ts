/**
 * Credential Store
 * @evolve/session
 *
 * Durable persistence of the three session entries: user record,
 * access token and refresh token. Storage failures are logged and
 * never reach the caller.
 */

import type { Logger } from './logger';
import { describeIssues, parseJson, sessionUserSchema } from './schemas';
import type { SessionUser } from './schemas';
import { MemoryStorage, STORAGE_KEYS } from './storage';
import type { KeyValueStorage, StoredCredentials } from './types';

/**
 * Persistence contract consumed by SessionManager
 */
export interface CredentialStore {
  /** A `null` token deletes that entry */
  save(user: SessionUser, accessToken: string | null, refreshToken: string | null): Promise<void>;
  load(): Promise<StoredCredentials>;
  clear(): Promise<void>;
}

/**
 * CredentialStore over any KeyValueStorage
 */
export class KeyValueCredentialStore implements CredentialStore {
  private readonly storage: KeyValueStorage;
  private readonly logger?: Logger;

  constructor(storage: KeyValueStorage = new MemoryStorage(), logger?: Logger) {
    this.storage = storage;
    this.logger = logger;
  }

  async save(user: SessionUser, accessToken: string | null, refreshToken: string | null): Promise<void> {
    await Promise.all([
      this.write(STORAGE_KEYS.USER, JSON.stringify(user)),
      this.write(STORAGE_KEYS.ACCESS_TOKEN, accessToken),
      this.write(STORAGE_KEYS.REFRESH_TOKEN, refreshToken),
    ]);
    this.logger?.debug(
      `Credentials saved (access token: ${accessToken !== null}, refresh token: ${refreshToken !== null})`
    );
  }

  async load(): Promise<StoredCredentials> {
    const [rawUser, accessToken, refreshToken] = await Promise.all([
      this.read(STORAGE_KEYS.USER),
      this.read(STORAGE_KEYS.ACCESS_TOKEN),
      this.read(STORAGE_KEYS.REFRESH_TOKEN),
    ]);

    return {
      user: rawUser === null ? null : this.decodeUser(rawUser),
      accessToken,
      refreshToken,
    };
  }

  async clear(): Promise<void> {
    await Promise.all([
      this.write(STORAGE_KEYS.USER, null),
      this.write(STORAGE_KEYS.ACCESS_TOKEN, null),
      this.write(STORAGE_KEYS.REFRESH_TOKEN, null),
    ]);
    this.logger?.debug('Credentials cleared');
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private async read(key: string): Promise<string | null> {
    try {
      return await this.storage.get(key);
    } catch (error) {
      this.logger?.warn(`Failed to read "${key}" from storage`, error);
      return null;
    }
  }

  private async write(key: string, value: string | null): Promise<void> {
    try {
      if (value === null) {
        await this.storage.remove(key);
      } else {
        await this.storage.set(key, value);
      }
    } catch (error) {
      this.logger?.warn(`Failed to ${value === null ? 'remove' : 'write'} "${key}" in storage`, error);
    }
  }

  private decodeUser(raw: string): SessionUser | null {
    const json = parseJson(raw);
    if (!json.ok) {
      this.logger?.warn('Stored user record is not valid JSON, ignoring it');
      return null;
    }
    const parsed = sessionUserSchema.safeParse(json.value);
    if (!parsed.success) {
      this.logger?.warn(`Stored user record is invalid, ignoring it: ${describeIssues(parsed.error)}`);
      return null;
    }
    return parsed.data;
  }
}

/**
 * Create a credential store over the given storage (memory by default)
 */
export function createCredentialStore(storage?: KeyValueStorage, logger?: Logger): CredentialStore {
  return new KeyValueCredentialStore(storage, logger);
}
