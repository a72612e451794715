/**
 * Credential Store Tests
 * @evolve/session
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { KeyValueCredentialStore, createCredentialStore } from '../credential-store';
import { CustomStorage, MemoryStorage, STORAGE_KEYS } from '../storage';
import { createTestLogger } from './fixtures';

const user = { id: '42', first_name: 'Ada', last_name: 'Byron', phone: '+15555550100' };

describe('KeyValueCredentialStore', () => {
  let storage: MemoryStorage;
  let store: KeyValueCredentialStore;

  beforeEach(() => {
    storage = new MemoryStorage();
    store = new KeyValueCredentialStore(storage);
  });

  it('should load what was saved', async () => {
    await store.save(user, 'access-1', 'refresh-1');
    expect(await store.load()).toEqual({ user, accessToken: 'access-1', refreshToken: 'refresh-1' });
  });

  it('should round-trip any token pair', async () => {
    await fc.assert(
      fc.asyncProperty(
        fc.string({ minLength: 1 }),
        fc.option(fc.string({ minLength: 1 }), { nil: null }),
        fc.option(fc.string({ minLength: 1 }), { nil: null }),
        async (id, accessToken, refreshToken) => {
          await store.save({ id }, accessToken, refreshToken);
          const loaded = await store.load();
          return (
            loaded.user?.id === id && loaded.accessToken === accessToken && loaded.refreshToken === refreshToken
          );
        }
      ),
      { numRuns: 50 }
    );
  });

  it('should delete an entry saved as null', async () => {
    await store.save(user, 'access-1', 'refresh-1');
    await store.save(user, null, 'refresh-1');

    expect(storage.get(STORAGE_KEYS.ACCESS_TOKEN)).toBeNull();
    expect((await store.load()).accessToken).toBeNull();
  });

  it('should keep unknown user fields', async () => {
    await store.save({ id: '7', goals: ['strength'], height: 180 }, 'a', 'r');
    expect((await store.load()).user).toEqual({ id: '7', goals: ['strength'], height: 180 });
  });

  it('should clear all three entries and be safe to repeat', async () => {
    await store.save(user, 'access-1', 'refresh-1');
    await store.clear();
    await store.clear();

    expect(storage.size).toBe(0);
    expect(await store.load()).toEqual({ user: null, accessToken: null, refreshToken: null });
  });

  it('should load an empty store as all null', async () => {
    expect(await store.load()).toEqual({ user: null, accessToken: null, refreshToken: null });
  });

  it('should return a null user for a corrupt record', async () => {
    const logger = createTestLogger();
    store = new KeyValueCredentialStore(storage, logger);
    storage.set(STORAGE_KEYS.USER, '{broken');
    storage.set(STORAGE_KEYS.REFRESH_TOKEN, 'refresh-1');

    const loaded = await store.load();

    expect(loaded.user).toBeNull();
    expect(loaded.refreshToken).toBe('refresh-1');
    expect(logger.warn).toHaveBeenCalledWith('Stored user record is not valid JSON, ignoring it');
  });

  it('should return a null user for a record without an id', async () => {
    storage.set(STORAGE_KEYS.USER, JSON.stringify({ first_name: 'Ada' }));
    expect((await store.load()).user).toBeNull();
  });

  it('should log and continue when storage fails', async () => {
    const logger = createTestLogger();
    const failing = new CustomStorage({
      getItem: () => {
        throw new Error('keychain locked');
      },
      setItem: async () => {
        throw new Error('keychain locked');
      },
      removeItem: () => undefined,
    });
    const failingStore = createCredentialStore(failing, logger);

    await expect(failingStore.save(user, 'access-1', 'refresh-1')).resolves.toBeUndefined();
    await expect(failingStore.load()).resolves.toEqual({ user: null, accessToken: null, refreshToken: null });
    expect(logger.warn).toHaveBeenCalledTimes(6);
  });
});
