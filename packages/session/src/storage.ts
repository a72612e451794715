/**
 * Evolve Storage Adapters
 * @evolve/session
 *
 * Key-value storage implementations backing the credential store
 */

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { KeyValueStorage } from './types';

// ============================================================================
// Memory Storage
// ============================================================================

/**
 * Process-local storage. The default when no storage is configured, so a
 * session lives only as long as the process unless persistence is set up.
 */
export class MemoryStorage implements KeyValueStorage {
  private readonly entries: Map<string, string>;

  /** `initial` seeds the storage, e.g. with a session saved elsewhere */
  constructor(initial: Record<string, string> = {}) {
    this.entries = new Map(Object.entries(initial));
  }

  get(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  set(key: string, value: string): void {
    this.entries.set(key, value);
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  /** Copy of everything held */
  toJSON(): Record<string, string> {
    return Object.fromEntries(this.entries);
  }
}

// ============================================================================
// File Storage (Node.js)
// ============================================================================

export interface FileStorageOptions {
  /** File mode for the credentials file (default: 0o600) */
  mode?: number;
}

/**
 * JSON file on disk - survives process restart.
 * Writes go to a temp file that is renamed over the target, one at a time.
 */
export class FileStorage implements KeyValueStorage {
  private readonly filePath: string;
  private readonly mode: number;
  private writeQueue: Promise<void> = Promise.resolve();

  constructor(filePath: string, options: FileStorageOptions = {}) {
    this.filePath = filePath;
    this.mode = options.mode ?? 0o600;
  }

  async get(key: string): Promise<string | null> {
    await this.writeQueue;
    const entries = await this.readEntries();
    return entries[key] ?? null;
  }

  set(key: string, value: string): Promise<void> {
    return this.enqueue(entries => {
      entries[key] = value;
    });
  }

  remove(key: string): Promise<void> {
    return this.enqueue(entries => {
      delete entries[key];
    });
  }

  private enqueue(mutate: (entries: Record<string, string>) => void): Promise<void> {
    const next = this.writeQueue.then(async () => {
      const entries = await this.readEntriesForWrite();
      mutate(entries);
      await this.writeEntries(entries);
    });
    // The failure is reported to this write's caller only
    this.writeQueue = next.catch(() => undefined);
    return next;
  }

  private async readEntries(): Promise<Record<string, string>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    const entries: Record<string, string> = {};
    if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
      for (const [key, value] of Object.entries(parsed)) {
        if (typeof value === 'string') {
          entries[key] = value;
        }
      }
    }
    return entries;
  }

  /**
   * A file that is not JSON is replaced by the write rather than blocking
   * it forever. Reads still report it.
   */
  private async readEntriesForWrite(): Promise<Record<string, string>> {
    try {
      return await this.readEntries();
    } catch (error) {
      if (error instanceof SyntaxError) {
        return {};
      }
      throw error;
    }
  }

  private async writeEntries(entries: Record<string, string>): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    await writeFile(tempPath, JSON.stringify(entries), { encoding: 'utf-8', mode: this.mode });
    await rename(tempPath, this.filePath);
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

// ============================================================================
// Secret Store Bridge
// ============================================================================

/**
 * Functions of a platform secret store (OS keychain, libsecret, a vault
 * client). Each may be sync or async.
 */
export interface SecretStoreFunctions {
  getItem(key: string): string | null | Promise<string | null>;
  setItem(key: string, value: string): void | Promise<void>;
  removeItem(key: string): void | Promise<void>;
}

/**
 * Adapts a secret store to KeyValueStorage. Keys are namespaced with
 * `prefix` when one is given, so several apps can share a keychain.
 */
export class CustomStorage implements KeyValueStorage {
  private readonly secrets: SecretStoreFunctions;
  private readonly prefix: string;

  constructor(secrets: SecretStoreFunctions, options: { prefix?: string } = {}) {
    this.secrets = secrets;
    this.prefix = options.prefix ?? '';
  }

  get(key: string): string | null | Promise<string | null> {
    return this.secrets.getItem(this.prefix + key);
  }

  set(key: string, value: string): void | Promise<void> {
    return this.secrets.setItem(this.prefix + key, value);
  }

  remove(key: string): void | Promise<void> {
    return this.secrets.removeItem(this.prefix + key);
  }
}

// ============================================================================
// Storage Keys
// ============================================================================

/** Fixed keys of the three persisted session entries */
export const STORAGE_KEYS = {
  USER: 'user',
  ACCESS_TOKEN: 'access_token',
  REFRESH_TOKEN: 'refresh_token',
} as const;
