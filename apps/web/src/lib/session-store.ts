import { userProfileSchema, type PersistedSession, type UserProfile } from '@taskpad/shared';
import { StorageError, describeError } from '../utils/errors';
import { sessionLogger } from '../utils/logger';

/** The subset of the Web Storage API the session needs. `localStorage` satisfies it. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export class MemoryStorage implements KeyValueStorage {
  private readonly entries = new Map<string, string>();

  getItem(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.entries.set(key, value);
  }

  removeItem(key: string): void {
    this.entries.delete(key);
  }

  get size(): number {
    return this.entries.size;
  }
}

export function resolveDefaultStorage(): KeyValueStorage {
  try {
    if (typeof globalThis.localStorage !== 'undefined') {
      return globalThis.localStorage;
    }
  } catch (error) {
    // Access throws in sandboxed iframes and with storage disabled
    sessionLogger.warn('Web Storage unavailable, session will not survive reloads', {
      error: describeError(error),
    });
  }
  return new MemoryStorage();
}

export interface SessionStoreKeys {
  tokenKey: string;
  userKey: string;
}

/**
 * Durable mirror of the authenticated session: the token string under
 * `tokenKey` and the serialized user profile under `userKey`.
 */
export class SessionStore {
  constructor(
    private readonly storage: KeyValueStorage,
    private readonly keys: SessionStoreKeys,
  ) {}

  /**
   * @returns the persisted record, or null unless both entries are present
   * @throws StorageError when storage access fails or the user entry is corrupt
   */
  read(): PersistedSession | null {
    let token: string | null;
    let rawUser: string | null;
    try {
      token = this.storage.getItem(this.keys.tokenKey);
      rawUser = this.storage.getItem(this.keys.userKey);
    } catch (error) {
      throw new StorageError(`Failed to read session: ${describeError(error)}`);
    }

    if (!token || !rawUser) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(rawUser);
    } catch {
      throw new StorageError('Stored user profile is not valid JSON');
    }

    const user = userProfileSchema.safeParse(parsed);
    if (!user.success) {
      throw new StorageError('Stored user profile is missing required fields');
    }

    return { token, user: user.data };
  }

  hasRecord(): boolean {
    try {
      return (
        this.storage.getItem(this.keys.tokenKey) !== null ||
        this.storage.getItem(this.keys.userKey) !== null
      );
    } catch (error) {
      throw new StorageError(`Failed to read session: ${describeError(error)}`);
    }
  }

  write(token: string, user: UserProfile): void {
    try {
      this.storage.setItem(this.keys.tokenKey, token);
      this.storage.setItem(this.keys.userKey, JSON.stringify(user));
    } catch (error) {
      throw new StorageError(`Failed to save session: ${describeError(error)}`);
    }
  }

  /** Removes both entries; attempts the second even if the first fails. */
  clear(): void {
    const failures: string[] = [];
    for (const key of [this.keys.tokenKey, this.keys.userKey]) {
      try {
        this.storage.removeItem(key);
      } catch (error) {
        failures.push(describeError(error));
      }
    }
    if (failures.length > 0) {
      throw new StorageError(`Failed to clear session: ${failures.join('; ')}`);
    }
  }
}
