import { describe, expect, it } from 'vitest';
import { MemoryStorage, SessionStore, resolveDefaultStorage, type KeyValueStorage } from './session-store';
import { StorageError } from '../utils/errors';

const keys = { tokenKey: 'jwt_token', userKey: 'user_info' };
const user = { id: 'u1', username: 'alice123' };

class FailingStorage implements KeyValueStorage {
  getItem(): string | null {
    throw new Error('SecurityError: access denied');
  }
  setItem(): void {
    throw new Error('QuotaExceededError');
  }
  removeItem(): void {
    throw new Error('SecurityError: access denied');
  }
}

describe('SessionStore', () => {
  it('writes and reads back the token and user', () => {
    const storage = new MemoryStorage();
    const store = new SessionStore(storage, keys);

    store.write('a.b.c', user);

    expect(storage.getItem('jwt_token')).toBe('a.b.c');
    expect(storage.getItem('user_info')).toBe('{"id":"u1","username":"alice123"}');
    expect(store.read()).toEqual({ token: 'a.b.c', user });
  });

  it('returns null when either entry is missing', () => {
    const storage = new MemoryStorage();
    const store = new SessionStore(storage, keys);

    expect(store.read()).toBeNull();

    storage.setItem('jwt_token', 'a.b.c');
    expect(store.read()).toBeNull();
    expect(store.hasRecord()).toBe(true);
  });

  it('clear removes both entries', () => {
    const storage = new MemoryStorage();
    const store = new SessionStore(storage, keys);

    store.write('a.b.c', user);
    store.clear();

    expect(storage.size).toBe(0);
    expect(store.hasRecord()).toBe(false);
  });

  it('honours custom keys', () => {
    const storage = new MemoryStorage();
    const store = new SessionStore(storage, { tokenKey: 'tk', userKey: 'uk' });

    store.write('a.b.c', user);

    expect(storage.getItem('tk')).toBe('a.b.c');
    expect(storage.getItem('jwt_token')).toBeNull();
  });

  it('reports a corrupt user entry as a StorageError', () => {
    const storage = new MemoryStorage();
    storage.setItem('jwt_token', 'a.b.c');
    storage.setItem('user_info', '{not json');

    expect(() => new SessionStore(storage, keys).read()).toThrow(StorageError);
  });

  it('reports a user entry without required fields as a StorageError', () => {
    const storage = new MemoryStorage();
    storage.setItem('jwt_token', 'a.b.c');
    storage.setItem('user_info', '{"name":"alice"}');

    expect(() => new SessionStore(storage, keys).read()).toThrow(
      'Stored user profile is missing required fields'
    );
  });

  it('wraps storage exceptions in StorageError', () => {
    const store = new SessionStore(new FailingStorage(), keys);

    expect(() => store.read()).toThrow('Failed to read session: SecurityError: access denied');
    expect(() => store.write('a.b.c', user)).toThrow('Failed to save session: QuotaExceededError');
    expect(() => store.clear()).toThrow(StorageError);
  });
});

describe('resolveDefaultStorage', () => {
  it('falls back to memory storage when Web Storage is absent', () => {
    expect(resolveDefaultStorage()).toBeInstanceOf(MemoryStorage);
  });
});
