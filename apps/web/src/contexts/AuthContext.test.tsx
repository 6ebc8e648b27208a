// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from 'vitest';
import type { ReactNode } from 'react';
import { act, cleanup, render, renderHook, screen } from '@testing-library/react';
import { AuthProvider, useAuth } from './AuthContext';
import { ApiClient } from '../lib/api';
import { AuthSession } from '../lib/auth-session';
import { MemoryStorage } from '../lib/session-store';
import { tokenExpiringIn } from '../test/fixtures/tokens';
import { TEST_API_URL } from '../test/mocks/handlers';

const user = { id: 'u1', username: 'alice123' };

function createSession(storage = new MemoryStorage()) {
  const api = new ApiClient(TEST_API_URL);
  vi.spyOn(api, 'post').mockResolvedValue({ access_token: tokenExpiringIn(3600), user });
  const session = new AuthSession({ apiClient: api, storage, visibility: null });
  return session;
}

function wrapperFor(session: AuthSession) {
  return ({ children }: { children: ReactNode }) => <AuthProvider session={session}>{children}</AuthProvider>;
}

function Greeting() {
  const { user, isAuthenticated } = useAuth();
  return <p>{isAuthenticated && user ? `Signed in as ${user.username}` : 'Signed out'}</p>;
}

describe('AuthProvider', () => {
  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  it('starts signed out for an empty session', () => {
    const session = createSession();

    const { result } = renderHook(() => useAuth(), { wrapper: wrapperFor(session) });

    expect(result.current.isAuthenticated).toBe(false);
    expect(result.current.user).toBeNull();
  });

  it('picks up a restored session', () => {
    const storage = new MemoryStorage();
    storage.setItem('jwt_token', tokenExpiringIn(3600));
    storage.setItem('user_info', JSON.stringify(user));
    const session = createSession(storage);
    session.init();

    render(
      <AuthProvider session={session}>
        <Greeting />
      </AuthProvider>
    );

    expect(screen.getByText('Signed in as alice123')).toBeTruthy();
    session.destroy();
  });

  it('follows login and logout', async () => {
    const session = createSession();
    const { result } = renderHook(() => useAuth(), { wrapper: wrapperFor(session) });

    await act(async () => {
      await result.current.login('alice123', 'password123');
    });
    expect(result.current.isAuthenticated).toBe(true);
    expect(result.current.user).toEqual(user);

    act(() => {
      result.current.logout();
    });
    expect(result.current.isAuthenticated).toBe(false);
    expect(result.current.user).toBeNull();
  });

  it('follows token expiry', async () => {
    const session = createSession();
    const { result } = renderHook(() => useAuth(), { wrapper: wrapperFor(session) });
    await act(async () => {
      await result.current.login('alice123', 'password123');
    });

    vi.spyOn(Date, 'now').mockReturnValue(Date.now() + 3600 * 1000);
    act(() => {
      session.revalidate();
    });

    expect(result.current.isAuthenticated).toBe(false);
  });
});

describe('useAuth', () => {
  it('throws outside an AuthProvider', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});

    expect(() => renderHook(() => useAuth())).toThrow('useAuth must be used within an AuthProvider');

    vi.restoreAllMocks();
  });
});
