import type { z } from 'zod';
import {
  loginResponseSchema,
  loginSchema,
  registerResponseSchema,
  registerSchema,
  type AuthEventMap,
  type AuthResult,
  type PersistedSession,
  type Session,
  type UserProfile,
} from '@taskpad/shared';
import { sessionOptionsSchema } from '../config/env';
import {
  ExpiredTokenError,
  MalformedResponseError,
  MalformedTokenError,
  ValidationError,
  describeError,
  normalizeAuthError,
} from '../utils/errors';
import { authLogger, sessionLogger } from '../utils/logger';
import type { ApiClient } from './api';
import { EventBus, type EventHandler } from './event-bus';
import { ExpiryMonitor, defaultVisibility, type VisibilitySource } from './expiry-monitor';
import { SessionStore, resolveDefaultStorage, type KeyValueStorage } from './session-store';
import { decodeToken, extractExpiry, isTokenFresh } from './token';

export interface AuthSessionOptions {
  apiClient: ApiClient;
  tokenKey?: string;
  userKey?: string;
  /** Period of the background freshness check, in ms. */
  checkInterval?: number;
  /** Safety margin subtracted from the token's expiry, in ms. */
  bufferWindow?: number;
  storage?: KeyValueStorage;
  /** Foreground notifications; `null` disables them. Defaults to `document` when present. */
  visibility?: VisibilitySource | null;
}

type SessionState =
  | { status: 'unauthenticated' }
  | { status: 'authenticated'; user: UserProfile; token: string; tokenExpiry: number };

const UNAUTHENTICATED: SessionState = { status: 'unauthenticated' };

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid input');
  }
  return result.data;
}

function parseResponse<T extends z.ZodTypeAny>(schema: T, data: unknown): z.infer<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => issue.path.join('.') || '(root)');
    throw new MalformedResponseError(`Malformed response: missing or invalid ${fields.join(', ')}`);
  }
  return result.data;
}

/**
 * Client-side authentication session.
 *
 * Owns the in-memory session and its persisted mirror, keeps the gateway's
 * bearer token in step with it, and demotes the session once the token enters
 * the buffer window before its `exp`. Call {@link init} once after
 * construction and {@link destroy} on teardown.
 */
export class AuthSession {
  private state: SessionState = UNAUTHENTICATED;
  private initialized = false;

  private readonly api: ApiClient;
  private readonly store: SessionStore;
  private readonly events = new EventBus<AuthEventMap>();
  private readonly monitor: ExpiryMonitor;
  private readonly bufferWindow: number;

  constructor(options: AuthSessionOptions) {
    const config = parseInput(sessionOptionsSchema, {
      tokenKey: options.tokenKey,
      userKey: options.userKey,
      checkInterval: options.checkInterval,
      bufferWindow: options.bufferWindow,
    });

    this.api = options.apiClient;
    this.bufferWindow = config.bufferWindow;
    this.store = new SessionStore(options.storage ?? resolveDefaultStorage(), {
      tokenKey: config.tokenKey,
      userKey: config.userKey,
    });
    this.monitor = new ExpiryMonitor(() => this.revalidate(), {
      interval: config.checkInterval,
      visibility: options.visibility === undefined ? defaultVisibility() : options.visibility,
    });
  }

  /** Restore any persisted session and start the expiry monitor. */
  init(): void {
    if (this.initialized) return;
    this.initialized = true;

    this.restore();
    this.monitor.start();
    sessionLogger.info('Session initialized', { authenticated: this.state.status === 'authenticated' });
  }

  async login(username: string, password: string): Promise<AuthResult> {
    const input = parseInput(loginSchema, { username, password });
    authLogger.info('Login attempt', { username: input.username });

    try {
      const data = await this.api.post('/auth/login', input);
      const response = parseResponse(loginResponseSchema, data);

      const user = this.establish(response.access_token, response.user);
      this.events.publish('login', { user });

      authLogger.info('Login succeeded', { username: user.username });
      return { success: true, user, message: 'Login successful' };
    } catch (error) {
      const failure = normalizeAuthError(error);
      authLogger.warn('Login failed', { username: input.username, error: failure.message });
      this.events.publish('loginError', { error: failure.message });
      throw failure;
    }
  }

  /** Create an account. Does not sign the user in. */
  async register(username: string, password: string, confirmPassword: string): Promise<AuthResult> {
    const input = parseInput(registerSchema, { username, password, confirmPassword });
    authLogger.info('Registration attempt', { username: input.username });

    try {
      const data = await this.api.post('/auth/register', input);
      const response = parseResponse(registerResponseSchema, data);

      this.events.publish('register', { user: response.user });

      authLogger.info('Registration succeeded', { username: response.user.username });
      return {
        success: true,
        user: response.user,
        message: response.message || 'Registration successful',
      };
    } catch (error) {
      const failure = normalizeAuthError(error);
      authLogger.warn('Registration failed', { username: input.username, error: failure.message });
      this.events.publish('registerError', { error: failure.message });
      throw failure;
    }
  }

  /** Local sign-out. Never throws; safe to call repeatedly. */
  logout(): void {
    this.reset();
    this.events.publish('logout', {});
    authLogger.info('Logged out');
  }

  isAuthenticated(): boolean {
    this.revalidate();
    return this.state.status === 'authenticated';
  }

  getCurrentUser(): UserProfile | null {
    return this.isAuthenticated() && this.state.status === 'authenticated' ? this.state.user : null;
  }

  getToken(): string | null {
    return this.isAuthenticated() && this.state.status === 'authenticated' ? this.state.token : null;
  }

  getTokenExpiry(): number | null {
    return this.isAuthenticated() && this.state.status === 'authenticated'
      ? this.state.tokenExpiry
      : null;
  }

  getSession(): Session {
    if (!this.isAuthenticated() || this.state.status !== 'authenticated') {
      return { isAuthenticated: false, currentUser: null, token: null, tokenExpiry: null };
    }
    const { user, token, tokenExpiry } = this.state;
    return { isAuthenticated: true, currentUser: user, token, tokenExpiry };
  }

  /**
   * Freshness check. Demotes a stale session and publishes `tokenExpired`
   * once per demotion; a no-op when already unauthenticated.
   */
  revalidate(): void {
    if (this.state.status !== 'authenticated') return;
    if (isTokenFresh(this.state.tokenExpiry, this.bufferWindow)) return;

    sessionLogger.info('Token expired, clearing session', {
      expiredAt: new Date(this.state.tokenExpiry).toISOString(),
    });
    this.reset();
    this.events.publish('tokenExpired', {});
  }

  addEventListener<K extends keyof AuthEventMap>(
    event: K,
    handler: EventHandler<AuthEventMap[K]>
  ): () => void {
    return this.events.subscribe(event, handler);
  }

  removeEventListener<K extends keyof AuthEventMap>(
    event: K,
    handler: EventHandler<AuthEventMap[K]>
  ): void {
    this.events.unsubscribe(event, handler);
  }

  /** Stop background checks, drop listeners and return to the initial state. */
  destroy(): void {
    this.monitor.stop();
    this.events.clear();
    this.reset();
    this.initialized = false;
    sessionLogger.info('Session destroyed');
  }

  /** Returns the frozen profile the session now holds. */
  private establish(token: string, profile: UserProfile): UserProfile {
    const tokenExpiry = extractExpiry(decodeToken(token));
    if (tokenExpiry === null) {
      throw new MalformedTokenError('Token carries no expiry');
    }
    if (!isTokenFresh(tokenExpiry, this.bufferWindow)) {
      throw new ExpiredTokenError('Received token is already expired');
    }

    const user = Object.freeze({ ...profile });
    this.state = { status: 'authenticated', user, token, tokenExpiry };
    try {
      this.store.write(token, user);
    } catch (error) {
      // The in-memory session stays authoritative; it just won't survive a reload
      sessionLogger.warn('Could not persist session', { error: describeError(error) });
      this.clearPersisted();
    }
    this.api.setAuthToken(token);
    return user;
  }

  private reset(): void {
    this.state = UNAUTHENTICATED;
    this.api.setAuthToken(null);
    this.clearPersisted();
  }

  private clearPersisted(): void {
    try {
      this.store.clear();
    } catch (error) {
      sessionLogger.warn('Could not clear persisted session', { error: describeError(error) });
    }
  }

  private restore(): void {
    let record: PersistedSession | null;
    try {
      record = this.store.read();
    } catch (error) {
      sessionLogger.warn('Persisted session unreadable, clearing', { error: describeError(error) });
      this.clearPersisted();
      return;
    }

    if (!record) {
      if (this.hasPartialRecord()) {
        this.clearPersisted();
      }
      return;
    }

    try {
      const tokenExpiry = extractExpiry(decodeToken(record.token));
      if (tokenExpiry !== null && isTokenFresh(tokenExpiry, this.bufferWindow)) {
        const user = Object.freeze({ ...record.user });
        this.state = { status: 'authenticated', user, token: record.token, tokenExpiry };
        this.api.setAuthToken(record.token);
        sessionLogger.info('Session restored', { username: record.user.username });
        return;
      }
      sessionLogger.info('Persisted token expired, clearing');
    } catch (error) {
      sessionLogger.warn('Persisted token malformed, clearing', { error: describeError(error) });
    }

    this.clearPersisted();
  }

  private hasPartialRecord(): boolean {
    try {
      return this.store.hasRecord();
    } catch (error) {
      sessionLogger.warn('Persisted session unreadable', { error: describeError(error) });
      return false;
    }
  }
}
