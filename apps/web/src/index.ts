import { env } from './config/env';
import { ApiClient } from './lib/api';
import { AuthSession, type AuthSessionOptions } from './lib/auth-session';
import { TaskService } from './services/tasks';

export { ApiClient } from './lib/api';
export type { BatchRequest, HttpMethod, RequestOptions } from './lib/api';
export { AuthSession } from './lib/auth-session';
export type { AuthSessionOptions } from './lib/auth-session';
export { EventBus } from './lib/event-bus';
export type { EventHandler } from './lib/event-bus';
export { ExpiryMonitor, documentVisibility } from './lib/expiry-monitor';
export type { VisibilitySource, VisibilityTarget } from './lib/expiry-monitor';
export { MemoryStorage, SessionStore } from './lib/session-store';
export type { KeyValueStorage } from './lib/session-store';
export { decodeToken, extractExpiry, isTokenFresh, readTokenExpiry } from './lib/token';
export { TaskService, filterTasks } from './services/tasks';
export { AuthProvider, useAuth } from './contexts/AuthContext';
export * from './utils/errors';

export interface TaskpadClient {
  api: ApiClient;
  session: AuthSession;
  tasks: TaskService;
}

/**
 * Wire the gateway, session and task client together and start the session.
 * The caller owns the result and must call `session.destroy()` on teardown.
 */
export function createTaskpadClient(
  options: Omit<AuthSessionOptions, 'apiClient'> & { baseURL?: string } = {}
): TaskpadClient {
  const { baseURL = env.VITE_API_URL, ...sessionOptions } = options;
  const api = new ApiClient(baseURL);
  const session = new AuthSession({ ...sessionOptions, apiClient: api });
  session.init();
  return { api, session, tasks: new TaskService(api, session) };
}
