import type { UserProfile } from '../schemas/auth';

export interface Session {
  isAuthenticated: boolean;
  currentUser: UserProfile | null;
  token: string | null;
  tokenExpiry: number | null;   // ms since epoch
}

export interface AuthResult {
  success: true;
  user: UserProfile;
  message: string;
}

export interface PersistedSession {
  token: string;
  user: UserProfile;
}

export type AuthEventMap = {
  login: { user: UserProfile };
  logout: Record<string, never>;
  register: { user: UserProfile };
  loginError: { error: string };
  registerError: { error: string };
  tokenExpired: Record<string, never>;
};

export type AuthEventName = keyof AuthEventMap;
