import { createContext, useContext, useState, useEffect, useCallback, type ReactNode } from 'react';
import type { AuthResult, UserProfile } from '@taskpad/shared';
import type { AuthSession } from '../lib/auth-session';

interface AuthState {
  user: UserProfile | null;
  isAuthenticated: boolean;
}

interface AuthContextType extends AuthState {
  login: (username: string, password: string) => Promise<AuthResult>;
  register: (username: string, password: string, confirmPassword: string) => Promise<AuthResult>;
  logout: () => void;
}

const AuthContext = createContext<AuthContextType | null>(null);

function readState(session: AuthSession): AuthState {
  const user = session.getCurrentUser();
  return { user, isAuthenticated: user !== null };
}

export function AuthProvider({ session, children }: { session: AuthSession; children: ReactNode }) {
  const [state, setState] = useState<AuthState>(() => readState(session));

  // Mirror every session transition into React state
  useEffect(() => {
    const sync = () => setState(readState(session));
    sync();

    const unsubscribers = [
      session.addEventListener('login', sync),
      session.addEventListener('logout', sync),
      session.addEventListener('tokenExpired', sync),
    ];
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }, [session]);

  const login = useCallback(
    (username: string, password: string) => session.login(username, password),
    [session]
  );

  const register = useCallback(
    (username: string, password: string, confirmPassword: string) =>
      session.register(username, password, confirmPassword),
    [session]
  );

  const logout = useCallback(() => session.logout(), [session]);

  return (
    <AuthContext.Provider value={{ ...state, login, register, logout }}>
      {children}
    </AuthContext.Provider>
  );
}

export function useAuth() {
  const context = useContext(AuthContext);
  if (!context) {
    throw new Error('useAuth must be used within an AuthProvider');
  }
  return context;
}
