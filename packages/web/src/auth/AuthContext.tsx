import {
  createContext,
  useContext,
  useState,
  useEffect,
  useCallback,
  type ReactNode,
} from "react";
import { api, ApiError, setTokens, clearTokens, getAccessToken, getRefreshToken } from "../api/client";
import type { UserResponse, AuthTokens } from "@vitalog/shared";

interface AuthState {
  user: UserResponse | null;
  loading: boolean;
  login: (email: string, password: string) => Promise<void>;
  register: (email: string, password: string, name?: string) => Promise<void>;
  logout: () => void;
  setUser: (user: UserResponse) => void;
}

const AuthContext = createContext<AuthState | null>(null);

function readCachedUser(): UserResponse | null {
  try {
    const cached = localStorage.getItem("cachedUser");
    return cached ? JSON.parse(cached) : null;
  } catch {
    return null;
  }
}

export function AuthProvider({ children }: { children: ReactNode }) {
  const [user, setUserState] = useState<UserResponse | null>(readCachedUser);
  const [loading, setLoading] = useState(true);

  const setUser = useCallback((u: UserResponse) => {
    setUserState(u);
    localStorage.setItem("cachedUser", JSON.stringify(u));
  }, []);

  const fetchUser = useCallback(async () => {
    if (!getAccessToken()) {
      setLoading(false);
      return;
    }
    try {
      setUser(await api<UserResponse>("/users/me"));
    } catch (err) {
      if (err instanceof ApiError && err.status === 401) {
        clearTokens();
        localStorage.removeItem("cachedUser");
        setUserState(null);
      }
      // On 5xx/network: keep cached user + tokens, session survives server restarts
    } finally {
      setLoading(false);
    }
  }, [setUser]);

  useEffect(() => {
    void fetchUser();
  }, [fetchUser]);

  const login = async (email: string, password: string) => {
    const tokens = await api<AuthTokens>("/auth/login", {
      method: "POST",
      body: JSON.stringify({ email, password }),
    });
    setTokens(tokens.accessToken, tokens.refreshToken);
    await fetchUser();
  };

  const register = async (email: string, password: string, name?: string) => {
    const tokens = await api<AuthTokens>("/auth/register", {
      method: "POST",
      body: JSON.stringify({ email, password, name }),
    });
    setTokens(tokens.accessToken, tokens.refreshToken);
    await fetchUser();
  };

  const logout = () => {
    const rt = getRefreshToken();
    if (rt) {
      api("/auth/logout", {
        method: "POST",
        body: JSON.stringify({ refreshToken: rt }),
      }).catch(() => undefined);
    }
    clearTokens();
    localStorage.removeItem("cachedUser");
    setUserState(null);
  };

  return (
    <AuthContext.Provider value={{ user, loading, login, register, logout, setUser }}>
      {children}
    </AuthContext.Provider>
  );
}

export function useAuth(): AuthState {
  const ctx = useContext(AuthContext);
  if (!ctx) throw new Error("useAuth must be used inside AuthProvider");
  return ctx;
}
