const API_BASE = "/api";

let accessToken: string | null = localStorage.getItem("accessToken");
let refreshToken: string | null = localStorage.getItem("refreshToken");

export function setTokens(access: string, refresh: string) {
  accessToken = access;
  refreshToken = refresh;
  localStorage.setItem("accessToken", access);
  localStorage.setItem("refreshToken", refresh);
}

export function clearTokens() {
  accessToken = null;
  refreshToken = null;
  localStorage.removeItem("accessToken");
  localStorage.removeItem("refreshToken");
}

export function getAccessToken() {
  return accessToken;
}

export function getRefreshToken() {
  return refreshToken;
}

// Mutex: only one refresh at a time; concurrent callers share the same promise
let refreshPromise: Promise<boolean> | null = null;

async function refreshAccessToken(): Promise<boolean> {
  if (refreshPromise) return refreshPromise;

  refreshPromise = doRefresh();
  try {
    return await refreshPromise;
  } finally {
    refreshPromise = null;
  }
}

async function doRefresh(): Promise<boolean> {
  if (!refreshToken) return false;

  try {
    const res = await fetch(`${API_BASE}/auth/refresh`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ refreshToken }),
    });

    if (!res.ok) {
      clearTokens();
      return false;
    }

    const data: { accessToken: string; refreshToken: string } = await res.json();
    setTokens(data.accessToken, data.refreshToken);
    return true;
  } catch {
    clearTokens();
    return false;
  }
}

export class ApiError extends Error {
  constructor(
    public status: number,
    message: string,
    public errors?: string[],
    public code?: string,
  ) {
    super(message);
  }
}

interface ErrorBody {
  message?: unknown;
  errors?: unknown;
  error?: unknown;
}

async function toApiError(res: Response): Promise<ApiError> {
  const body: ErrorBody = await res.json().catch(() => ({}));
  // Nest puts validation messages in an array under `message`
  const message = Array.isArray(body.message)
    ? body.message.join(", ")
    : typeof body.message === "string"
      ? body.message
      : res.statusText;
  const errors = Array.isArray(body.errors)
    ? body.errors.filter((e): e is string => typeof e === "string")
    : undefined;
  const code = typeof body.error === "string" ? body.error : undefined;
  return new ApiError(res.status, message, errors, code);
}

/** Fetch with the bearer token, retrying once after a token refresh on 401. */
async function authorizedFetch(path: string, options: RequestInit): Promise<Response> {
  const headers = new Headers(options.headers);
  if (accessToken) headers.set("Authorization", `Bearer ${accessToken}`);

  let res = await fetch(`${API_BASE}${path}`, { ...options, headers });

  if (res.status === 401 && refreshToken) {
    const refreshed = await refreshAccessToken();
    if (refreshed && accessToken) {
      headers.set("Authorization", `Bearer ${accessToken}`);
      res = await fetch(`${API_BASE}${path}`, { ...options, headers });
    }
  }
  return res;
}

export async function api<T = unknown>(
  path: string,
  options: RequestInit = {},
): Promise<T> {
  const headers = new Headers(options.headers);
  // Multipart bodies set their own boundary header
  if (!(options.body instanceof FormData)) {
    headers.set("Content-Type", "application/json");
  }

  const res = await authorizedFetch(path, { ...options, headers });

  if (!res.ok) {
    throw await toApiError(res);
  }

  return res.json();
}

export function apiUpload<T>(path: string, file: File): Promise<T> {
  const form = new FormData();
  form.append("file", file);
  return api<T>(path, { method: "POST", body: form });
}

/** Downloads an attachment-style response through a temporary object URL. */
export async function apiDownload(path: string, fallbackName = "vitalog-export.csv"): Promise<void> {
  const res = await authorizedFetch(path, {});

  if (!res.ok) {
    throw await toApiError(res);
  }

  const blob = await res.blob();
  const url = URL.createObjectURL(blob);
  const filename =
    res.headers.get("Content-Disposition")?.match(/filename="(.+)"/)?.[1] ??
    fallbackName;

  const a = document.createElement("a");
  a.href = url;
  a.download = filename;
  a.click();
  URL.revokeObjectURL(url);
}
