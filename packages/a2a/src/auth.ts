import type { A2aAuthConfig } from "./types.js";

/** Default header for API-key auth */
export const DEFAULT_API_KEY_HEADER = "X-API-Key";

/**
 * Turn precomputed credentials into request headers. No token exchange or
 * refresh happens here.
 */
export function buildAuthHeaders(auth: A2aAuthConfig | undefined): Record<string, string> {
  if (auth === undefined) return {};

  switch (auth.type) {
    case "bearer":
      return { Authorization: `Bearer ${auth.token}` };
    case "apiKey":
      return { [auth.headerName ?? DEFAULT_API_KEY_HEADER]: auth.apiKey };
  }
}
