/**
 * Shared types for the HTTP-backed adapters (Slack message source,
 * Confluence page sink).
 */

/**
 * HTTP fetch function signature for dependency injection (testability).
 * Defaults to globalThis.fetch in production.
 * In tests, inject a mock function to avoid real HTTP calls.
 */
export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

/**
 * Semantic error codes shared by every HTTP adapter.
 */
export type HttpErrorCode =
  | 'PERMISSION_DENIED'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'RATE_LIMITED'
  | 'SERVER_ERROR'
  | 'NETWORK_ERROR'
  | 'INVALID_RESPONSE'
  | 'API_ERROR';

export const DEFAULT_HTTP_TIMEOUT_MS = 30000;
