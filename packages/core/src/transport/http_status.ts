import type { HttpErrorCode } from './transport.types';

/**
 * Maps a non-success HTTP status to a semantic error code; null for 2xx.
 */
export function classifyHttpStatus(status: number): HttpErrorCode | null {
  if (status >= 200 && status < 300) {
    return null;
  }
  if (status === 401 || status === 403) {
    return 'PERMISSION_DENIED';
  }
  if (status === 404) {
    return 'NOT_FOUND';
  }
  if (status === 409) {
    return 'CONFLICT';
  }
  if (status === 429) {
    return 'RATE_LIMITED';
  }
  if (status >= 500) {
    return 'SERVER_ERROR';
  }
  return 'API_ERROR';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
