export { DEFAULT_HTTP_TIMEOUT_MS } from './transport.types';
export type { FetchFn, HttpErrorCode } from './transport.types';
export { classifyHttpStatus, describeError } from './http_status';
