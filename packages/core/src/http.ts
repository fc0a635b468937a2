/**
 * HTTP implementations for @release-digest/core/http
 *
 * Slack Web API message source and Confluence Cloud page sink.
 * Each takes an optional `fetch` function for testability.
 *
 * Usage:
 *   import { SlackMessageSource, ConfluencePageSink } from '@release-digest/core/http';
 */

// ==================== Shared Types ====================

export type { FetchFn, HttpErrorCode } from './transport';
export { DEFAULT_HTTP_TIMEOUT_MS } from './transport';

// ==================== MessageSource ====================

export { SlackMessageSource, SlackApiError } from './message_source/slack';
export type {
  SlackApiErrorCode,
  SlackMessageSourceOptions,
} from './message_source/slack';

// ==================== PageSink ====================

export { ConfluencePageSink, ConfluenceApiError } from './page_sink/confluence';
export type { ConfluencePageSinkOptions } from './page_sink/confluence';
