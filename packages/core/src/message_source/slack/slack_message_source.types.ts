import type { HttpErrorCode } from '../../transport';

export type SlackMessageSourceOptions = {
  /** Bot token with channels:history (or groups:history) scope */
  token: string;
  /** Channel to read, e.g. "C033MFEDQ2C" */
  channelId: string;
  /** Defaults to https://slack.com/api */
  apiBaseUrl?: string;
  /** Messages per page (default 200, the Slack maximum we ask for) */
  pageSize?: number;
  /** Upper bound on pages per call (default 50) */
  maxPages?: number;
  /** Per-request timeout in milliseconds (default 30000) */
  timeoutMs?: number;
};

/**
 * The part of a Slack message object the source reads.
 * @see https://api.slack.com/methods/conversations.history
 */
export type SlackMessage = {
  ts: string;
  text?: string;
  thread_ts?: string;
  subtype?: string;
};

/**
 * One page of conversations.history or conversations.replies.
 */
export type SlackConversationPage = {
  ok: boolean;
  error?: string;
  messages?: SlackMessage[];
  has_more?: boolean;
  response_metadata?: {
    next_cursor?: string;
  };
};

export type SlackApiErrorCode = Exclude<HttpErrorCode, 'CONFLICT'>;

/**
 * Typed error for Slack Web API calls. `slackError` carries Slack's own
 * error string (e.g. "channel_not_found") when the API answered `ok: false`.
 */
export class SlackApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: SlackApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
    /** Slack error string (if applicable) */
    public readonly slackError?: string,
  ) {
    super(message);
    this.name = 'SlackApiError';
    Object.setPrototypeOf(this, SlackApiError.prototype);
  }
}
