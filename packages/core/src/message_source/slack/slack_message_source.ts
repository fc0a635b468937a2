/**
 * SlackMessageSource - Slack Web API implementation of MessageSource
 *
 * Reads a channel through conversations.history and conversations.replies.
 *
 * Key behaviors:
 * - Cursor pagination, bounded by maxPages.
 * - Every request has a timeout (AbortSignal.timeout).
 * - Responses are validated before use; any failure is fatal, no retry.
 */

import type { SchemaObject } from 'ajv';
import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import type { RawMessage } from '../../release_types';
import { compileSchema, formatSchemaErrors } from '../../schemas';
import { DEFAULT_HTTP_TIMEOUT_MS, classifyHttpStatus, describeError } from '../../transport';
import type { FetchFn } from '../../transport';
import type { MessageSource } from '../message_source';
import { SlackApiError } from './slack_message_source.types';
import type {
  SlackApiErrorCode,
  SlackConversationPage,
  SlackMessage,
  SlackMessageSourceOptions,
} from './slack_message_source.types';

const SLACK_TS = '^\\d+(\\.\\d+)?$';

const SLACK_PAGE_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['ok'],
  properties: {
    ok: { type: 'boolean' },
    error: { type: 'string' },
    messages: {
      type: 'array',
      items: {
        type: 'object',
        required: ['ts'],
        properties: {
          ts: { type: 'string', pattern: SLACK_TS },
          text: { type: 'string' },
          thread_ts: { type: 'string', pattern: SLACK_TS },
          subtype: { type: 'string' },
        },
      },
    },
    has_more: { type: 'boolean' },
    response_metadata: {
      type: 'object',
      properties: {
        next_cursor: { type: 'string' },
      },
    },
  },
};

const validatePage = compileSchema<SlackConversationPage>(SLACK_PAGE_SCHEMA);

const PERMISSION_ERRORS = new Set(['not_authed', 'invalid_auth', 'account_inactive', 'token_revoked', 'missing_scope', 'not_in_channel']);
const NOT_FOUND_ERRORS = new Set(['channel_not_found', 'thread_not_found', 'message_not_found']);

function codeForSlackError(error: string): SlackApiErrorCode {
  if (PERMISSION_ERRORS.has(error)) {
    return 'PERMISSION_DENIED';
  }
  if (NOT_FOUND_ERRORS.has(error)) {
    return 'NOT_FOUND';
  }
  if (error === 'ratelimited') {
    return 'RATE_LIMITED';
  }
  return 'API_ERROR';
}

export function toRawMessage(message: SlackMessage): RawMessage {
  const raw: RawMessage = {
    id: message.ts,
    text: message.text ?? '',
    ts: Number.parseFloat(message.ts),
  };
  if (message.thread_ts !== undefined) {
    raw.threadTs = Number.parseFloat(message.thread_ts);
  }
  return raw;
}

/**
 * Slack Web API-backed MessageSource.
 *
 * @example
 * ```typescript
 * const source = new SlackMessageSource({ token: 'xoxb-...', channelId: 'C033MFEDQ2C' });
 * const messages = await source.fetchHistory(Date.now() / 1000 - 7 * 86400);
 * ```
 */
export class SlackMessageSource implements MessageSource {
  private readonly token: string;
  private readonly channelId: string;
  private readonly apiBaseUrl: string;
  private readonly pageSize: number;
  private readonly maxPages: number;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: SlackMessageSourceOptions, fetchFn?: FetchFn, logger?: Logger) {
    this.token = options.token;
    this.channelId = options.channelId;
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://slack.com/api';
    this.pageSize = options.pageSize ?? 200;
    this.maxPages = options.maxPages ?? 50;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
    this.logger = logger ?? createLogger('[SlackMessageSource] ');
  }

  async fetchHistory(oldest: number): Promise<RawMessage[]> {
    const messages = await this.fetchAllPages('conversations.history', { oldest: oldest.toFixed(6) });
    this.logger.debug(`Fetched ${messages.length} messages from ${this.channelId}`);
    return messages.map(toRawMessage).sort((a, b) => a.ts - b.ts);
  }

  async fetchReplies(root: RawMessage): Promise<RawMessage[]> {
    const messages = await this.fetchAllPages('conversations.replies', { ts: root.id });
    return messages
      .map(toRawMessage)
      .filter((message) => message.id !== root.id)
      .sort((a, b) => a.ts - b.ts);
  }

  private async fetchAllPages(method: string, params: Record<string, string>): Promise<SlackMessage[]> {
    const messages: SlackMessage[] = [];
    let cursor: string | undefined;

    for (let page = 1; page <= this.maxPages; page++) {
      const body = await this.request(method, { ...params, cursor });
      messages.push(...(body.messages ?? []));

      cursor = body.response_metadata?.next_cursor || undefined;
      if (!cursor) {
        return messages;
      }
    }

    this.logger.warn(`${method} stopped after ${this.maxPages} pages; older messages were not read`);
    return messages;
  }

  private async request(
    method: string,
    params: Record<string, string | undefined>,
  ): Promise<SlackConversationPage> {
    const query = new URLSearchParams({ channel: this.channelId, limit: String(this.pageSize) });
    for (const [key, value] of Object.entries(params)) {
      if (value) {
        query.set(key, value);
      }
    }
    const url = `${this.apiBaseUrl}/${method}?${query.toString()}`;

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error: unknown) {
      throw new SlackApiError(`Network error calling ${method}: ${describeError(error)}`, 'NETWORK_ERROR');
    }

    const httpCode = classifyHttpStatus(response.status);
    if (httpCode !== null) {
      throw new SlackApiError(
        `Slack ${method} failed with HTTP ${response.status}`,
        httpCode === 'CONFLICT' ? 'API_ERROR' : httpCode,
        response.status,
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      throw new SlackApiError(`Invalid JSON from ${method}: ${describeError(error)}`, 'INVALID_RESPONSE', response.status);
    }

    if (!validatePage(body)) {
      throw new SlackApiError(
        `Unexpected ${method} response: ${formatSchemaErrors(validatePage.errors).join('; ')}`,
        'INVALID_RESPONSE',
        response.status,
      );
    }

    if (!body.ok) {
      const slackError = body.error ?? 'unknown_error';
      throw new SlackApiError(`Slack ${method} error: ${slackError}`, codeForSlackError(slackError), response.status, slackError);
    }

    return body;
  }

  private buildHeaders(): Record<string, string> {
    return {
      'Authorization': `Bearer ${this.token}`,
      'Accept': 'application/json',
    };
  }
}
