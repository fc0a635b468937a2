/**
 * ConfluencePageSink - Confluence Cloud REST v2 implementation of PageSink
 *
 * Key behaviors:
 * - publish: GET the page for its title and version, PUT the new body in
 *   storage representation with version + 1.
 * - A 409, or a saved version other than the one written, is a CONFLICT.
 * - No retry: a failed publish leaves the page as it was.
 */

import type { SchemaObject } from 'ajv';
import type { Logger } from '../../logger';
import { createLogger } from '../../logger';
import { compileSchema, formatSchemaErrors } from '../../schemas';
import { DEFAULT_HTTP_TIMEOUT_MS, classifyHttpStatus, describeError } from '../../transport';
import type { FetchFn } from '../../transport';
import type { PageSink, PublishOptions, PublishResult } from '../page_sink';
import { ConfluenceApiError } from './confluence_page_sink.types';
import type { ConfluencePage, ConfluencePageSinkOptions, ConfluencePageUpdate } from './confluence_page_sink.types';

const CONFLUENCE_PAGE_SCHEMA: SchemaObject = {
  type: 'object',
  required: ['id', 'title', 'version'],
  properties: {
    id: { type: 'string' },
    title: { type: 'string' },
    version: {
      type: 'object',
      required: ['number'],
      properties: {
        number: { type: 'integer', minimum: 1 },
      },
    },
  },
};

const validatePage = compileSchema<ConfluencePage>(CONFLUENCE_PAGE_SCHEMA);

/**
 * @example
 * ```typescript
 * const sink = new ConfluencePageSink({ email: 'bot@example.com', apiToken: '...', cloudId: '...' });
 * const result = await sink.publish('123456', markup, { versionMessage: 'Automatic update' });
 * ```
 */
export class ConfluencePageSink implements PageSink {
  private readonly email: string;
  private readonly apiToken: string;
  private readonly cloudId: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(options: ConfluencePageSinkOptions, fetchFn?: FetchFn, logger?: Logger) {
    this.email = options.email;
    this.apiToken = options.apiToken;
    this.cloudId = options.cloudId;
    this.apiBaseUrl = options.apiBaseUrl ?? 'https://api.atlassian.com';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
    this.fetchFn = fetchFn ?? globalThis.fetch.bind(globalThis);
    this.logger = logger ?? createLogger('[ConfluencePageSink] ');
  }

  async publish(pageId: string, markup: string, options: PublishOptions = {}): Promise<PublishResult> {
    const current = await this.request(pageId, 'GET');
    const expectedVersion = current.version.number + 1;

    const update: ConfluencePageUpdate = {
      id: pageId,
      status: 'current',
      title: options.title ?? current.title,
      body: { representation: 'storage', value: markup },
      version: {
        number: expectedVersion,
        message: options.versionMessage ?? 'Automatic update',
      },
    };

    const saved = await this.request(pageId, 'PUT', update);
    if (saved.version.number !== expectedVersion) {
      throw new ConfluenceApiError(
        `Version mismatch on page ${pageId}: wrote v${expectedVersion}, page is at v${saved.version.number}`,
        'CONFLICT',
      );
    }

    this.logger.info(`Updated page ${pageId} (v${current.version.number} → v${saved.version.number})`);
    return {
      pageId,
      title: saved.title,
      previousVersion: current.version.number,
      version: saved.version.number,
    };
  }

  private pageUrl(pageId: string): string {
    return `${this.apiBaseUrl}/ex/confluence/${encodeURIComponent(this.cloudId)}/wiki/api/v2/pages/${encodeURIComponent(pageId)}`;
  }

  private async request(pageId: string, method: 'GET' | 'PUT', payload?: ConfluencePageUpdate): Promise<ConfluencePage> {
    const init: RequestInit = {
      method,
      headers: this.buildHeaders(),
      signal: AbortSignal.timeout(this.timeoutMs),
    };
    if (payload) {
      init.body = JSON.stringify(payload);
    }

    let response: Response;
    try {
      response = await this.fetchFn(this.pageUrl(pageId), init);
    } catch (error: unknown) {
      throw new ConfluenceApiError(`Network error on ${method} page ${pageId}: ${describeError(error)}`, 'NETWORK_ERROR');
    }

    const code = classifyHttpStatus(response.status);
    if (code === 'CONFLICT') {
      throw new ConfluenceApiError(`Conflict writing page ${pageId} (version changed)`, code, response.status);
    }
    if (code !== null) {
      throw new ConfluenceApiError(`${method} page ${pageId} failed with HTTP ${response.status}`, code, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error: unknown) {
      throw new ConfluenceApiError(`Invalid JSON from ${method} page ${pageId}: ${describeError(error)}`, 'INVALID_RESPONSE', response.status);
    }

    if (!validatePage(body)) {
      throw new ConfluenceApiError(
        `Unexpected page payload: ${formatSchemaErrors(validatePage.errors).join('; ')}`,
        'INVALID_RESPONSE',
        response.status,
      );
    }
    return body;
  }

  private buildHeaders(): Record<string, string> {
    const credentials = Buffer.from(`${this.email}:${this.apiToken}`).toString('base64');
    return {
      'Authorization': `Basic ${credentials}`,
      'Accept': 'application/json',
      'Content-Type': 'application/json',
    };
  }
}
