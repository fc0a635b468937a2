import type { HttpErrorCode } from '../../transport';

export type ConfluencePageSinkOptions = {
  /** Atlassian account email used for basic auth */
  email: string;
  /** Atlassian API token */
  apiToken: string;
  /** Cloud id of the Confluence site */
  cloudId: string;
  /** Defaults to https://api.atlassian.com */
  apiBaseUrl?: string;
  /** Per-request timeout in milliseconds (default 30000) */
  timeoutMs?: number;
};

/**
 * The part of a Confluence v2 page the sink reads.
 * @see https://developer.atlassian.com/cloud/confluence/rest/v2/api-group-page/
 */
export type ConfluencePage = {
  id: string;
  title: string;
  version: {
    number: number;
  };
};

export type ConfluencePageUpdate = {
  id: string;
  status: 'current';
  title: string;
  body: {
    representation: 'storage';
    value: string;
  };
  version: {
    number: number;
    message: string;
  };
};

export type ConfluenceApiErrorCode = HttpErrorCode;

/**
 * Typed error for Confluence REST calls. Version conflicts use CONFLICT.
 */
export class ConfluenceApiError extends Error {
  constructor(
    message: string,
    /** Semantic error code */
    public readonly code: ConfluenceApiErrorCode,
    /** HTTP status code (if applicable) */
    public readonly statusCode?: number,
  ) {
    super(message);
    this.name = 'ConfluenceApiError';
    Object.setPrototypeOf(this, ConfluenceApiError.prototype);
  }
}
