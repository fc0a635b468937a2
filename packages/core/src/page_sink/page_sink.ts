/**
 * PageSink Interface
 *
 * Destination of the rendered release page. Writes use optimistic
 * concurrency: read the current version, write version + 1, and fail if the
 * destination disagrees.
 */

export type PublishOptions = {
  /** Version comment stored with the new page version */
  versionMessage?: string;
  /** New title; the current title is kept when omitted */
  title?: string;
};

export type PublishResult = {
  pageId: string;
  title: string;
  previousVersion: number;
  version: number;
};

export interface PageSink {
  publish(pageId: string, markup: string, options?: PublishOptions): Promise<PublishResult>;
}
