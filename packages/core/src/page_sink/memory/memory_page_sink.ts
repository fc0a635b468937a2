/**
 * MemoryPageSink - In-memory implementation of PageSink
 *
 * Keeps every page with its version history so tests can assert what was
 * published. Unknown pages are NOT_FOUND, like the real sink.
 */

import { ConfluenceApiError } from '../confluence/confluence_page_sink.types';
import type { PageSink, PublishOptions, PublishResult } from '../page_sink';

export type MemoryPage = {
  title: string;
  version: number;
  markup: string;
  versionMessages: string[];
};

export class MemoryPageSink implements PageSink {
  private readonly pages = new Map<string, MemoryPage>();
  private conflictOnNextPublish = false;

  async publish(pageId: string, markup: string, options: PublishOptions = {}): Promise<PublishResult> {
    const page = this.pages.get(pageId);
    if (!page) {
      throw new ConfluenceApiError(`GET page ${pageId} failed with HTTP 404`, 'NOT_FOUND', 404);
    }
    if (this.conflictOnNextPublish) {
      this.conflictOnNextPublish = false;
      throw new ConfluenceApiError(`Conflict writing page ${pageId} (version changed)`, 'CONFLICT', 409);
    }

    const previousVersion = page.version;
    const updated: MemoryPage = {
      title: options.title ?? page.title,
      version: previousVersion + 1,
      markup,
      versionMessages: [...page.versionMessages, options.versionMessage ?? 'Automatic update'],
    };
    this.pages.set(pageId, updated);

    return { pageId, title: updated.title, previousVersion, version: updated.version };
  }

  // ==================== Test Helper Methods ====================

  /**
   * Creates or replaces a page (for test setup).
   */
  setPage(pageId: string, title: string, version: number = 1, markup: string = ''): void {
    this.pages.set(pageId, { title, version, markup, versionMessages: [] });
  }

  getPage(pageId: string): MemoryPage | null {
    return this.pages.get(pageId) ?? null;
  }

  /**
   * Makes the next publish fail with CONFLICT, as if someone else saved first.
   */
  failNextPublishWithConflict(): void {
    this.conflictOnNextPublish = true;
  }
}
