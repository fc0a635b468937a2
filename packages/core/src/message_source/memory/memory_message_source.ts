/**
 * MemoryMessageSource - In-memory implementation of MessageSource
 *
 * Backs tests and the offline `parse` command. Roots, standalone posts and
 * replies are seeded together; thread membership comes from `threadTs`.
 */

import type { MessageSource } from '../message_source';
import { messageRole } from '../../release_types';
import type { RawMessage } from '../../release_types';

/**
 * @example
 * ```typescript
 * const source = new MemoryMessageSource([
 *   { id: '100.0', text: 'Spades\nVersion: 2.5.3', ts: 100, threadTs: 100 },
 *   { id: '101.0', text: 'Android 2.5.3 is live', ts: 101, threadTs: 100 },
 * ]);
 * ```
 */
export class MemoryMessageSource implements MessageSource {
  private readonly messages: RawMessage[] = [];
  private failure: Error | null = null;
  private readonly replyRequests: string[] = [];

  constructor(messages: readonly RawMessage[] = []) {
    this.addMessages(...messages);
  }

  /**
   * Top-level messages newer than `oldest`; replies stay inside their thread.
   */
  async fetchHistory(oldest: number): Promise<RawMessage[]> {
    this.throwIfFailing();
    return this.messages
      .filter((message) => message.ts > oldest && messageRole(message) !== 'reply')
      .sort((a, b) => a.ts - b.ts);
  }

  async fetchReplies(root: RawMessage): Promise<RawMessage[]> {
    this.throwIfFailing();
    this.replyRequests.push(root.id);
    return this.messages
      .filter((message) => message.threadTs === root.ts && message.id !== root.id)
      .sort((a, b) => a.ts - b.ts);
  }

  // ==================== Test Helper Methods ====================

  addMessages(...messages: RawMessage[]): void {
    this.messages.push(...messages.map((message) => ({ ...message })));
  }

  /**
   * Makes every following call reject with `error`; null restores normal behavior.
   */
  setFailure(error: Error | null): void {
    this.failure = error;
  }

  /**
   * Root ids whose replies were requested, in call order.
   */
  getReplyRequests(): string[] {
    return [...this.replyRequests];
  }

  private throwIfFailing(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}
