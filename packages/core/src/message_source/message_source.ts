/**
 * MessageSource Interface
 *
 * Abstraction over the chat channel a run reads from. The Slack
 * implementation talks HTTP; the memory implementation backs tests and the
 * offline `parse` command.
 */

import type { RawMessage } from '../release_types';

export interface MessageSource {
  /**
   * Every message posted since `oldest` (seconds), all pages, oldest first.
   * Replies may be included; callers skip them.
   */
  fetchHistory(oldest: number): Promise<RawMessage[]>;

  /**
   * Replies of a thread root, root excluded, oldest first.
   */
  fetchReplies(root: RawMessage): Promise<RawMessage[]>;
}
