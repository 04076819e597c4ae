import { Message, MessageCandidate, MessageStats } from '../domain/models';
import { InsertOutcome } from '../domain/enums';
import { MessageFilter, Pagination, PaginatedResult } from './common.types';

/**
 * Outcome of an insert-if-absent
 */
export type InsertAttempt =
  | { outcome: InsertOutcome.CREATED; message: Message }
  | { outcome: InsertOutcome.ALREADY_EXISTS; messageId: string };

/**
 * Message store contract - implemented by database adapters.
 *
 * Implementations own idempotency: concurrent inserts of the same
 * message_id must produce exactly one CREATED.
 */
export interface MessageStore {
  /**
   * Insert the candidate unless its message_id is already stored.
   * A uniqueness conflict is reported as ALREADY_EXISTS, never thrown.
   */
  insert(candidate: MessageCandidate): Promise<InsertAttempt>;

  /**
   * Ordered window of matching messages (timestamp ASC, message_id ASC)
   * plus the total match count ignoring the window.
   */
  list(
    filter: MessageFilter,
    pagination: Pagination,
  ): Promise<PaginatedResult<Message>>;

  /**
   * Store-wide aggregates computed from a single snapshot
   */
  stats(): Promise<MessageStats>;

  findByMessageId(messageId: string): Promise<Message | null>;

  /**
   * Cheap round trip to the backing store. Never throws.
   */
  isHealthy(): Promise<boolean>;

  /**
   * Release connections on shutdown
   */
  close?(): Promise<void>;
}
