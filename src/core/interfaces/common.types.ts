/**
 * Common types used across adapters
 */

/**
 * Offset pagination parameters
 */
export interface Pagination {
  limit: number;
  offset: number;
}

/**
 * Paginated result wrapper
 */
export interface PaginatedResult<T> {
  items: T[];
  total: number;
  limit: number;
  offset: number;
}

/**
 * Message listing filter. All predicates are combined with AND;
 * an absent predicate matches everything.
 */
export interface MessageFilter {
  /**
   * Exact sender match
   */
  from?: string;

  /**
   * Inclusive lower bound on message timestamp
   */
  since?: Date;

  /**
   * Case-insensitive substring of the message text
   */
  q?: string;
}

/**
 * Single field violation reported by the validator
 */
export interface FieldError {
  /**
   * Wire field name, or 'body' when the payload itself is unusable
   */
  location: string;
  message: string;
}

/**
 * Options accepted by read queries
 */
export interface QueryOptions {
  timeoutMs?: number;
}
