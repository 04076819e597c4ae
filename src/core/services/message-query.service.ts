import { Message, MessageStats } from '../domain/models';
import {
  MessageFilter,
  MessageStore,
  PaginatedResult,
  QueryOptions,
} from '../interfaces';
import {
  QueryTimeoutError,
  StorageUnavailableError,
  withTimeout,
} from '../utils';

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 100;
export const DEFAULT_QUERY_TIMEOUT_MS = 5000;

/**
 * Listing request as received from a caller
 */
export interface ListMessagesQuery extends MessageFilter {
  limit?: number;
  offset?: number;
}

export interface MessageQueryServiceOptions {
  defaultTimeoutMs?: number;
}

/**
 * Raised for a listing request outside the accepted ranges
 */
export class InvalidQueryError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
    this.name = 'InvalidQueryError';
  }
}

/**
 * Message Query Service
 *
 * Read side of the store: listing, statistics and readiness.
 * Every read is bounded by a timeout.
 */
export class MessageQueryService {
  private readonly defaultTimeoutMs: number;

  constructor(
    private readonly store: MessageStore,
    options: MessageQueryServiceOptions = {},
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS;
  }

  async listMessages(
    query: ListMessagesQuery,
    options: QueryOptions = {},
  ): Promise<PaginatedResult<Message>> {
    const limit = query.limit ?? DEFAULT_LIMIT;
    const offset = query.offset ?? 0;

    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LIMIT) {
      throw new InvalidQueryError(
        `limit must be an integer between 1 and ${MAX_LIMIT}`,
        'limit',
      );
    }
    if (!Number.isInteger(offset) || offset < 0) {
      throw new InvalidQueryError(
        'offset must be a non-negative integer',
        'offset',
      );
    }
    if (query.since && Number.isNaN(query.since.getTime())) {
      throw new InvalidQueryError('since must be a valid instant', 'since');
    }

    const filter: MessageFilter = {
      from: query.from || undefined,
      since: query.since,
      q: query.q || undefined,
    };

    return this.read(
      'list messages',
      this.store.list(filter, { limit, offset }),
      options,
    );
  }

  async getStats(options: QueryOptions = {}): Promise<MessageStats> {
    return this.read('message stats', this.store.stats(), options);
  }

  async isReady(): Promise<boolean> {
    return this.store.isHealthy();
  }

  private async read<T>(
    operation: string,
    query: Promise<T>,
    options: QueryOptions,
  ): Promise<T> {
    try {
      return await withTimeout(
        operation,
        query,
        options.timeoutMs ?? this.defaultTimeoutMs,
      );
    } catch (error) {
      if (error instanceof QueryTimeoutError) {
        throw error;
      }
      throw new StorageUnavailableError(
        operation,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
