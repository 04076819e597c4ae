import {
  MessageStore,
  InsertAttempt,
  InsertOutcome,
  Message,
  MessageCandidate,
  MessageFilter,
  MessageStats,
  Pagination,
  PaginatedResult,
  SenderAggregate,
  compareMessages,
  summarizeSenders,
} from '../../../core';

/**
 * Mock storage adapter for testing
 * In-memory message store with the same ordering and idempotency rules
 * as the database adapter
 */
export class MockStorageAdapter implements MessageStore {
  private messages: Map<string, Message> = new Map();
  private readonly options: Required<MockStorageOptions>;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      throwOnError: false,
      ...options,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  private failIfConfigured(operation: string): void {
    if (this.options.throwOnError) {
      throw new Error(`Mock storage unavailable during ${operation}`);
    }
  }

  // ==================== Message Operations ====================

  async insert(candidate: MessageCandidate): Promise<InsertAttempt> {
    await this.simulateLatency();
    this.failIfConfigured('insert');

    // check and write happen in the same tick
    if (this.messages.has(candidate.messageId)) {
      return {
        outcome: InsertOutcome.ALREADY_EXISTS,
        messageId: candidate.messageId,
      };
    }

    const message = Message.fromCandidate(candidate);
    this.messages.set(message.messageId, message);

    return { outcome: InsertOutcome.CREATED, message };
  }

  async list(
    filter: MessageFilter,
    pagination: Pagination,
  ): Promise<PaginatedResult<Message>> {
    await this.simulateLatency();
    this.failIfConfigured('list');

    const needle = filter.q?.toLowerCase();
    const sinceMs = filter.since?.getTime();

    const matching = Array.from(this.messages.values())
      .filter((m) => !filter.from || m.fromAddress === filter.from)
      .filter((m) => sinceMs === undefined || m.timestamp.getTime() >= sinceMs)
      .filter(
        (m) =>
          !needle ||
          (m.text !== null && m.text.toLowerCase().includes(needle)),
      )
      .sort(compareMessages);

    return {
      items: matching.slice(
        pagination.offset,
        pagination.offset + pagination.limit,
      ),
      total: matching.length,
      limit: pagination.limit,
      offset: pagination.offset,
    };
  }

  async stats(): Promise<MessageStats> {
    await this.simulateLatency();
    this.failIfConfigured('stats');

    const bySender = new Map<string, SenderAggregate>();
    for (const message of this.messages.values()) {
      const aggregate = bySender.get(message.fromAddress);
      if (!aggregate) {
        bySender.set(message.fromAddress, {
          sender: message.fromAddress,
          count: 1,
          earliest: message.timestamp,
          latest: message.timestamp,
        });
        continue;
      }

      aggregate.count++;
      if (message.timestamp.getTime() < aggregate.earliest.getTime()) {
        aggregate.earliest = message.timestamp;
      }
      if (message.timestamp.getTime() > aggregate.latest.getTime()) {
        aggregate.latest = message.timestamp;
      }
    }

    return summarizeSenders(Array.from(bySender.values()));
  }

  async findByMessageId(messageId: string): Promise<Message | null> {
    await this.simulateLatency();
    this.failIfConfigured('findByMessageId');

    return this.messages.get(messageId) ?? null;
  }

  async isHealthy(): Promise<boolean> {
    await this.simulateLatency();
    return !this.options.throwOnError;
  }

  // ==================== Testing Utilities ====================

  /**
   * Clear all data
   */
  clear(): void {
    this.messages.clear();
  }

  /**
   * Get all stored messages in listing order
   */
  getAllMessages(): Message[] {
    return Array.from(this.messages.values()).sort(compareMessages);
  }

  /**
   * Inject test data, bypassing idempotency checks
   */
  injectTestData(messages: Message[]): void {
    for (const message of messages) {
      this.messages.set(message.messageId, message);
    }
  }
}

/**
 * Mock storage configuration options
 */
export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  throwOnError?: boolean;
}
