/**
 * Message domain model - an inbound message accepted through the webhook.
 * Immutable once stored; message_id is the idempotency key.
 */
export class Message {
  constructor(
    public readonly messageId: string,
    public readonly fromAddress: string,
    public readonly toAddress: string,
    public readonly timestamp: Date,
    public readonly text: string | null,
    public readonly ingestedAt: Date,
  ) {}

  /**
   * Build a message from a validated candidate at first persistence
   */
  static fromCandidate(
    candidate: MessageCandidate,
    ingestedAt: Date = new Date(),
  ): Message {
    return new Message(
      candidate.messageId,
      candidate.fromAddress,
      candidate.toAddress,
      candidate.timestamp,
      candidate.text,
      ingestedAt,
    );
  }
}

/**
 * Validated payload, not yet persisted
 */
export interface MessageCandidate {
  messageId: string;
  fromAddress: string;
  toAddress: string;
  timestamp: Date;
  text: string | null;
}

/**
 * Canonical storage form of an instant: fixed-width ISO-8601 UTC,
 * so string order equals chronological order.
 */
export function toStoredTimestamp(date: Date): string {
  return date.toISOString();
}

/**
 * Render an instant for API output. Whole seconds drop the
 * millisecond part (2025-01-15T10:00:00Z).
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return iso.endsWith('.000Z') ? `${iso.slice(0, -5)}Z` : iso;
}

/**
 * Total order used by every listing: timestamp, then message_id
 */
export function compareMessages(a: Message, b: Message): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  if (byTime !== 0) {
    return byTime;
  }
  if (a.messageId === b.messageId) {
    return 0;
  }
  return a.messageId < b.messageId ? -1 : 1;
}
