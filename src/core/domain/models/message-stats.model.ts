/**
 * Aggregate statistics over the whole message store
 */
export interface MessageStats {
  total: number;
  distinctSenders: number;
  topSenders: SenderCount[];
  earliest: Date | null;
  latest: Date | null;
}

export interface SenderCount {
  sender: string;
  count: number;
}

/**
 * Per-sender aggregate as produced by a grouped query
 */
export interface SenderAggregate extends SenderCount {
  earliest: Date;
  latest: Date;
}

export const TOP_SENDERS_LIMIT = 10;

/**
 * Derive store-wide statistics from per-sender aggregates.
 * Top senders: count descending, ties by sender ascending.
 */
export function summarizeSenders(aggregates: SenderAggregate[]): MessageStats {
  let total = 0;
  let earliest: Date | null = null;
  let latest: Date | null = null;

  for (const aggregate of aggregates) {
    total += aggregate.count;
    if (earliest === null || aggregate.earliest.getTime() < earliest.getTime()) {
      earliest = aggregate.earliest;
    }
    if (latest === null || aggregate.latest.getTime() > latest.getTime()) {
      latest = aggregate.latest;
    }
  }

  const topSenders = aggregates
    .map(({ sender, count }) => ({ sender, count }))
    .sort((a, b) => {
      if (a.count !== b.count) {
        return b.count - a.count;
      }
      if (a.sender === b.sender) {
        return 0;
      }
      return a.sender < b.sender ? -1 : 1;
    })
    .slice(0, TOP_SENDERS_LIMIT);

  return {
    total,
    distinctSenders: aggregates.length,
    topSenders,
    earliest,
    latest,
  };
}
