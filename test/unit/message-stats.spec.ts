import {
  Message,
  compareMessages,
  formatTimestamp,
  summarizeSenders,
} from '../../src';

const at = (iso: string): Date => new Date(iso);

describe('summarizeSenders', () => {
  it('should return zeros and no timestamps for no senders', () => {
    expect(summarizeSenders([])).toEqual({
      total: 0,
      distinctSenders: 0,
      topSenders: [],
      earliest: null,
      latest: null,
    });
  });

  it('should derive totals, top senders and the time range', () => {
    const stats = summarizeSenders([
      {
        sender: '+2',
        count: 1,
        earliest: at('2025-01-15T11:00:00Z'),
        latest: at('2025-01-15T11:00:00Z'),
      },
      {
        sender: '+1',
        count: 3,
        earliest: at('2025-01-15T09:00:00Z'),
        latest: at('2025-01-15T12:00:00Z'),
      },
    ]);

    expect(stats).toEqual({
      total: 4,
      distinctSenders: 2,
      topSenders: [
        { sender: '+1', count: 3 },
        { sender: '+2', count: 1 },
      ],
      earliest: at('2025-01-15T09:00:00Z'),
      latest: at('2025-01-15T12:00:00Z'),
    });
  });

  it('should break count ties by sender ascending and keep ten', () => {
    const aggregates = Array.from({ length: 12 }, (_, i) => ({
      sender: `+${String(i).padStart(2, '0')}`,
      count: i < 2 ? 5 : 1,
      earliest: at('2025-01-15T10:00:00Z'),
      latest: at('2025-01-15T10:00:00Z'),
    })).reverse();

    const stats = summarizeSenders(aggregates);

    expect(stats.distinctSenders).toBe(12);
    expect(stats.total).toBe(20);
    expect(stats.topSenders.map((s) => s.sender)).toEqual([
      '+00', '+01', '+02', '+03', '+04', '+05', '+06', '+07', '+08', '+09',
    ]);
  });
});

describe('message ordering and formatting', () => {
  const message = (id: string, ts: string): Message =>
    new Message(id, '+1', '+2', at(ts), null, at('2025-01-16T00:00:00Z'));

  it('should order by timestamp then message_id', () => {
    const sorted = [
      message('b', '2025-01-15T10:00:00Z'),
      message('c', '2025-01-15T09:00:00Z'),
      message('a', '2025-01-15T10:00:00Z'),
    ].sort(compareMessages);

    expect(sorted.map((m) => m.messageId)).toEqual(['c', 'a', 'b']);
  });

  it('should render whole seconds without milliseconds', () => {
    expect(formatTimestamp(at('2025-01-15T10:00:00Z'))).toBe(
      '2025-01-15T10:00:00Z',
    );
    expect(formatTimestamp(at('2025-01-15T10:00:00.250Z'))).toBe(
      '2025-01-15T10:00:00.250Z',
    );
  });
});
