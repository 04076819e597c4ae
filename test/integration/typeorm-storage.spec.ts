import { DataSource } from 'typeorm';
import {
  InsertOutcome,
  MessageCandidate,
  MessageEntity,
  TypeORMStorageAdapter,
  createDataSource,
} from '../../src';

const candidate = (
  messageId: string,
  overrides: Partial<MessageCandidate> = {},
): MessageCandidate => ({
  messageId,
  fromAddress: '+111',
  toAddress: '+14155550100',
  timestamp: new Date('2025-01-15T10:00:00Z'),
  text: 'Hello',
  ...overrides,
});

describe('TypeORMStorageAdapter (sqlite in memory)', () => {
  let dataSource: DataSource;
  let store: TypeORMStorageAdapter;

  beforeAll(async () => {
    dataSource = createDataSource('sqlite:///:memory:', {
      synchronize: true,
      logging: false,
    });
    await dataSource.initialize();
    store = new TypeORMStorageAdapter(dataSource);
  });

  afterAll(async () => {
    await store.close();
  });

  beforeEach(async () => {
    await dataSource.getRepository(MessageEntity).clear();
  });

  describe('insert', () => {
    it('should create once and report later inserts as existing', async () => {
      const first = await store.insert(candidate('m1', { text: 'first' }));
      const second = await store.insert(candidate('m1', { text: 'second' }));

      expect(first.outcome).toBe(InsertOutcome.CREATED);
      expect(second).toEqual({
        outcome: InsertOutcome.ALREADY_EXISTS,
        messageId: 'm1',
      });
      expect((await store.findByMessageId('m1'))?.text).toBe('first');
    });

    it('should create exactly one row under concurrent inserts', async () => {
      const attempts = await Promise.all(
        Array.from({ length: 5 }, () => store.insert(candidate('race'))),
      );

      expect(
        attempts.filter((a) => a.outcome === InsertOutcome.CREATED),
      ).toHaveLength(1);
      expect((await store.list({}, { limit: 10, offset: 0 })).total).toBe(1);
    });

    it('should round-trip null text and millisecond timestamps', async () => {
      await store.insert(
        candidate('m1', {
          text: null,
          timestamp: new Date('2025-01-15T10:00:00.250Z'),
        }),
      );

      const stored = await store.findByMessageId('m1');
      expect(stored?.text).toBeNull();
      expect(stored?.timestamp.toISOString()).toBe('2025-01-15T10:00:00.250Z');
    });

    it('should return null for an unknown id', async () => {
      expect(await store.findByMessageId('missing')).toBeNull();
    });
  });

  describe('list', () => {
    beforeEach(async () => {
      await store.insert(candidate('b', { timestamp: new Date('2025-01-15T10:00:00Z'), text: '50% off' }));
      await store.insert(candidate('a', { timestamp: new Date('2025-01-15T10:00:00Z'), text: 'snake_case' }));
      await store.insert(
        candidate('c', {
          fromAddress: '+222',
          timestamp: new Date('2025-01-14T08:00:00Z'),
          text: 'HELLO world',
        }),
      );
      await store.insert(
        candidate('d', {
          fromAddress: '+222',
          timestamp: new Date('2025-01-16T08:00:00Z'),
          text: null,
        }),
      );
    });

    it('should order by timestamp then message_id', async () => {
      const page = await store.list({}, { limit: 50, offset: 0 });

      expect(page.items.map((m) => m.messageId)).toEqual(['c', 'a', 'b', 'd']);
      expect(page.total).toBe(4);
    });

    it('should window the ordered set and keep the full total', async () => {
      const page = await store.list({}, { limit: 1, offset: 2 });

      expect(page.items.map((m) => m.messageId)).toEqual(['b']);
      expect(page).toMatchObject({ total: 4, limit: 1, offset: 2 });
    });

    it('should filter by sender and inclusive since', async () => {
      const bySender = await store.list({ from: '+222' }, { limit: 50, offset: 0 });
      const bySince = await store.list(
        { since: new Date('2025-01-15T10:00:00Z') },
        { limit: 50, offset: 0 },
      );

      expect(bySender.items.map((m) => m.messageId)).toEqual(['c', 'd']);
      expect(bySince.items.map((m) => m.messageId)).toEqual(['a', 'b', 'd']);
    });

    it('should search text case-insensitively', async () => {
      const page = await store.list({ q: 'hello' }, { limit: 50, offset: 0 });

      expect(page.items.map((m) => m.messageId)).toEqual(['c']);
    });

    it('should fold non-ASCII letters when searching', async () => {
      await store.insert(candidate('e', { text: 'CAFÉ AU LAIT' }));

      const page = await store.list({ q: 'café' }, { limit: 50, offset: 0 });

      expect(page.items.map((m) => m.messageId)).toEqual(['e']);
    });

    it('should treat LIKE wildcards in q as literals', async () => {
      const percent = await store.list({ q: '%' }, { limit: 50, offset: 0 });
      const underscore = await store.list({ q: '_' }, { limit: 50, offset: 0 });

      expect(percent.items.map((m) => m.messageId)).toEqual(['b']);
      expect(underscore.items.map((m) => m.messageId)).toEqual(['a']);
    });
  });

  describe('stats', () => {
    it('should summarise all rows', async () => {
      await store.insert(candidate('m1', { timestamp: new Date('2025-01-15T09:00:00Z') }));
      await store.insert(candidate('m2', { timestamp: new Date('2025-01-15T11:00:00Z') }));
      await store.insert(candidate('m3', { fromAddress: '+222' }));

      expect(await store.stats()).toEqual({
        total: 3,
        distinctSenders: 2,
        topSenders: [
          { sender: '+111', count: 2 },
          { sender: '+222', count: 1 },
        ],
        earliest: new Date('2025-01-15T09:00:00Z'),
        latest: new Date('2025-01-15T11:00:00Z'),
      });
    });

    it('should report an empty table', async () => {
      expect(await store.stats()).toEqual({
        total: 0,
        distinctSenders: 0,
        topSenders: [],
        earliest: null,
        latest: null,
      });
    });
  });

  it('should be healthy while the connection is open', async () => {
    expect(await store.isHealthy()).toBe(true);
  });

  it('should not be healthy once closed', async () => {
    const other = createDataSource('sqlite:///:memory:', { logging: false });
    await other.initialize();
    const closing = new TypeORMStorageAdapter(other);

    await closing.close();

    expect(await closing.isHealthy()).toBe(false);
  });
});
