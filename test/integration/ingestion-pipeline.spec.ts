import {
  IngestionAbortedError,
  IngestionPipeline,
  IngestionResult,
  MockStorageAdapter,
  PipelineError,
  SignedEventFactory,
} from '../../src';

const SECRET = SignedEventFactory.DEFAULT_SECRET;

describe('IngestionPipeline', () => {
  let store: MockStorageAdapter;
  let pipeline: IngestionPipeline;

  beforeEach(() => {
    store = new MockStorageAdapter();
    pipeline = new IngestionPipeline({ store });
  });

  describe('accepted deliveries', () => {
    it('should create a message on first delivery', async () => {
      const event = SignedEventFactory.message({ message_id: 'm1' });

      const outcome = await pipeline.handle(event.body, event.signature, SECRET);

      expect(outcome.result).toBe(IngestionResult.CREATED);
      const stored = await store.findByMessageId('m1');
      expect(stored?.fromAddress).toBe('+919876543210');
      expect(stored?.toAddress).toBe('+14155550100');
      expect(stored?.timestamp.toISOString()).toBe('2025-01-15T10:00:00.000Z');
      expect(stored?.text).toBe('Hello');
    });

    it('should report a redelivery as duplicate and keep the first copy', async () => {
      const first = SignedEventFactory.message({ message_id: 'm1', text: 'first' });
      const second = SignedEventFactory.message({ message_id: 'm1', text: 'second' });

      await pipeline.handle(first.body, first.signature, SECRET);
      const outcome = await pipeline.handle(second.body, second.signature, SECRET);

      expect(outcome).toEqual({
        result: IngestionResult.DUPLICATE,
        messageId: 'm1',
      });
      expect((await store.findByMessageId('m1'))?.text).toBe('first');
      expect(store.getAllMessages()).toHaveLength(1);
    });

    it('should create exactly once under concurrent deliveries', async () => {
      const event = SignedEventFactory.message({ message_id: 'race' });

      const outcomes = await Promise.all(
        Array.from({ length: 10 }, () =>
          pipeline.handle(event.body, event.signature, SECRET),
        ),
      );

      const created = outcomes.filter((o) => o.result === IngestionResult.CREATED);
      const duplicates = outcomes.filter((o) => o.result === IngestionResult.DUPLICATE);
      expect(created).toHaveLength(1);
      expect(duplicates).toHaveLength(9);
    });
  });

  describe('rejected deliveries', () => {
    it('should reject a bad signature before decoding the body', async () => {
      const event = SignedEventFactory.raw('{not json');

      const outcome = await pipeline.handle(event.body, 'deadbeef', SECRET);

      expect(outcome).toEqual({ result: IngestionResult.INVALID_SIGNATURE });
    });

    it('should reject a missing signature', async () => {
      const event = SignedEventFactory.message();

      const outcome = await pipeline.handle(event.body, undefined, SECRET);

      expect(outcome.result).toBe(IngestionResult.INVALID_SIGNATURE);
      expect(store.getAllMessages()).toHaveLength(0);
    });

    it('should reject a body signed with another secret', async () => {
      const event = SignedEventFactory.message({}, { secret: 'other-secret' });

      const outcome = await pipeline.handle(event.body, event.signature, SECRET);

      expect(outcome.result).toBe(IngestionResult.INVALID_SIGNATURE);
    });

    it('should reject every delivery when no secret is configured', async () => {
      const event = SignedEventFactory.message({}, { secret: '' });

      const outcome = await pipeline.handle(event.body, event.signature, '');

      expect(outcome.result).toBe(IngestionResult.INVALID_SIGNATURE);
    });

    it('should return field errors without writing', async () => {
      const event = SignedEventFactory.message({ message_id: 'm1', from: 'nope' });

      const outcome = await pipeline.handle(event.body, event.signature, SECRET);

      expect(outcome).toEqual({
        result: IngestionResult.VALIDATION_ERROR,
        errors: [{ location: 'from', message: 'from must be + followed by digits' }],
      });
      expect(store.getAllMessages()).toHaveLength(0);
    });

    it('should report malformed JSON as a body error', async () => {
      const event = SignedEventFactory.raw('{"message_id":');

      const outcome = await pipeline.handle(event.body, event.signature, SECRET);

      expect(outcome.result).toBe(IngestionResult.VALIDATION_ERROR);
      if (outcome.result === IngestionResult.VALIDATION_ERROR) {
        expect(outcome.errors).toHaveLength(1);
        expect(outcome.errors[0].location).toBe('body');
      }
    });
  });

  describe('failures', () => {
    it('should raise a persist PipelineError when storage fails', async () => {
      const onError = jest.fn();
      pipeline = new IngestionPipeline({
        store: new MockStorageAdapter({ throwOnError: true }),
        hooks: { onError },
      });
      const event = SignedEventFactory.message({ message_id: 'm1' });

      const failure = pipeline.handle(event.body, event.signature, SECRET, {
        processingId: 'req-9',
      });

      await expect(failure).rejects.toBeInstanceOf(PipelineError);
      await expect(failure).rejects.toMatchObject({ stage: 'persist' });
      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][1]).toEqual({
        operation: 'message-ingestion',
        stage: 'persist',
        processingId: 'req-9',
        messageId: 'm1',
      });
    });

    it('should not insert once the request is aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const event = SignedEventFactory.message({ message_id: 'm1' });

      await expect(
        pipeline.handle(event.body, event.signature, SECRET, {
          signal: controller.signal,
        }),
      ).rejects.toBeInstanceOf(IngestionAbortedError);
      expect(await store.findByMessageId('m1')).toBeNull();
    });
  });

  describe('hooks', () => {
    it('should emit one outcome event per delivery', async () => {
      const onOutcome = jest.fn();
      pipeline = new IngestionPipeline({ store, hooks: { onOutcome } });
      const event = SignedEventFactory.message({ message_id: 'm1' });

      await pipeline.handle(event.body, event.signature, SECRET, {
        processingId: 'req-1',
      });

      expect(onOutcome).toHaveBeenCalledTimes(1);
      expect(onOutcome.mock.calls[0][0]).toMatchObject({
        result: IngestionResult.CREATED,
        processingId: 'req-1',
        messageId: 'm1',
        errorCount: undefined,
      });
    });

    it('should count field errors on validation outcomes', async () => {
      const onOutcome = jest.fn();
      pipeline = new IngestionPipeline({ store, hooks: { onOutcome } });
      const event = SignedEventFactory.message({ from: 'x', to: 'y' });

      await pipeline.handle(event.body, event.signature, SECRET);

      expect(onOutcome.mock.calls[0][0]).toMatchObject({
        result: IngestionResult.VALIDATION_ERROR,
        errorCount: 2,
      });
    });

    it('should keep the outcome when a hook throws', async () => {
      pipeline = new IngestionPipeline({
        store,
        hooks: {
          onOutcome: () => {
            throw new Error('hook exploded');
          },
        },
      });
      const event = SignedEventFactory.message({ message_id: 'm1' });

      const outcome = await pipeline.handle(event.body, event.signature, SECRET);

      expect(outcome.result).toBe(IngestionResult.CREATED);
    });
  });

  it('should list its stages in order', () => {
    expect(pipeline.getStatistics().stages).toEqual([
      'verification',
      'validation',
      'persist',
    ]);
  });
});
