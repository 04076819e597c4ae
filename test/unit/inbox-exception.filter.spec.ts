import { ExecutionContextHost } from '@nestjs/core/helpers/execution-context-host';
import {
  IngestionAbortedError,
  InboxExceptionFilter,
  InvalidQueryError,
  PipelineError,
  QueryTimeoutError,
  StorageUnavailableError,
} from '../../src';

describe('InboxExceptionFilter', () => {
  const filter = new InboxExceptionFilter();

  it('should map invalid queries to a 422 with the query location', () => {
    expect(
      filter.describe(new InvalidQueryError('offset must be a non-negative integer', 'offset')),
    ).toEqual({
      status: 422,
      detail: [
        { loc: ['query', 'offset'], msg: 'offset must be a non-negative integer' },
      ],
    });
  });

  it('should map storage failures to 503', () => {
    const error = new PipelineError('Stage failed', 'persist', {
      rawBody: Buffer.alloc(0),
      secret: 'test-secret',
      processingId: 'p1',
    });

    expect(filter.describe(error)).toEqual({
      status: 503,
      detail: 'storage unavailable',
    });
    expect(filter.describe(new StorageUnavailableError('message stats'))).toEqual({
      status: 503,
      detail: 'storage unavailable',
    });
  });

  it('should map timeouts and aborts to 503 with their own detail', () => {
    expect(filter.describe(new QueryTimeoutError('message stats', 5))).toEqual({
      status: 503,
      detail: 'query timed out',
    });
    expect(filter.describe(new IngestionAbortedError('p1'))).toEqual({
      status: 503,
      detail: 'request aborted',
    });
  });

  it('should write the detail body with the mapped status', () => {
    const json = jest.fn();
    const status = jest.fn().mockReturnValue({ json });
    const host = new ExecutionContextHost([{}, { status }]);

    filter.catch(
      new InvalidQueryError('since must be a valid instant', 'since'),
      host,
    );

    expect(status).toHaveBeenCalledWith(422);
    expect(json).toHaveBeenCalledWith({
      detail: [{ loc: ['query', 'since'], msg: 'since must be a valid instant' }],
    });
  });
});
