import {
  PipelineStage,
  IngestionContext,
  StageResult,
  IngestionAbortedError,
} from '../types';
import { IngestionResult, InsertOutcome } from '../../domain/enums';
import { MessageStore } from '../../interfaces';

/**
 * Stage 3: Persist
 * Atomic insert-if-absent; a conflict on message_id is a duplicate
 */
export class PersistStage implements PipelineStage {
  name = 'persist';

  constructor(private readonly store: MessageStore) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const candidate = context.candidate;
    if (!candidate) {
      throw new Error('Persist stage reached without a validated candidate');
    }

    if (context.signal?.aborted) {
      throw new IngestionAbortedError(context.processingId);
    }

    const attempt = await this.store.insert(candidate);

    context.outcome =
      attempt.outcome === InsertOutcome.CREATED
        ? { result: IngestionResult.CREATED, message: attempt.message }
        : { result: IngestionResult.DUPLICATE, messageId: attempt.messageId };

    return { context, shouldContinue: false };
  }
}
