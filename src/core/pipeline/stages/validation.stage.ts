import { PipelineStage, IngestionContext, StageResult } from '../types';
import { IngestionResult } from '../../domain/enums';
import { MessageValidator } from '../../validation';

/**
 * Stage 2: Payload Validation
 * Decodes the verified body and checks every field rule
 */
export class ValidationStage implements PipelineStage {
  name = 'validation';

  constructor(private readonly validator: MessageValidator) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const validation = this.validator.parse(context.rawBody);

    if (!validation.valid) {
      context.outcome = {
        result: IngestionResult.VALIDATION_ERROR,
        errors: validation.errors,
      };
      return { context, shouldContinue: false };
    }

    context.candidate = validation.candidate;
    return { context, shouldContinue: true };
  }
}
