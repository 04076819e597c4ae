import { PipelineStage, IngestionContext, StageResult } from '../types';
import { IngestionResult } from '../../domain/enums';
import { SignatureVerifier } from '../../verification';

/**
 * Stage 1: Signature Verification
 * Rejects anything not signed with the shared secret
 */
export class VerificationStage implements PipelineStage {
  name = 'verification';

  constructor(private readonly verifier: SignatureVerifier) {}

  async execute(context: IngestionContext): Promise<StageResult> {
    const isValid = this.verifier.verify(
      context.rawBody,
      context.signature,
      context.secret,
    );

    if (!isValid) {
      context.outcome = { result: IngestionResult.INVALID_SIGNATURE };
      return { context, shouldContinue: false };
    }

    return { context, shouldContinue: true };
  }
}
