import { Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  PipelineConfig,
  PipelineStage,
  StageResult,
  IngestionContext,
  IngestionOutcome,
  HandleOptions,
  PipelineError,
  IngestionAbortedError,
} from './types';
import { VerificationStage } from './stages/verification.stage';
import { ValidationStage } from './stages/validation.stage';
import { PersistStage } from './stages/persist.stage';
import { IngestionResult } from '../domain/enums';
import { IngestionEvent, LifecycleHooks } from '../interfaces';
import { SignatureVerifier } from '../verification';
import { MessageValidator } from '../validation';

/**
 * IngestionPipeline orchestrates one inbound webhook
 *
 * Pipeline stages:
 * 1. Verification - HMAC signature over the raw body
 * 2. Validation - Decode and check payload fields
 * 3. Persist - Insert-if-absent keyed by message_id
 *
 * Each call ends in exactly one IngestionResult, or throws
 * PipelineError when storage fails.
 */
export class IngestionPipeline {
  private readonly logger = new Logger(IngestionPipeline.name);
  private readonly stages: PipelineStage[];
  private readonly hooks?: LifecycleHooks;

  constructor(private readonly config: PipelineConfig) {
    this.hooks = config.hooks;
    this.stages = [
      new VerificationStage(config.verifier ?? new SignatureVerifier()),
      new ValidationStage(config.validator ?? new MessageValidator()),
      new PersistStage(config.store),
    ];
  }

  /**
   * Ingest one webhook delivery
   */
  async handle(
    rawBody: Buffer,
    signature: string | undefined,
    secret: string,
    options: HandleOptions = {},
  ): Promise<IngestionOutcome> {
    const startTime = Date.now();

    const context: IngestionContext = {
      rawBody,
      signature,
      secret,
      processingId: options.processingId ?? uuidv4(),
      signal: options.signal,
    };

    try {
      const outcome = await this.executePipeline(context);

      await this.notifyOutcome({
        result: outcome.result,
        processingId: context.processingId,
        messageId: context.candidate?.messageId,
        durationMs: Date.now() - startTime,
        errorCount:
          outcome.result === IngestionResult.VALIDATION_ERROR
            ? outcome.errors.length
            : undefined,
      });

      return outcome;
    } catch (error) {
      if (error instanceof IngestionAbortedError) {
        throw error;
      }

      const pipelineError =
        error instanceof PipelineError
          ? error
          : new PipelineError(
              `Pipeline failed: ${error instanceof Error ? error.message : String(error)}`,
              'pipeline',
              context,
              error instanceof Error ? error : undefined,
            );

      this.logger.error(
        `Ingestion ${context.processingId} failed in stage '${pipelineError.stage}': ${pipelineError.message}`,
        pipelineError.cause?.stack,
      );

      await this.notifyError(pipelineError, context);
      throw pipelineError;
    }
  }

  /**
   * Execute the pipeline stages sequentially until one is terminal
   */
  private async executePipeline(
    context: IngestionContext,
  ): Promise<IngestionOutcome> {
    for (const stage of this.stages) {
      let result: StageResult;
      try {
        result = await stage.execute(context);
      } catch (error) {
        if (error instanceof IngestionAbortedError) {
          throw error;
        }
        throw new PipelineError(
          `Stage '${stage.name}' failed: ${error instanceof Error ? error.message : String(error)}`,
          stage.name,
          context,
          error instanceof Error ? error : undefined,
        );
      }

      context = result.context;

      if (!result.shouldContinue) {
        break;
      }
    }

    if (!context.outcome) {
      throw new PipelineError(
        'Pipeline finished without an outcome',
        'pipeline',
        context,
      );
    }

    return context.outcome;
  }

  /**
   * Hook failures are logged and never change the outcome
   */
  private async notifyOutcome(event: IngestionEvent): Promise<void> {
    if (!this.hooks?.onOutcome) {
      return;
    }

    try {
      await this.hooks.onOutcome(event);
    } catch (error) {
      this.logger.warn(
        `onOutcome hook failed for ${event.processingId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  private async notifyError(
    error: PipelineError,
    context: IngestionContext,
  ): Promise<void> {
    if (!this.hooks?.onError) {
      return;
    }

    try {
      await this.hooks.onError(error, {
        operation: 'message-ingestion',
        stage: error.stage,
        processingId: context.processingId,
        messageId: context.candidate?.messageId,
      });
    } catch (hookError) {
      this.logger.warn(
        `onError hook failed for ${context.processingId}: ${hookError instanceof Error ? hookError.message : String(hookError)}`,
      );
    }
  }

  /**
   * Get pipeline statistics
   */
  getStatistics(): { stages: string[]; hooks: string[] } {
    return {
      stages: this.stages.map((s) => s.name),
      hooks: Object.keys(this.hooks ?? {}),
    };
  }
}
