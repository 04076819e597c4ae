import { Message, MessageCandidate } from '../domain/models';
import { IngestionResult } from '../domain/enums';
import {
  FieldError,
  LifecycleHooks,
  MessageStore,
} from '../interfaces';
import { SignatureVerifier } from '../verification';
import { MessageValidator } from '../validation';

/**
 * Ingestion context passed through the pipeline
 */
export interface IngestionContext {
  // Raw input
  rawBody: Buffer;
  signature?: string;
  secret: string;

  // Processing metadata
  processingId: string;
  signal?: AbortSignal;

  // Validated data
  candidate?: MessageCandidate;

  // Processing outcome
  outcome?: IngestionOutcome;
}

/**
 * Pipeline stage result
 */
export interface StageResult {
  context: IngestionContext;
  shouldContinue: boolean;
}

/**
 * Pipeline stage interface
 */
export interface PipelineStage {
  name: string;
  execute(context: IngestionContext): Promise<StageResult>;
}

/**
 * Pipeline configuration
 */
export interface PipelineConfig {
  store: MessageStore;
  verifier?: SignatureVerifier;
  validator?: MessageValidator;

  // Lifecycle hooks
  hooks?: LifecycleHooks;
}

export interface HandleOptions {
  /**
   * Correlation id for logs and hooks; generated when absent
   */
  processingId?: string;

  /**
   * Abort before the insert is issued; once issued the result stands
   */
  signal?: AbortSignal;
}

/**
 * Terminal classification of one ingestion
 */
export type IngestionOutcome =
  | { result: IngestionResult.CREATED; message: Message }
  | { result: IngestionResult.DUPLICATE; messageId: string }
  | { result: IngestionResult.INVALID_SIGNATURE }
  | { result: IngestionResult.VALIDATION_ERROR; errors: FieldError[] };

/**
 * Pipeline error with context
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly stage: string,
    public readonly context: IngestionContext,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}

/**
 * Raised when the caller aborts before the message is persisted
 */
export class IngestionAbortedError extends Error {
  constructor(public readonly processingId: string) {
    super(`Ingestion ${processingId} aborted before persistence`);
    this.name = 'IngestionAbortedError';
  }
}
