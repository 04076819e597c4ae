import { IngestionResult } from '../domain/enums';

/**
 * Lifecycle hooks for observability
 */
export interface LifecycleHooks {
  /**
   * Called once per ingestion after its outcome is known
   */
  onOutcome?: (event: IngestionEvent) => void | Promise<void>;

  /**
   * Called when ingestion fails with an unclassified error (storage)
   */
  onError?: (error: Error, context: ErrorContext) => void | Promise<void>;
}

export interface IngestionEvent {
  result: IngestionResult;
  processingId: string;
  messageId?: string;
  durationMs: number;
  errorCount?: number;
}

export interface ErrorContext {
  operation: string;
  stage: string;
  processingId: string;
  messageId?: string;
}
