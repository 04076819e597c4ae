/**
 * Webhook ingestion pipeline
 *
 * 1. Verification - Validate webhook signature
 * 2. Validation - Decode and check the payload
 * 3. Persist - Idempotent insert keyed by message_id
 */

// Main pipeline
export { IngestionPipeline } from './ingestion-pipeline';

// Pipeline types
export * from './types';

// Individual stages (for testing or custom pipelines)
export { VerificationStage } from './stages/verification.stage';
export { ValidationStage } from './stages/validation.stage';
export { PersistStage } from './stages/persist.stage';
