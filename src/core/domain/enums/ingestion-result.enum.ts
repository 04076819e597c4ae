/**
 * Terminal outcomes of a single webhook ingestion.
 * Every inbound event ends in exactly one of these.
 */
export enum IngestionResult {
  /**
   * New message persisted
   */
  CREATED = 'created',

  /**
   * message_id already stored; nothing written
   */
  DUPLICATE = 'duplicate',

  /**
   * Signature header missing or did not match the body
   */
  INVALID_SIGNATURE = 'invalid_signature',

  /**
   * Authentic body that failed field validation
   */
  VALIDATION_ERROR = 'validation_error',
}
