/**
 * Result of an insert-if-absent against the message store
 */
export enum InsertOutcome {
  CREATED = 'created',
  ALREADY_EXISTS = 'already_exists',
}
