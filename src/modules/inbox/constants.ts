/**
 * Injection tokens for the Inbox module
 */

export const MESSAGE_STORE = Symbol('MESSAGE_STORE');
export const INBOX_CONFIG = Symbol('INBOX_CONFIG');
export const INGESTION_PIPELINE = Symbol('INGESTION_PIPELINE');
export const MESSAGE_QUERY_SERVICE = Symbol('MESSAGE_QUERY_SERVICE');
export const INGESTION_METRICS = Symbol('INGESTION_METRICS');
