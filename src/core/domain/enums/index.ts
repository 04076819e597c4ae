export * from './ingestion-result.enum';
export * from './insert-outcome.enum';
