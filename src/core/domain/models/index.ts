export * from './message.model';
export * from './message-stats.model';
