export * from './message-validator';
export * from './inbound-message.payload';
export * from './max-code-points.decorator';
