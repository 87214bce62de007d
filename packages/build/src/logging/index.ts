export { JsonLineLogger, noopLogger } from '@stagepack/core/logging';
export type { LogLevel, StructuredLogEvent, StructuredLogger } from '@stagepack/core/logging';
export { createBuildStageLoggingSubscriber } from './build-event-subscriber.js';
