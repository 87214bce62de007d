import type { StructuredLogger } from '../logging/index.js';

import type { DomainEventSubscriber } from './event-bus.js';
import type { LifecycleEvent } from './lifecycle.js';

export interface LifecycleLoggingSubscriberOptions {
  readonly logger: StructuredLogger;
  readonly scope: string;
  readonly eventPrefix: string;
}

/**
 * Creates a lifecycle-aware logging subscriber that forwards stage events to a structured logger.
 *
 * @param options - Logger configuration and namespacing for emitted log events.
 * @returns Domain event subscriber that records lifecycle entries.
 */
export function createLifecycleLoggingSubscriber(
  options: LifecycleLoggingSubscriberOptions,
): DomainEventSubscriber {
  return (event: LifecycleEvent) => {
    const { logger, scope, eventPrefix } = options;

    switch (event.type) {
      case 'stage:start': {
        logger.log({
          level: 'info',
          name: scope,
          event: `${eventPrefix}.start`,
          data: { stage: event.payload.stage },
        });
        return;
      }
      case 'stage:complete': {
        const attributes = event.payload.attributes;
        const duration = getDuration(attributes?.['durationMs']);
        const data: Record<string, unknown> = { stage: event.payload.stage };
        if (attributes) {
          data['attributes'] = { ...attributes };
        }

        logger.log({
          level: 'info',
          name: scope,
          event: `${eventPrefix}.complete`,
          ...(duration === undefined ? {} : { elapsedMs: duration }),
          data,
        });
        return;
      }
      case 'stage:error': {
        const { error } = event.payload;
        logger.log({
          level: 'error',
          name: scope,
          event: `${eventPrefix}.error`,
          data: {
            stage: event.payload.stage,
            ...(error instanceof Error ? { error: error.name } : {}),
            message: toErrorMessage(error),
          },
        });
        return;
      }
      default: {
        throw new Error('Unsupported lifecycle event type');
      }
    }
  };
}

function getDuration(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return undefined;
}

function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'number' || typeof error === 'bigint') {
    return error.toString();
  }
  if (typeof error === 'boolean') {
    return error ? 'true' : 'false';
  }
  if (error === null || error === undefined) {
    return 'unknown error';
  }
  if (typeof error === 'symbol') {
    return error.description ?? 'unknown error';
  }
  if (typeof error === 'function') {
    return error.name || 'unknown error';
  }
  try {
    return JSON.stringify(error);
  } catch {
    return 'unknown error';
  }
}
