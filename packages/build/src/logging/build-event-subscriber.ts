import type { StructuredLogger } from '@stagepack/core/logging';
import { createLifecycleLoggingSubscriber, type DomainEventSubscriber } from '@stagepack/core/runtime';

/**
 * Creates a build-scoped logging subscriber that records stage lifecycle events using the shared
 * logging adapter.
 *
 * @param logger - Structured logger that receives lifecycle log entries.
 * @returns Domain event subscriber recording build stage events.
 */
export function createBuildStageLoggingSubscriber(logger: StructuredLogger): DomainEventSubscriber {
  return createLifecycleLoggingSubscriber({
    logger,
    scope: 'stagepack-build',
    eventPrefix: 'build.stage',
  });
}
