export type {
  DomainEvent,
  LifecycleEvent,
  StageCompletedEvent,
  StageErrorEvent,
  StageErroredEvent,
  StageLifecycleEvent,
  StageStartedEvent,
} from './lifecycle.js';
export type {
  DomainEventSubscriber,
  DomainEventSubscription,
  DomainEventBusPort,
} from './event-bus.js';
export { InMemoryDomainEventBus } from './in-memory-event-bus.js';
export {
  createLifecycleLoggingSubscriber,
  type LifecycleLoggingSubscriberOptions,
} from './stage-subscribers.js';
