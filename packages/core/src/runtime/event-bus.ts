import type { LifecycleEvent } from './lifecycle.js';

export type DomainEventSubscriber = (event: LifecycleEvent) => void | Promise<void>;

export interface DomainEventSubscription {
  unsubscribe(): void;
}

export interface DomainEventBusPort {
  publish(event: LifecycleEvent): Promise<void>;
  subscribe(subscriber: DomainEventSubscriber): DomainEventSubscription;
}
