import type {
  DomainEventBusPort,
  DomainEventSubscriber,
  DomainEventSubscription,
} from './event-bus.js';
import type { LifecycleEvent } from './lifecycle.js';

class InMemoryDomainEventSubscription implements DomainEventSubscription {
  constructor(
    private readonly subscribers: Set<DomainEventSubscriber>,
    private readonly subscriber: DomainEventSubscriber,
  ) {}

  unsubscribe(): void {
    this.subscribers.delete(this.subscriber);
  }
}

/**
 * Event bus that fans lifecycle events out to every subscriber registered in this process.
 * Subscribers are notified in subscription order and `publish` settles once all of them have.
 */
export class InMemoryDomainEventBus implements DomainEventBusPort {
  private readonly subscribers = new Set<DomainEventSubscriber>();

  subscribe(subscriber: DomainEventSubscriber): DomainEventSubscription {
    this.subscribers.add(subscriber);
    return new InMemoryDomainEventSubscription(this.subscribers, subscriber);
  }

  async publish(event: LifecycleEvent): Promise<void> {
    for (const subscriber of [...this.subscribers]) {
      await subscriber(event);
    }
  }
}
