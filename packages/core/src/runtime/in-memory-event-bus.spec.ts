import { describe, expect, it, vi } from 'vitest';

import type { LifecycleEvent } from './lifecycle.js';
import { InMemoryDomainEventBus } from './in-memory-event-bus.js';

describe('InMemoryDomainEventBus', () => {
  const event: LifecycleEvent = {
    type: 'stage:start',
    payload: {
      stage: 'build-html',
      timestamp: new Date('2024-01-01T00:00:00Z'),
    },
  };

  it('notifies all subscribed listeners', async () => {
    const bus = new InMemoryDomainEventBus();
    const firstSubscriber = vi.fn();
    const secondSubscriber = vi.fn();

    bus.subscribe(firstSubscriber);
    bus.subscribe(secondSubscriber);

    await bus.publish(event);

    expect(firstSubscriber).toHaveBeenCalledWith(event);
    expect(secondSubscriber).toHaveBeenCalledWith(event);
  });

  it('notifies listeners in subscription order', async () => {
    const bus = new InMemoryDomainEventBus();
    const calls: string[] = [];

    bus.subscribe(async () => {
      await Promise.resolve();
      calls.push('first');
    });
    bus.subscribe(() => {
      calls.push('second');
    });

    await bus.publish(event);

    expect(calls).toEqual(['first', 'second']);
  });

  it('stops notifying listeners after they unsubscribe', async () => {
    const bus = new InMemoryDomainEventBus();
    const subscriber = vi.fn();

    const subscription = bus.subscribe(subscriber);
    await bus.publish(event);
    expect(subscriber).toHaveBeenCalledTimes(1);

    subscription.unsubscribe();
    await bus.publish(event);

    expect(subscriber).toHaveBeenCalledTimes(1);
  });
});
