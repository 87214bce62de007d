export type {
  DomainEventBusPort,
  DomainEventSubscriber,
  DomainEventSubscription,
} from '@stagepack/core/runtime';
export type {
  BuildConfigHook,
  ConfigMutator,
  HookArgs,
  HookOptions,
  HookRegistration,
} from './hooks.js';
