export interface StageLifecycleEvent {
  readonly stage: string;
  readonly timestamp: Date;
  readonly attributes?: Readonly<Record<string, unknown>>;
}

export interface StageErrorEvent extends StageLifecycleEvent {
  readonly error: unknown;
}

export interface DomainEvent<Type extends string, Payload> {
  readonly type: Type;
  readonly payload: Payload;
}

export type StageStartedEvent = DomainEvent<'stage:start', StageLifecycleEvent>;
export type StageCompletedEvent = DomainEvent<'stage:complete', StageLifecycleEvent>;
export type StageErroredEvent = DomainEvent<'stage:error', StageErrorEvent>;

export type LifecycleEvent = StageStartedEvent | StageCompletedEvent | StageErroredEvent;
