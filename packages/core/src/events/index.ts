export * from './types.js'
export * from './model.js'
export * from './conflicts.js'
export { InMemoryContextStore } from './context-store.js'
export type { InMemoryContextStoreOptions, AnchoredContext } from './context-store.js'
export { InMemoryEventStore } from './memory-store.js'
export type { InMemoryEventStoreOptions } from './memory-store.js'
export { looksLikeEvent } from './gate.js'
export { EventRouter, lockKeys } from './router.js'
export type { EventRouterDeps, EventRouterOptions, RouteOptions } from './router.js'
export { ScheduleQueries } from './queries.js'
export type { ScheduleQueriesDeps, ScheduleQueriesOptions } from './queries.js'
export { TopicTracker } from './tracker.js'
export type {
  TopicTrackerDeps,
  TopicTrackerOptions,
  TrackOutcome,
  BlockedCandidate,
  RejectedCandidate,
} from './tracker.js'
