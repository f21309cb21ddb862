export { DedupCache } from './dedup.js'
export type { DedupOptions } from './dedup.js'
export { KeyedLock } from './keyed-lock.js'
export { withTimeout, withWriteTimeout } from './timeout.js'
export type { TimeoutOptions } from './timeout.js'
