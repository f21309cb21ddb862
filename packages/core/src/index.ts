// Public API for consumption by the server package

// Errors
export {
  ValidationError,
  ExtractionError,
  StoreError,
  DeliveryError,
  CollaboratorTimeoutError,
  RoutingCancelledError,
  errorMessage,
} from './errors.js'

// Event model, conflicts, context, routing, queries
export * from './events/index.js'

// LLM extraction and research
export { createBrainQuery, collectResponse, completeOnce } from './brain.js'
export type { BrainQueryOptions, CompleteOnceOptions } from './brain.js'
export { LlmEventExtractor, extractJsonObject } from './extraction/llm-extractor.js'
export type { CompletionFn, LlmEventExtractorOptions } from './extraction/llm-extractor.js'
export { LlmEventResearcher } from './extraction/llm-researcher.js'
export type { LlmEventResearcherOptions } from './extraction/llm-researcher.js'
export {
  buildExtractionPrompt,
  buildUpdatePrompt,
  buildResearchPrompt,
  buildEnrichmentPrompt,
} from './extraction/prompts.js'

// Config
export { loadConfig, findAppDir } from './config.js'
export type { AppConfig, YamlConfig } from './config.js'

// Utilities
export { DedupCache, KeyedLock, withTimeout, withWriteTimeout } from './utils/index.js'
export type { DedupOptions, TimeoutOptions } from './utils/index.js'
