/**
 * LLM Event Researcher
 *
 * EventResearcher backed by an Agent SDK query that may use the built-in
 * WebSearch tool. Replies end in one JSON object; entries that do not
 * validate are dropped rather than failing the whole lookup.
 */

import { z } from 'zod'
import { completeOnce } from '../brain.js'
import { errorMessage, ExtractionError } from '../errors.js'
import type {
  CallOptions,
  EventResearcher,
  ExtractedEvent,
  ExtractionContext,
  ScheduledEvent,
} from '../events/types.js'
import { extractJsonObject, type CompletionFn } from './llm-extractor.js'
import { buildEnrichmentPrompt, buildResearchPrompt } from './prompts.js'

const RESEARCH_TOOLS = ['WebSearch']
// Search, maybe a follow-up search, then the answer
const RESEARCH_MAX_TURNS = 6

export interface LlmEventResearcherOptions {
  model: string
  /** Zone enrichment prompts render times in */
  timezone: string
  /** Replaces the Agent SDK call (tests, other providers) */
  complete?: CompletionFn
}

const researchedEventSchema = z.object({
  title: z.string().trim().min(1),
  start: z.string().min(1),
  end: z.string().nullish(),
  location: z.string().nullish(),
  notes: z.string().nullish(),
})

const researchReplySchema = z.object({ events: z.array(z.unknown()) })

const enrichmentReplySchema = z.discriminatedUnion('found', [
  z.object({ found: z.literal(false) }),
  z.object({
    found: z.literal(true),
    title: z.string().trim().min(1),
    url: z.string().url(),
  }),
])

export class LlmEventResearcher implements EventResearcher {
  private complete: CompletionFn
  private timezone: string

  constructor(options: LlmEventResearcherOptions) {
    this.timezone = options.timezone
    this.complete =
      options.complete ??
      ((systemPrompt, userPrompt, signal) =>
        completeOnce(systemPrompt, userPrompt, {
          model: options.model,
          allowedTools: RESEARCH_TOOLS,
          maxTurns: RESEARCH_MAX_TURNS,
          signal,
        }))
  }

  async research(
    topic: string,
    context: ExtractionContext,
    options: CallOptions = {},
  ): Promise<ExtractedEvent[]> {
    const reply = await this.ask(buildResearchPrompt(topic, context), `Topic: ${topic}`, options.signal)
    const result = researchReplySchema.safeParse(extractJsonObject(reply))
    if (!result.success) {
      throw new ExtractionError('Model reply did not list events', { cause: result.error })
    }

    const events: ExtractedEvent[] = []
    for (const entry of result.data.events) {
      const parsed = researchedEventSchema.safeParse(entry)
      if (parsed.success) {
        events.push(parsed.data)
      } else {
        console.warn(`[LlmResearcher] Skipping unusable entry for "${topic}": ${parsed.error.issues[0].message}`)
      }
    }
    console.log(`[LlmResearcher] "${topic}": ${events.length} event(s)`)
    return events
  }

  async enrich(event: ScheduledEvent, options: CallOptions = {}): Promise<string | null> {
    const reply = await this.ask(
      buildEnrichmentPrompt(event, this.timezone),
      `Event: ${event.title}`,
      options.signal,
    )
    const result = enrichmentReplySchema.safeParse(extractJsonObject(reply))
    if (!result.success) {
      throw new ExtractionError('Model reply did not describe a page', { cause: result.error })
    }
    if (!result.data.found) return null
    return `Found: ${result.data.title} (${result.data.url})`
  }

  private async ask(systemPrompt: string, userPrompt: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.complete(systemPrompt, userPrompt, signal)
    } catch (err) {
      throw new ExtractionError(`Model call failed: ${errorMessage(err)}`, { cause: err })
    }
  }
}
