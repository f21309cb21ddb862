/**
 * LLM Event Extractor
 *
 * EventExtractor backed by a single model call per method. The intent gate
 * stays local (keyword match) so chatter never reaches the model.
 */

import { z } from 'zod'
import { completeOnce } from '../brain.js'
import { errorMessage, ExtractionError } from '../errors.js'
import { looksLikeEvent } from '../events/gate.js'
import type {
  CallOptions,
  EventExtractor,
  ExtractedEvent,
  ExtractionContext,
  ScheduledEvent,
  UpdateClassification,
} from '../events/types.js'
import { buildExtractionPrompt, buildUpdatePrompt } from './prompts.js'

/** One system + user prompt in, raw reply text out; should stop once `signal` aborts */
export type CompletionFn = (
  systemPrompt: string,
  userPrompt: string,
  signal?: AbortSignal,
) => Promise<string>

export interface LlmEventExtractorOptions {
  model: string
  /** Replaces the Agent SDK call (tests, other providers) */
  complete?: CompletionFn
}

const extractionReplySchema = z.discriminatedUnion('isEvent', [
  z.object({ isEvent: z.literal(false) }),
  z.object({
    isEvent: z.literal(true),
    title: z.string().trim().min(1),
    start: z.string().min(1),
    end: z.string().nullish(),
    location: z.string().nullish(),
  }),
])

const updateReplySchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('update'),
    fields: z.array(z.enum(['startTime', 'endTime', 'location', 'title'])),
    values: z
      .object({
        startTime: z.string().optional(),
        endTime: z.string().nullable().optional(),
        location: z.string().nullable().optional(),
        title: z.string().optional(),
      })
      .default({}),
  }),
  z.object({ kind: z.literal('new_event') }),
  z.object({ kind: z.literal('ambiguous') }),
])

/**
 * End index (exclusive) of the balanced {...} starting at `from`, or -1.
 * Braces inside string literals do not count.
 */
function balancedObjectEnd(text: string, from: number): number {
  let depth = 0
  let inString = false
  let escaped = false
  for (let i = from; i < text.length; i++) {
    const ch = text[i]
    if (inString) {
      if (escaped) escaped = false
      else if (ch === '\\') escaped = true
      else if (ch === '"') inString = false
      continue
    }
    if (ch === '"') inString = true
    else if (ch === '{') depth++
    else if (ch === '}') {
      depth--
      if (depth === 0) return i + 1
    }
  }
  return -1
}

/** First balanced {...} span of a reply, parsed. Models sometimes wrap JSON in prose. */
export function extractJsonObject(reply: string): unknown {
  const start = reply.indexOf('{')
  if (start === -1) {
    throw new ExtractionError('Model reply contained no JSON object')
  }
  const end = balancedObjectEnd(reply, start)
  if (end === -1) {
    throw new ExtractionError('Model reply contained malformed JSON')
  }
  try {
    const parsed: unknown = JSON.parse(reply.slice(start, end))
    return parsed
  } catch (err) {
    throw new ExtractionError('Model reply contained malformed JSON', { cause: err })
  }
}

export class LlmEventExtractor implements EventExtractor {
  private complete: CompletionFn

  constructor(options: LlmEventExtractorOptions) {
    this.complete =
      options.complete ??
      ((systemPrompt, userPrompt, signal) =>
        completeOnce(systemPrompt, userPrompt, { model: options.model, signal }))
  }

  async classifyIntent(text: string): Promise<boolean> {
    return looksLikeEvent(text)
  }

  async extractEvent(
    text: string,
    context: ExtractionContext,
    options: CallOptions = {},
  ): Promise<ExtractedEvent> {
    const reply = await this.ask(buildExtractionPrompt(context), text, options.signal)
    const result = extractionReplySchema.safeParse(extractJsonObject(reply))
    if (!result.success) {
      throw new ExtractionError('Model reply did not describe an event', { cause: result.error })
    }
    if (!result.data.isEvent) {
      throw new ExtractionError('No event found in message')
    }

    const { title, start, end, location } = result.data
    return { title, start, end, location, notes: text }
  }

  async classifyUpdate(
    text: string,
    reference: ScheduledEvent,
    context: ExtractionContext,
    options: CallOptions = {},
  ): Promise<UpdateClassification> {
    try {
      const reply = await this.ask(buildUpdatePrompt(reference, context), text, options.signal)
      const result = updateReplySchema.safeParse(extractJsonObject(reply))
      if (!result.success) {
        console.warn(`[LlmExtractor] Unusable update classification: ${result.error.message}`)
        return { kind: 'ambiguous' }
      }
      return result.data
    } catch (err) {
      console.warn(`[LlmExtractor] Update classification failed: ${errorMessage(err)}`)
      return { kind: 'ambiguous' }
    }
  }

  private async ask(systemPrompt: string, text: string, signal?: AbortSignal): Promise<string> {
    try {
      return await this.complete(systemPrompt, `Message:\n${text}`, signal)
    } catch (err) {
      throw new ExtractionError(`Model call failed: ${errorMessage(err)}`, { cause: err })
    }
  }
}
