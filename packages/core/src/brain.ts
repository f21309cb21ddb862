import { query, type Options, type Query } from '@anthropic-ai/claude-agent-sdk'
import { errorMessage } from './errors.js'

export interface BrainQueryOptions {
  model: string
  systemPrompt?: string
  /** Defaults to 1: extraction is a single question and a single answer */
  maxTurns?: number
  /** Built-in tools the model may use; none by default */
  allowedTools?: string[]
  /** Aborting it stops the query and its subprocess */
  abortController?: AbortController
}

export function createBrainQuery(prompt: string, options: BrainQueryOptions): Query {
  console.log(`[Brain] createBrainQuery model: ${options.model}`)

  if (!process.env.ANTHROPIC_API_KEY && !process.env.CLAUDE_CODE_OAUTH_TOKEN) {
    throw new Error(
      'No Anthropic authentication configured. Set ANTHROPIC_API_KEY or CLAUDE_CODE_OAUTH_TOKEN.',
    )
  }

  const queryOptions: Options = {
    model: options.model,
    systemPrompt: options.systemPrompt,
    maxTurns: options.maxTurns ?? 1,
    allowedTools: options.allowedTools ?? [],
    abortController: options.abortController,
  }

  return query({ prompt, options: queryOptions })
}

/**
 * Drain a query and return the final text. Prefers the result message;
 * falls back to the last assistant turn's text blocks.
 */
export async function collectResponse(q: Query): Promise<string> {
  let assistantText = ''
  for await (const msg of q) {
    if (msg.type === 'assistant') {
      let text = ''
      for (const block of msg.message.content) {
        if (block.type === 'text') text += block.text
      }
      assistantText = text
    }
    if (msg.type === 'result') {
      if (msg.subtype === 'success' && msg.result) return msg.result
      break
    }
  }
  return assistantText
}

export type CompleteOnceOptions = Omit<BrainQueryOptions, 'systemPrompt' | 'abortController'> & {
  signal?: AbortSignal
}

/** Send one prompt and collect the reply; aborting `signal` stops the query */
export async function completeOnce(
  systemPrompt: string,
  userPrompt: string,
  options: CompleteOnceOptions,
): Promise<string> {
  const { signal, ...queryOptions } = options
  const abortController = new AbortController()
  if (signal?.aborted) {
    throw new Error(`Query aborted: ${errorMessage(signal.reason)}`)
  }
  const onAbort = () => abortController.abort(signal?.reason)
  signal?.addEventListener('abort', onAbort, { once: true })

  try {
    return await collectResponse(
      createBrainQuery(userPrompt, { ...queryOptions, systemPrompt, abortController }),
    )
  } finally {
    signal?.removeEventListener('abort', onAbort)
  }
}
