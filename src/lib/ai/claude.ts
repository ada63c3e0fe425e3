// ============================================================
// Anthropic Claude SDK wrapper
// Uses @anthropic-ai/sdk for message creation
// ============================================================

import Anthropic from '@anthropic-ai/sdk'
import type { AIResponse, ProviderCallOptions } from './types'

// ---- Client cache (rebuilt when the key changes) ----

let client: Anthropic | null = null
let cachedKey: string | null = null

function getClient(apiKey: string, timeoutMs: number): Anthropic {
  if (!client || cachedKey !== apiKey) {
    // Retries are handled by the router so fallbacks stay predictable
    client = new Anthropic({ apiKey, timeout: timeoutMs, maxRetries: 0 })
    cachedKey = apiKey
  }
  return client
}

/**
 * Call Claude for a single message completion.
 *
 * @param options  Model, messages, system prompt, and generation params
 * @returns        AI response with content, token counts, and timing
 */
export async function callClaude(options: ProviderCallOptions): Promise<AIResponse> {
  const start = Date.now()
  const anthropic = getClient(options.apiKey, options.timeoutMs)

  const response = await anthropic.messages.create({
    model: options.model || 'claude-sonnet-4-20250514',
    max_tokens: options.maxTokens || 4096,
    temperature: options.temperature ?? 0.7,
    system: options.system || undefined,
    messages: options.messages.map((m) => ({
      role: m.role,
      content: m.content,
    })),
  })

  // Concatenate every text block of the reply
  const text = response.content
    .map((c) => (c.type === 'text' ? c.text : ''))
    .join('')

  return {
    content: text,
    model: response.model,
    provider: 'anthropic',
    tokensIn: response.usage.input_tokens,
    tokensOut: response.usage.output_tokens,
    durationMs: Date.now() - start,
  }
}
