// ============================================================
// OpenAI SDK wrapper
// Uses openai package for chat completions
// ============================================================

import OpenAI from 'openai'
import type { AIResponse, ProviderCallOptions } from './types'

let client: OpenAI | null = null
let cachedKey: string | null = null

function getClient(apiKey: string, timeoutMs: number): OpenAI {
  if (!client || cachedKey !== apiKey) {
    client = new OpenAI({ apiKey, timeout: timeoutMs, maxRetries: 0 })
    cachedKey = apiKey
  }
  return client
}

/**
 * Call OpenAI for a single chat completion.
 *
 * @param options  Model, messages, system prompt, and generation params
 * @returns        AI response with content, token counts, and timing
 */
export async function callOpenAI(options: ProviderCallOptions): Promise<AIResponse> {
  const start = Date.now()
  const openai = getClient(options.apiKey, options.timeoutMs)

  const msgs: OpenAI.Chat.ChatCompletionMessageParam[] = []
  if (options.system) {
    msgs.push({ role: 'system', content: options.system })
  }
  for (const m of options.messages) {
    if (m.role === 'assistant') {
      msgs.push({ role: 'assistant', content: m.content })
    } else {
      msgs.push({ role: 'user', content: m.content })
    }
  }

  const response = await openai.chat.completions.create({
    model: options.model || 'gpt-4o-mini',
    messages: msgs,
    max_tokens: options.maxTokens || 4096,
    temperature: options.temperature ?? 0.7,
  })

  const choice = response.choices[0]

  return {
    content: choice?.message?.content || '',
    model: response.model,
    provider: 'openai',
    tokensIn: response.usage?.prompt_tokens || 0,
    tokensOut: response.usage?.completion_tokens || 0,
    durationMs: Date.now() - start,
  }
}
