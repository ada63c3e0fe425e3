// ============================================================
// AI Model Router
// Routes blog pipeline tasks to the appropriate provider/model.
// Includes automatic retry + cross-provider fallback on
// transient errors (429, 503, 529).
// ============================================================

import type { AIConfig } from '@/lib/config'
import { ConfigurationError } from '@/lib/errors'
import type { AITask, AIMessage, AIResponse, AIProvider, ModelConfig, TextGenerator } from './types'
import { callClaude } from './claude'
import { callGemini } from './gemini'
import { callOpenAI } from './openai'

// ---- Task routing configuration ----

/**
 * Default model routing for each AI task.
 *
 * - GPT-4o mini: cheap brainstorming (ideas)
 * - Claude Sonnet: judgement and long-form writing (selection, outline, article)
 */
const TASK_ROUTING: Record<AITask, ModelConfig> = {
  generate_ideas: {
    provider: 'openai',
    model: 'gpt-4o-mini',
    maxTokens: 1024,
    temperature: 0.9,
  },
  select_idea: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    maxTokens: 512,
    temperature: 0,
  },
  generate_outline: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    maxTokens: 2048,
    temperature: 0.5,
  },
  write_blog: {
    provider: 'anthropic',
    model: 'claude-sonnet-4-20250514',
    maxTokens: 8192,
    temperature: 0.7,
  },
}

// ---- Cross-provider fallback map ----

const FALLBACK_MODEL: Record<string, { provider: AIProvider; model: string }> = {
  'claude-sonnet-4-20250514': { provider: 'openai', model: 'gpt-4o' },
  'gpt-4o': { provider: 'anthropic', model: 'claude-sonnet-4-20250514' },
  'gpt-4o-mini': { provider: 'google', model: 'gemini-2.0-flash' },
  'gemini-2.0-flash': { provider: 'openai', model: 'gpt-4o-mini' },
}

// ---- Retry / fallback helpers ----

export function isRetryableError(error: unknown): boolean {
  // SDK errors with a numeric status code (Anthropic APIError, OpenAI APIError, etc.)
  if (error && typeof error === 'object' && 'status' in error) {
    const status = error.status
    if (status === 429 || status === 529 || status === 503) return true
  }
  const msg = error instanceof Error ? error.message : String(error)
  return /overloaded|rate.?limit|too many requests|timed? ?out|503|529/i.test(msg)
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

function apiKeyFor(provider: AIProvider, ai: AIConfig): string | undefined {
  if (provider === 'anthropic') return ai.anthropicApiKey
  if (provider === 'openai') return ai.openaiApiKey
  return ai.geminiApiKey
}

const KEY_ENV_NAME: Record<AIProvider, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  google: 'GEMINI_API_KEY',
  openai: 'OPENAI_API_KEY',
}

/**
 * Call a provider with the given config and messages.
 * Centralised dispatch to avoid duplicating the switch logic.
 */
function callProvider(
  config: ModelConfig,
  ai: AIConfig,
  messages: AIMessage[],
  system?: string,
): Promise<AIResponse> {
  const apiKey = apiKeyFor(config.provider, ai)
  if (!apiKey) {
    return Promise.reject(
      new ConfigurationError(`${KEY_ENV_NAME[config.provider]} is not configured.`)
    )
  }

  const opts = {
    apiKey,
    timeoutMs: ai.timeoutMs,
    model: config.model,
    messages,
    system,
    maxTokens: config.maxTokens,
    temperature: config.temperature,
  }
  if (config.provider === 'anthropic') return callClaude(opts)
  if (config.provider === 'openai') return callOpenAI(opts)
  return callGemini(opts)
}

/**
 * Send a task whose provider has no key straight to its fallback, when the
 * fallback's key is configured. Otherwise keep the route; callProvider then
 * reports the missing key.
 */
function resolveRoute(config: ModelConfig, ai: AIConfig): ModelConfig {
  if (apiKeyFor(config.provider, ai)) return config

  const fb = FALLBACK_MODEL[config.model]
  if (!fb || !apiKeyFor(fb.provider, ai)) return config

  console.warn(
    `[ai-router] ${KEY_ENV_NAME[config.provider]} not set, routing ${config.model} to ${fb.model} (${fb.provider})`,
  )
  return { ...config, provider: fb.provider, model: fb.model }
}

/**
 * Attempt an AI call with backoff retries then cross-provider fallback:
 *  0. Route to the fallback up front when only its key is configured
 *  1. Initial try
 *  2. For each configured delay: wait, retry on retryable errors
 *  3. If still failing → call fallback model (different provider)
 *  4. If fallback also fails → throw original error
 */
async function callWithRetryAndFallback(
  route: ModelConfig,
  ai: AIConfig,
  messages: AIMessage[],
  system?: string,
): Promise<AIResponse> {
  const config = resolveRoute(route, ai)
  let lastError: unknown
  const retryDelays = ai.retryDelaysMs

  try {
    return await callProvider(config, ai, messages, system)
  } catch (err) {
    lastError = err
    if (!isRetryableError(err)) throw err
    console.warn(`[ai-router] ${config.model} failed with retryable error, retrying…`)
  }

  for (let i = 0; i < retryDelays.length; i++) {
    await sleep(retryDelays[i])
    try {
      return await callProvider(config, ai, messages, system)
    } catch (err) {
      lastError = err
      if (!isRetryableError(err)) throw err
      console.warn(
        `[ai-router] ${config.model} retry ${i + 2} failed${i < retryDelays.length - 1 ? ', retrying…' : ', falling back…'}`,
      )
    }
  }

  const fb = FALLBACK_MODEL[config.model]
  if (!fb || !apiKeyFor(fb.provider, ai)) throw lastError

  const fallbackConfig: ModelConfig = {
    ...config,
    provider: fb.provider,
    model: fb.model,
  }
  console.warn(`[ai-router] Falling back to ${fb.model} (${fb.provider})`)
  try {
    return await callProvider(fallbackConfig, ai, messages, system)
  } catch (fallbackError) {
    console.warn(
      `[ai-router] Fallback ${fb.model} failed: ${fallbackError instanceof Error ? fallbackError.message : String(fallbackError)}`,
    )
    throw lastError
  }
}

// ---- Public API ----

/**
 * Build a TextGenerator bound to the given provider credentials.
 * Each task is routed to its configured model, retried on transient
 * errors and finally sent to a fallback provider.
 */
export function createTextGenerator(ai: AIConfig): TextGenerator {
  return (task, messages, system) =>
    callWithRetryAndFallback(TASK_ROUTING[task], ai, messages, system)
}
