// ============================================================
// Application configuration
// Reads the process environment once, validates it with zod and
// hands typed slices to the collaborators that need them.
// ============================================================

import { z } from 'zod'
import { ConfigurationError } from '@/lib/errors'

// ---- Slices passed to collaborators ----

export interface WordPressCredentials {
  wpUrl: string
  wpUser: string
  wpAppPassword: string
}

export interface UnsplashConfig {
  accessKey: string
}

export interface AIConfig {
  anthropicApiKey?: string
  geminiApiKey?: string
  openaiApiKey?: string
  timeoutMs: number
  /** Delays between retries of a transient provider error, in ms */
  retryDelaysMs: number[]
}

export interface HttpConfig {
  timeoutMs: number
  maxRetries: number
  retryDelayMs: number
}

export interface AppConfig {
  wordpress: WordPressCredentials | null
  unsplash: UnsplashConfig | null
  ai: AIConfig
  http: HttpConfig
  imageOptimize: boolean
  corsOrigins: string[]
}

// ---- Environment schema ----

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined))

const envSchema = z.object({
  WP_URL: z.string().trim().url('WP_URL must be a valid URL').optional().or(z.literal('')),
  WP_USER: optionalString,
  WP_APP_PASSWORD: optionalString,
  UNSPLASH_ACCESS_KEY: optionalString,
  ANTHROPIC_API_KEY: optionalString,
  GEMINI_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  AI_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HTTP_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  HTTP_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(500),
  IMAGE_OPTIMIZE: z
    .enum(['true', 'false', '1', '0', ''])
    .default('false')
    .transform((v) => v === 'true' || v === '1'),
  CORS_ORIGINS: z.string().optional(),
})

export const DEFAULT_CORS_ORIGINS = ['http://localhost:3000', 'http://127.0.0.1:3000']

/**
 * Comma-separated origin list; unset means the local dev frontends.
 */
export function parseCorsOrigins(raw: string | undefined): string[] {
  if (raw === undefined) return [...DEFAULT_CORS_ORIGINS]
  return raw
    .split(',')
    .map((o) => o.trim())
    .filter((o) => o.length > 0)
}

export type EnvInput = Record<string, string | undefined>

/**
 * Build the application config from an environment map.
 * WordPress and Unsplash slices are null when their settings are absent, so
 * endpoints that do not need them keep working.
 */
export function loadConfig(env: EnvInput): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.')}: ${i.message}`)
      .join('; ')
    throw new ConfigurationError(`Invalid configuration: ${issues}`)
  }
  const e = parsed.data

  const wordpress =
    e.WP_URL && e.WP_USER && e.WP_APP_PASSWORD
      ? {
          wpUrl: e.WP_URL.replace(/\/+$/, ''),
          wpUser: e.WP_USER,
          wpAppPassword: e.WP_APP_PASSWORD,
        }
      : null

  return {
    wordpress,
    unsplash: e.UNSPLASH_ACCESS_KEY ? { accessKey: e.UNSPLASH_ACCESS_KEY } : null,
    ai: {
      anthropicApiKey: e.ANTHROPIC_API_KEY,
      geminiApiKey: e.GEMINI_API_KEY,
      openaiApiKey: e.OPENAI_API_KEY,
      timeoutMs: e.AI_TIMEOUT_MS,
      retryDelaysMs: [2000, 5000],
    },
    http: {
      timeoutMs: e.HTTP_TIMEOUT_MS,
      maxRetries: e.HTTP_MAX_RETRIES,
      retryDelayMs: e.HTTP_RETRY_DELAY_MS,
    },
    imageOptimize: e.IMAGE_OPTIMIZE,
    corsOrigins: parseCorsOrigins(e.CORS_ORIGINS),
  }
}

let cached: AppConfig | null = null

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig(process.env)
  }
  return cached
}

// ---- Required slices ----

export function requireWordPress(config: AppConfig): WordPressCredentials {
  if (!config.wordpress) {
    throw new ConfigurationError(
      'WordPress credentials are incomplete. Check WP_URL, WP_USER and WP_APP_PASSWORD.'
    )
  }
  return config.wordpress
}

export function requireUnsplash(config: AppConfig): UnsplashConfig {
  if (!config.unsplash) {
    throw new ConfigurationError('UNSPLASH_ACCESS_KEY is not configured.')
  }
  return config.unsplash
}
