// ============================================================
// Domain errors
// Each error carries a `kind` so the HTTP layer can map it to a
// closed set of client-visible error kinds.
// ============================================================

export type ApiErrorKind =
  | 'invalid_request'
  | 'generation_failed'
  | 'photo_lookup_failed'
  | 'publish_failed'
  | 'configuration_error'

/**
 * A downstream service answered with a non-success status.
 */
export class HttpStatusError extends Error {
  readonly status: number
  readonly body: string

  constructor(message: string, status: number, body: string) {
    super(`${message} (${status})${body ? ` : ${body}` : ''}`)
    this.name = 'HttpStatusError'
    this.status = status
    this.body = body
  }
}

export class ConfigurationError extends Error {
  readonly kind = 'configuration_error' as const

  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class GenerationError extends Error {
  readonly kind = 'generation_failed' as const

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'GenerationError'
  }
}

export class PhotoLookupError extends Error {
  readonly kind = 'photo_lookup_failed' as const

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Error fetching random Unsplash photo: ${message}`, options)
    this.name = 'PhotoLookupError'
  }
}

export class PublishError extends Error {
  readonly kind = 'publish_failed' as const

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'PublishError'
  }
}

export type DomainError =
  | ConfigurationError
  | GenerationError
  | PhotoLookupError
  | PublishError

export function isDomainError(error: unknown): error is DomainError {
  return (
    error instanceof ConfigurationError ||
    error instanceof GenerationError ||
    error instanceof PhotoLookupError ||
    error instanceof PublishError
  )
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
