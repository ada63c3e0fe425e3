import type { HttpConfig, UnsplashConfig } from '@/lib/config'
import { PhotoLookupError, errorMessage } from '@/lib/errors'
import { fetchWithRetry, readBodyText } from '@/lib/http/fetch'
import { unsplashPhotoSchema, type PhotoCandidate } from './types'

const UNSPLASH_API = 'https://api.unsplash.com'

async function readPhoto(response: Response): Promise<unknown> {
  if (!response.ok) {
    const text = await readBodyText(response)
    throw new PhotoLookupError(`Unsplash answered ${response.status}${text ? ` : ${text}` : ''}`)
  }

  try {
    return await response.json()
  } catch (error) {
    throw new PhotoLookupError(`invalid JSON response: ${errorMessage(error)}`, { cause: error })
  }
}

/**
 * Fetch one random landscape photo matching `query`, with attribution.
 * Retried as an idempotent read; any failure becomes a PhotoLookupError.
 */
export async function fetchRandomPhoto(
  query: string,
  unsplash: UnsplashConfig,
  http: HttpConfig
): Promise<PhotoCandidate> {
  const params = new URLSearchParams({ query, orientation: 'landscape' })
  const url = `${UNSPLASH_API}/photos/random?${params.toString()}`

  let body: unknown
  try {
    body = await fetchWithRetry(
      url,
      {
        method: 'GET',
        headers: {
          Authorization: `Client-ID ${unsplash.accessKey}`,
          'Accept-Version': 'v1',
        },
      },
      http,
      readPhoto,
      'unsplash'
    )
  } catch (error) {
    if (error instanceof PhotoLookupError) throw error
    throw new PhotoLookupError(errorMessage(error), { cause: error })
  }

  const parsed = unsplashPhotoSchema.safeParse(body)
  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => i.path.join('.')).join(', ')
    throw new PhotoLookupError(`unexpected response shape (${missing})`)
  }

  return {
    imageUrl: parsed.data.urls.full,
    photographerName: parsed.data.user.name,
    photographerLink: parsed.data.user.links.html,
  }
}
