import type { WordPressCredentials } from '@/lib/config'
import { HttpStatusError } from '@/lib/errors'
import { fetchWithTimeout, readBodyText } from '@/lib/http/fetch'
import {
  wpMediaSchema,
  wpPostSchema,
  type WPCreatePostInput,
  type WPMedia,
  type WPPost,
  type WPUpdatePostInput,
  type WPUploadMediaInput,
} from './types'

// Writes are not idempotent: every call goes out once, bounded by a timeout
// that also covers reading the response.
export interface WordPressClientOptions {
  creds: WordPressCredentials
  timeoutMs: number
}

// ---------- Auth helper ----------

export function buildAuthHeader(creds: WordPressCredentials): string {
  const token = Buffer.from(`${creds.wpUser}:${creds.wpAppPassword}`).toString('base64')
  return `Basic ${token}`
}

/**
 * Build the WP REST API base URL from credentials.
 */
export function apiBase(creds: WordPressCredentials): string {
  return `${creds.wpUrl}/wp-json/wp/v2`
}

// ---------- Internal request helpers ----------

async function readJson(response: Response, failure: string): Promise<unknown> {
  if (!response.ok) {
    throw new HttpStatusError(failure, response.status, await readBodyText(response))
  }
  return response.json()
}

async function postJson(
  options: WordPressClientOptions,
  path: string,
  body: Record<string, unknown>,
  failure: string
): Promise<unknown> {
  return fetchWithTimeout(
    `${apiBase(options.creds)}${path}`,
    {
      method: 'POST',
      headers: {
        Authorization: buildAuthHeader(options.creds),
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(body),
    },
    options.timeoutMs,
    (response) => readJson(response, failure)
  )
}

// ---------- Public API ----------

/**
 * Create a new post on the WordPress site.
 * The status is passed through as given; WordPress validates it.
 */
export async function createPost(
  options: WordPressClientOptions,
  input: WPCreatePostInput
): Promise<WPPost> {
  const json = await postJson(
    options,
    '/posts',
    { title: input.title, content: input.content, status: input.status },
    'Failed to create WordPress post'
  )
  return wpPostSchema.parse(json)
}

/**
 * Update an existing WordPress post.
 * WordPress uses POST for updates on /posts/{id}.
 */
export async function updatePost(
  options: WordPressClientOptions,
  postId: number,
  input: WPUpdatePostInput
): Promise<WPPost> {
  const json = await postJson(
    options,
    `/posts/${postId}`,
    { ...input },
    `Failed to update WordPress post ${postId}`
  )
  return wpPostSchema.parse(json)
}

/**
 * Upload a media file to WordPress as multipart/form-data (field "file").
 */
export async function uploadMedia(
  options: WordPressClientOptions,
  input: WPUploadMediaInput
): Promise<WPMedia> {
  const form = new FormData()
  form.append('file', new Blob([new Uint8Array(input.buffer)], { type: input.mimeType }), input.filename)

  // No Content-Type header: fetch sets the multipart boundary itself
  const json = await fetchWithTimeout(
    `${apiBase(options.creds)}/media`,
    {
      method: 'POST',
      headers: { Authorization: buildAuthHeader(options.creds) },
      body: form,
    },
    options.timeoutMs,
    (response) => readJson(response, `Failed to upload media "${input.filename}"`)
  )
  return wpMediaSchema.parse(json)
}

/**
 * Set the alt text of an uploaded media item.
 */
export async function updateMediaAltText(
  options: WordPressClientOptions,
  mediaId: number,
  altText: string
): Promise<WPMedia> {
  const json = await postJson(
    options,
    `/media/${mediaId}`,
    { alt_text: altText },
    `Failed to update alt text for media ${mediaId}`
  )
  return wpMediaSchema.parse(json)
}
