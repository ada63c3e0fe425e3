// In-process stand-in for the WordPress REST API and the image host.
// Installed as the global fetch; records every call it receives.

import sharp from 'sharp'
import type { WordPressCredentials } from '@/lib/config'

export const TEST_CREDS: WordPressCredentials = {
  wpUrl: 'https://blog.test',
  wpUser: 'editor',
  wpAppPassword: 'test-secret',
}

export const TEST_HTTP = { timeoutMs: 1000, maxRetries: 0, retryDelayMs: 0 }

export type FailingEndpoint = 'create' | 'download' | 'upload' | 'tag' | 'attach' | 'credit'

export interface RecordedCall {
  method: string
  url: string
  endpoint: FailingEndpoint | 'other'
  json?: Record<string, unknown>
  file?: { name: string; type: string; size: number }
}

interface StoredPost {
  id: number
  title: string
  content: string
  status: string
  featured_media: number
}

export async function createTestJpeg(): Promise<Buffer> {
  return sharp({
    create: { width: 8, height: 6, channels: 3, background: { r: 200, g: 120, b: 40 } },
  })
    .jpeg()
    .toBuffer()
}

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

export class FakeWordPress {
  readonly calls: RecordedCall[] = []
  readonly posts = new Map<number, StoredPost>()
  readonly media = new Map<number, { alt_text: string; filename: string }>()
  readonly failures = new Map<FailingEndpoint, number>()
  /** Bytes served for any image URL */
  images = new Map<string, Buffer>()
  nextPostId = 42
  nextMediaId = 7
  omitPostId = false

  private readonly api = `${TEST_CREDS.wpUrl}/wp-json/wp/v2`

  failWith(endpoint: FailingEndpoint, status: number): this {
    this.failures.set(endpoint, status)
    return this
  }

  callsTo(endpoint: FailingEndpoint): RecordedCall[] {
    return this.calls.filter((c) => c.endpoint === endpoint)
  }

  readonly fetch = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url
    const method = init?.method ?? 'GET'
    const call: RecordedCall = { method, url, endpoint: 'other' }
    this.calls.push(call)

    if (typeof init?.body === 'string') {
      call.json = JSON.parse(init.body)
    }
    if (init?.body instanceof FormData) {
      const file = init.body.get('file')
      if (file instanceof File) {
        call.file = { name: file.name, type: file.type, size: file.size }
      }
    }

    if (method === 'GET') {
      call.endpoint = 'download'
      return this.respond('download', () => {
        const bytes = this.images.get(url)
        if (!bytes) return new Response('not found', { status: 404 })
        return new Response(new Uint8Array(bytes), { status: 200 })
      })
    }

    if (url === `${this.api}/posts`) {
      call.endpoint = 'create'
      return this.respond('create', () => this.createPost(call.json ?? {}))
    }

    if (url === `${this.api}/media`) {
      call.endpoint = 'upload'
      return this.respond('upload', () => {
        const id = this.nextMediaId++
        this.media.set(id, { alt_text: '', filename: call.file?.name ?? '' })
        return json({ id, source_url: `${TEST_CREDS.wpUrl}/uploads/${call.file?.name}` }, 201)
      })
    }

    const mediaMatch = url.match(/\/media\/(\d+)$/)
    if (mediaMatch) {
      call.endpoint = 'tag'
      return this.respond('tag', () => {
        const id = Number(mediaMatch[1])
        const item = this.media.get(id)
        if (!item) return json({ code: 'rest_post_invalid_id' }, 404)
        item.alt_text = String(call.json?.alt_text ?? '')
        return json({ id, alt_text: item.alt_text })
      })
    }

    const postMatch = url.match(/\/posts\/(\d+)$/)
    if (postMatch) {
      const isAttach = call.json !== undefined && 'featured_media' in call.json
      call.endpoint = isAttach ? 'attach' : 'credit'
      return this.respond(call.endpoint, () => this.updatePost(Number(postMatch[1]), call.json ?? {}))
    }

    return json({ code: 'rest_no_route' }, 404)
  }

  private respond(endpoint: FailingEndpoint, ok: () => Response): Response {
    const status = this.failures.get(endpoint)
    if (status !== undefined) {
      return json({ code: 'fake_failure', endpoint }, status)
    }
    return ok()
  }

  private createPost(body: Record<string, unknown>): Response {
    const post: StoredPost = {
      id: this.nextPostId++,
      title: String(body.title ?? ''),
      content: String(body.content ?? ''),
      status: String(body.status ?? ''),
      featured_media: 0,
    }
    this.posts.set(post.id, post)
    if (this.omitPostId) {
      return json({ status: post.status }, 201)
    }
    return json(this.serialize(post), 201)
  }

  private updatePost(id: number, body: Record<string, unknown>): Response {
    const post = this.posts.get(id)
    if (!post) return json({ code: 'rest_post_invalid_id' }, 404)
    if (typeof body.featured_media === 'number') post.featured_media = body.featured_media
    if (typeof body.content === 'string') post.content = body.content
    return json(this.serialize(post))
  }

  private serialize(post: StoredPost) {
    return {
      id: post.id,
      status: post.status,
      link: `${TEST_CREDS.wpUrl}/?p=${post.id}`,
      featured_media: post.featured_media,
      title: { rendered: post.title },
      content: { rendered: post.content },
    }
  }
}
