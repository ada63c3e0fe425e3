import { NextRequest } from 'next/server'
import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest'
import type { AIResponse, TextGenerator } from '@/lib/ai/types'
import type { AppConfig } from '@/lib/config'
import { FakeWordPress, createTestJpeg } from '@/test/fake-wordpress'

const { testConfig, generate } = vi.hoisted(() => {
  const testConfig: AppConfig = {
    wordpress: { wpUrl: 'https://blog.test', wpUser: 'editor', wpAppPassword: 'test-secret' },
    unsplash: { accessKey: 'test-access-key' },
    ai: { timeoutMs: 1000, retryDelaysMs: [] },
    http: { timeoutMs: 1000, maxRetries: 0, retryDelayMs: 0 },
    imageOptimize: false,
    corsOrigins: [],
  }
  return { testConfig, generate: vi.fn<TextGenerator>() }
})

vi.mock('@/lib/config', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@/lib/config')>()),
  getConfig: () => testConfig,
}))

vi.mock('@/lib/ai/router', () => ({
  createTextGenerator: () => generate,
}))

import { POST as generateBlog } from './generate_blog/route'
import { POST as generateIdeas } from './generate_ideas/route'
import { POST as generateOutline } from './generate_outline/route'
import { GET as getRandomImage } from './get_random_image/route'
import { POST as publish } from './publish/route'
import { GET as hello } from './route'
import { POST as selectIdea } from './select_idea/route'

const IDEAS = [
  'Lisbon on a budget: three days of trams and pastries',
  'Slow travel in the Azores: hiking between hot springs',
  'Porto for food lovers: a tasca crawl',
]

const ANSWERS: Record<string, string> = {
  generate_ideas: JSON.stringify(IDEAS),
  select_idea: '2',
  generate_outline: '# Slow travel in the Azores\n## Getting there\n## Hot springs',
  write_blog: '<h1>Slow travel in the Azores</h1><p>Bring boots.</p>',
}

const PHOTO = {
  id: 'abc123',
  urls: { full: 'https://img/1.jpg' },
  user: { name: 'Jane Doe', links: { html: 'https://unsplash.com/@jane' } },
}

function reply(content: string): AIResponse {
  return { content, model: 'stub', provider: 'anthropic', tokensIn: 1, tokensOut: 1, durationMs: 0 }
}

function post(path: string, body: unknown): NextRequest {
  return new NextRequest(`http://localhost${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  })
}

describe('blog pipeline endpoints', () => {
  let jpeg: Buffer
  let wp: FakeWordPress
  let unsplashStatus: number

  beforeAll(async () => {
    jpeg = await createTestJpeg()
  })

  beforeEach(() => {
    testConfig.wordpress = { wpUrl: 'https://blog.test', wpUser: 'editor', wpAppPassword: 'test-secret' }
    testConfig.unsplash = { accessKey: 'test-access-key' }
    generate.mockImplementation(async (task) => reply(ANSWERS[task] ?? ''))

    wp = new FakeWordPress()
    wp.images.set('https://img/1.jpg', jpeg)
    unsplashStatus = 200
    vi.stubGlobal('fetch', async (input: string, init?: RequestInit) => {
      if (input.startsWith('https://api.unsplash.com/')) {
        const body = unsplashStatus === 200 ? PHOTO : { errors: ['Rate Limit Exceeded'] }
        return new Response(JSON.stringify(body), { status: unsplashStatus })
      }
      return wp.fetch(input, init)
    })
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  it('answers the liveness check', async () => {
    const res = await hello()
    expect(await res.json()).toEqual({ message: 'Hello from the Blog Pipeline API!' })
  })

  it('runs a travel post from ideas to a published draft', async () => {
    const ideasRes = await generateIdeas(post('/generate_ideas', { genre: 'travel' }))
    const { ideas } = await ideasRes.json()
    expect(ideas).toEqual(IDEAS)

    const selectRes = await selectIdea(post('/select_idea', { ideas }))
    const { selected_idea } = await selectRes.json()
    expect(selected_idea).toBe(IDEAS[1])

    const outlineRes = await generateOutline(
      post('/generate_outline', { idea: selected_idea, length_type: 'short' })
    )
    const { outline } = await outlineRes.json()
    expect(outline).toBe(ANSWERS.generate_outline)

    const blogRes = await generateBlog(post('/generate_blog', { outline, length_type: 'short' }))
    const { blog_post } = await blogRes.json()
    expect(blog_post).toBe(ANSWERS.write_blog)
    expect(generate.mock.calls[2][1][0].content).toContain('500-800 words')
    expect(generate.mock.calls[3][2]).toContain('Professional, engaging, and informative')

    const imageRes = await getRandomImage(new NextRequest('http://localhost/get_random_image?genre=travel'))
    const image = await imageRes.json()
    expect(image).toEqual({
      image_url: 'https://img/1.jpg',
      photographer_name: 'Jane Doe',
      photographer_link: 'https://unsplash.com/@jane',
    })

    const publishRes = await publish(
      post('/publish', {
        title: selected_idea,
        content: blog_post,
        status: 'draft',
        featured_image_url: image.image_url,
        photographer_name: image.photographer_name,
        photographer_link: image.photographer_link,
      })
    )
    expect(publishRes.status).toBe(200)
    expect(await publishRes.json()).toMatchObject({
      detail: 'Post successfully draft to WordPress!',
      postId: 42,
      featuredImageUrl: 'https://img/1.jpg',
      featuredImage: { status: 'attached', mediaId: 7 },
    })
    expect(wp.posts.get(42)?.featured_media).toBe(7)
  })

  it('still reports the post when the image upload fails', async () => {
    wp.failWith('upload', 500)

    const res = await publish(
      post('/publish', {
        title: 'Porto for food lovers',
        content: '<p>Eat.</p>',
        status: 'draft',
        featured_image_url: 'https://img/1.jpg',
        photographer_name: 'Jane Doe',
        photographer_link: 'https://unsplash.com/@jane',
      })
    )

    expect(res.status).toBe(200)
    const body = await res.json()
    expect(body.postId).toBe(42)
    expect(body.featuredImageUrl).toBeNull()
    expect(body.featuredImage.status).toBe('failed')
  })

  it('publishes without image fields', async () => {
    const res = await publish(post('/publish', { title: 'T', content: 'C', status: 'publish' }))

    expect(await res.json()).toEqual({
      detail: 'Post successfully publish to WordPress!',
      postId: 42,
      featuredImageUrl: null,
      featuredImage: {
        status: 'not_requested',
        steps: [
          { step: 'download', status: 'skipped' },
          { step: 'upload', status: 'skipped' },
          { step: 'tag', status: 'skipped' },
          { step: 'attach', status: 'skipped' },
          { step: 'credit', status: 'skipped' },
        ],
      },
    })
  })

  it('treats empty image fields as no image', async () => {
    const res = await publish(
      post('/publish', {
        title: 'T',
        content: 'C',
        status: 'draft',
        featured_image_url: '',
        photographer_name: '',
        photographer_link: '',
      })
    )

    expect(res.status).toBe(200)
    const body = await res.json()
    expect(body.postId).toBe(42)
    expect(body.featuredImageUrl).toBeNull()
    expect(body.featuredImage.status).toBe('not_requested')
    expect(wp.calls).toHaveLength(1)
    expect(wp.calls[0].endpoint).toBe('create')
  })

  it('turns a WordPress rejection into a publish error', async () => {
    wp.failWith('create', 401)

    const res = await publish(post('/publish', { title: 'T', content: 'C', status: 'draft' }))

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      detail: 'Failed to create WordPress post (401) : {"code":"fake_failure","endpoint":"create"}',
      kind: 'publish_failed',
    })
  })

  it('reports missing WordPress credentials as a configuration error', async () => {
    testConfig.wordpress = null

    const res = await publish(post('/publish', { title: 'T', content: 'C', status: 'draft' }))

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      detail: 'WordPress credentials are incomplete. Check WP_URL, WP_USER and WP_APP_PASSWORD.',
      kind: 'configuration_error',
    })
    expect(wp.calls).toHaveLength(0)
  })

  it('reports a failing Unsplash lookup', async () => {
    unsplashStatus = 403

    const res = await getRandomImage(new NextRequest('http://localhost/get_random_image?genre=travel'))

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      detail:
        'Error fetching random Unsplash photo: Unsplash answered 403 : {"errors":["Rate Limit Exceeded"]}',
      kind: 'photo_lookup_failed',
    })
  })

  it('reports a provider failure as a generation error', async () => {
    generate.mockRejectedValue(new Error('529 overloaded'))

    const res = await generateIdeas(post('/generate_ideas', { genre: 'travel' }))

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({
      detail: 'Text generation failed (generate_ideas): 529 overloaded',
      kind: 'generation_failed',
    })
  })
})

describe('request validation', () => {
  it('rejects an unknown length category', async () => {
    const res = await generateOutline(post('/generate_outline', { idea: 'Lisbon', length_type: 'huge' }))

    expect(res.status).toBe(400)
    const body = await res.json()
    expect(body.kind).toBe('invalid_request')
    expect(body.detail).toBe('Validation failed')
    expect(Object.keys(body.details)).toEqual(['length_type'])
  })

  it('rejects a body that is not JSON', async () => {
    const res = await generateIdeas(
      new NextRequest('http://localhost/generate_ideas', { method: 'POST', body: 'genre=travel' })
    )

    expect(res.status).toBe(400)
    expect(await res.json()).toEqual({ detail: 'Invalid JSON body', kind: 'invalid_request' })
  })

  it('requires a genre for the random image', async () => {
    const res = await getRandomImage(new NextRequest('http://localhost/get_random_image'))

    expect(res.status).toBe(400)
    expect((await res.json()).kind).toBe('invalid_request')
  })

  it('rejects an empty idea list', async () => {
    const res = await selectIdea(post('/select_idea', { ideas: [] }))

    expect((await res.json()).details).toEqual({ ideas: ['at least one idea is required'] })
  })

  it('rejects a malformed image URL before touching WordPress', async () => {
    const res = await publish(
      post('/publish', { title: 'T', content: 'C', status: 'draft', featured_image_url: 'not-a-url' })
    )

    expect((await res.json()).details).toEqual({
      featured_image_url: ['featured_image_url must be a valid URL'],
    })
  })
})
