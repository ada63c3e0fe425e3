// ============================================================
// Featured image workflow
// download → upload → tag → attach → credit
// Every step is best-effort: a failure is recorded and logged,
// never thrown, and the post stays published.
// ============================================================

import { mkdtemp, readFile, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import path from 'path'
import type { HttpConfig } from '@/lib/config'
import { errorMessage } from '@/lib/errors'
import { fetchWithRetry } from '@/lib/http/fetch'
import { inspectImage, optimizeForWeb } from '@/lib/media/image'
import { featuredImageFilename } from '@/lib/media/filename'
import {
  updateMediaAltText,
  updatePost,
  uploadMedia,
  type WordPressClientOptions,
} from '@/lib/wordpress/client'
import type { WPPost } from '@/lib/wordpress/types'
import { buildAltText, buildCreditHtml } from './credit'
import {
  IMAGE_STEPS,
  type FeaturedImageReport,
  type FeaturedImageStatus,
  type ImageStep,
  type StepResult,
} from './types'

export interface FeaturedImageInput {
  postId: number
  postTitle: string
  imageUrl: string
  photographerName: string
  photographerLink: string
}

export interface FeaturedImageDeps {
  wordpress: WordPressClientOptions
  http: HttpConfig
  imageOptimize: boolean
  /** Parent directory for the per-request temp directory (defaults to the OS temp dir) */
  tmpRoot?: string
}

interface DownloadedImage {
  dir: string
  filePath: string
  filename: string
  mimeType: string
}

type StepOutcome<T> = { ok: true; value: T } | { ok: false; reason: string }

async function runStep<T>(
  step: ImageStep,
  postId: number,
  fn: () => Promise<T>
): Promise<StepOutcome<T>> {
  try {
    return { ok: true, value: await fn() }
  } catch (error) {
    const reason = errorMessage(error)
    console.warn(`[featured-image] ${step} failed for post ${postId}: ${reason}`)
    return { ok: false, reason }
  }
}

// ---- Steps ----

async function download(
  input: FeaturedImageInput,
  deps: FeaturedImageDeps
): Promise<DownloadedImage> {
  let buffer: Buffer = await fetchWithRetry(
    input.imageUrl,
    { method: 'GET' },
    deps.http,
    async (response) => {
      if (!response.ok) {
        await response.body?.cancel()
        throw new Error(`Image download answered ${response.status}`)
      }
      return Buffer.from(await response.arrayBuffer())
    },
    'featured-image'
  )
  let info = await inspectImage(buffer)

  if (deps.imageOptimize) {
    buffer = await optimizeForWeb(buffer)
    info = await inspectImage(buffer)
  }

  const dir = await mkdtemp(path.join(deps.tmpRoot ?? tmpdir(), 'featured-image-'))
  const filename = featuredImageFilename(input.postTitle, info.extension)
  const filePath = path.join(dir, filename)

  try {
    await writeFile(filePath, buffer)
  } catch (error) {
    await rm(dir, { recursive: true, force: true })
    throw error
  }

  return { dir, filePath, filename, mimeType: info.mimeType }
}

async function upload(image: DownloadedImage, deps: FeaturedImageDeps): Promise<number> {
  try {
    const buffer = await readFile(image.filePath)
    const media = await uploadMedia(deps.wordpress, {
      buffer,
      filename: image.filename,
      mimeType: image.mimeType,
    })
    return media.id
  } finally {
    await rm(image.dir, { recursive: true, force: true })
  }
}

// ---- Report assembly ----

function buildReport(
  status: FeaturedImageStatus,
  results: StepResult[],
  mediaId?: number
): FeaturedImageReport {
  const done = new Set(results.map((r) => r.step))
  const skipped = IMAGE_STEPS.filter((s) => !done.has(s)).map(
    (step): StepResult => ({ step, status: 'skipped' })
  )
  return {
    status,
    ...(mediaId !== undefined ? { mediaId } : {}),
    steps: [...results, ...skipped],
  }
}

function failed(step: ImageStep, reason: string): StepResult {
  return { step, status: 'failed', reason }
}

function succeeded(step: ImageStep): StepResult {
  return { step, status: 'success' }
}

/**
 * Report for a publish call that carried no image URL.
 */
export function notRequestedReport(): FeaturedImageReport {
  return buildReport('not_requested', [])
}

/**
 * Download the image, upload it to the media library, tag it, set it as the
 * post's featured media and append the photo credit to the post content.
 * Never throws; the report says which step degraded.
 */
export async function attachFeaturedImage(
  input: FeaturedImageInput,
  deps: FeaturedImageDeps
): Promise<FeaturedImageReport> {
  const results: StepResult[] = []

  const downloaded = await runStep('download', input.postId, () => download(input, deps))
  if (!downloaded.ok) {
    return buildReport('failed', [failed('download', downloaded.reason)])
  }
  results.push(succeeded('download'))

  const uploaded = await runStep('upload', input.postId, () => upload(downloaded.value, deps))
  if (!uploaded.ok) {
    return buildReport('failed', [...results, failed('upload', uploaded.reason)])
  }
  results.push(succeeded('upload'))
  const mediaId = uploaded.value

  // Alt text is cosmetic: carry on whatever happens
  const tagged = await runStep('tag', input.postId, () =>
    updateMediaAltText(deps.wordpress, mediaId, buildAltText(input.imageUrl, input.photographerName))
  )
  results.push(tagged.ok ? succeeded('tag') : failed('tag', tagged.reason))

  const attached = await runStep('attach', input.postId, () =>
    updatePost(deps.wordpress, input.postId, { featured_media: mediaId })
  )
  if (!attached.ok) {
    return buildReport('failed', [...results, failed('attach', attached.reason)], mediaId)
  }
  results.push(succeeded('attach'))

  const credited = await runStep('credit', input.postId, () =>
    appendCredit(attached.value, input, deps)
  )
  if (!credited.ok) {
    return buildReport(
      'attached_without_credit',
      [...results, failed('credit', credited.reason)],
      mediaId
    )
  }
  results.push(succeeded('credit'))

  return buildReport('attached', results, mediaId)
}

async function appendCredit(
  post: WPPost,
  input: FeaturedImageInput,
  deps: FeaturedImageDeps
): Promise<WPPost> {
  const existingContent = post.content?.rendered ?? ''
  const creditHtml = buildCreditHtml(input.photographerName, input.photographerLink)
  return updatePost(deps.wordpress, input.postId, { content: existingContent + creditHtml })
}
