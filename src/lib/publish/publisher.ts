// ============================================================
// WordPress publisher
// Creates the post, then runs the featured image workflow.
// Only the create call can fail the request: once the post
// exists it is reported as published, with or without image.
// ============================================================

import { ZodError } from 'zod'
import type { HttpConfig, WordPressCredentials } from '@/lib/config'
import { HttpStatusError, PublishError, errorMessage } from '@/lib/errors'
import { createPost } from '@/lib/wordpress/client'
import { attachFeaturedImage, notRequestedReport } from './featured-image'
import type { PublishRequest, PublishedPost } from './types'

export interface PublisherDeps {
  wordpress: WordPressCredentials
  http: HttpConfig
  imageOptimize: boolean
  tmpRoot?: string
}

function createFailureMessage(error: unknown): string {
  if (error instanceof HttpStatusError) return error.message
  if (error instanceof ZodError) return 'WordPress response did not include a post id'
  return `Failed to create WordPress post: ${errorMessage(error)}`
}

/**
 * Human-readable confirmation returned to the caller.
 */
export function publishDetail(status: string): string {
  return `Post successfully ${status} to WordPress!`
}

/**
 * Publish a post and, when an image URL is given, attach it as the featured
 * image with a photo credit.
 *
 * @throws PublishError when the post itself cannot be created
 */
export async function publishPost(
  request: PublishRequest,
  deps: PublisherDeps
): Promise<PublishedPost> {
  const wordpress = { creds: deps.wordpress, timeoutMs: deps.http.timeoutMs }

  let postId: number
  try {
    const post = await createPost(wordpress, {
      title: request.title,
      content: request.content,
      status: request.status,
    })
    postId = post.id
  } catch (error) {
    const message = createFailureMessage(error)
    console.error(`[publish] ${message}`)
    throw new PublishError(message, { cause: error })
  }

  if (!request.featuredImageUrl) {
    return { postId, featuredImageUrl: null, featuredImage: notRequestedReport() }
  }

  const featuredImage = await attachFeaturedImage(
    {
      postId,
      postTitle: request.title,
      imageUrl: request.featuredImageUrl,
      photographerName: request.photographerName ?? '',
      photographerLink: request.photographerLink ?? '',
    },
    {
      wordpress,
      http: deps.http,
      imageOptimize: deps.imageOptimize,
      tmpRoot: deps.tmpRoot,
    }
  )

  return {
    postId,
    featuredImageUrl: featuredImage.status === 'attached' ? request.featuredImageUrl : null,
    featuredImage,
  }
}
