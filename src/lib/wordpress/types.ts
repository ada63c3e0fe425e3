// WordPress REST API type definitions

import { z } from 'zod'

// Fields of a post object the publisher reads back
export const wpPostSchema = z.object({
  id: z.number().int(),
  content: z
    .object({
      rendered: z.string().default(''),
    })
    .optional(),
})

export type WPPost = z.infer<typeof wpPostSchema>

export const wpMediaSchema = z.object({
  id: z.number().int(),
})

export type WPMedia = z.infer<typeof wpMediaSchema>

export interface WPCreatePostInput {
  title: string
  content: string
  // Forwarded verbatim: publish, draft, pending, private, future...
  status: string
}

export interface WPUpdatePostInput {
  content?: string
  featured_media?: number
}

export interface WPUploadMediaInput {
  buffer: Buffer
  filename: string
  mimeType: string
}
