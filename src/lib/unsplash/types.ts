import { z } from 'zod'

// Subset of the Unsplash `GET /photos/random` response we rely on
export const unsplashPhotoSchema = z.object({
  urls: z.object({
    full: z.string().url(),
  }),
  user: z.object({
    name: z.string(),
    links: z.object({
      html: z.string().url(),
    }),
  }),
})

export interface PhotoCandidate {
  imageUrl: string
  photographerName: string
  photographerLink: string
}
