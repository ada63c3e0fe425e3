// ============================================================
// Publish workflow types
// ============================================================

export const IMAGE_STEPS = ['download', 'upload', 'tag', 'attach', 'credit'] as const

export type ImageStep = (typeof IMAGE_STEPS)[number]

export type StepStatus = 'success' | 'skipped' | 'failed'

export interface StepResult {
  step: ImageStep
  status: StepStatus
  reason?: string
}

export type FeaturedImageStatus =
  | 'not_requested'            // no image URL in the request
  | 'attached'                 // every step through credit succeeded
  | 'attached_without_credit'  // featured media set, credit append failed
  | 'failed'                   // download, upload or attach failed

export interface FeaturedImageReport {
  status: FeaturedImageStatus
  mediaId?: number
  steps: StepResult[]
}

export interface PublishRequest {
  title: string
  content: string
  status: string
  featuredImageUrl?: string | null
  photographerName?: string | null
  photographerLink?: string | null
}

export interface PublishedPost {
  postId: number
  /** The requested image URL, only when the whole image chain completed */
  featuredImageUrl: string | null
  featuredImage: FeaturedImageReport
}
