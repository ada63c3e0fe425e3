import { z } from 'zod'

export const LENGTH_TYPES = ['short', 'medium', 'long'] as const

export const lengthTypeSchema = z.enum(LENGTH_TYPES)

export type LengthType = z.infer<typeof lengthTypeSchema>

/** Target word ranges per length category */
export const LENGTH_TARGETS: Record<LengthType, { minWords: number; maxWords: number; sections: number }> = {
  short: { minWords: 500, maxWords: 800, sections: 3 },
  medium: { minWords: 1000, maxWords: 1500, sections: 5 },
  long: { minWords: 2000, maxWords: 3000, sections: 8 },
}

export const DEFAULT_WRITING_STYLE = 'Professional, engaging, and informative'

export const IDEA_COUNT = 3
