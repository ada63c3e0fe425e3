// ============================================================
// Outline Architect Prompt
// Builds a sectioned outline sized to the requested length
// ============================================================

import { LENGTH_TARGETS, type LengthType } from '@/lib/blog/types'

interface OutlineArchitectPrompt {
  system: string
  user: string
}

export function buildOutlineArchitectPrompt(idea: string, lengthType: LengthType): OutlineArchitectPrompt {
  const target = LENGTH_TARGETS[lengthType]

  const system = `You are an SEO content architect. You turn a blog idea into a structured outline that a writer can follow section by section.`

  const user = `Write an outline for this blog post idea:

"${idea}"

Constraints:
- Target length of the finished article: ${target.minWords}-${target.maxWords} words
- About ${target.sections} H2 sections, each with 2-4 bullet points
- Start with an introduction and end with a conclusion
- Include the main keyword naturally in the H1 and at least one H2

Return the outline as Markdown (# H1, ## H2, - bullets). No commentary.`

  return { system, user }
}
