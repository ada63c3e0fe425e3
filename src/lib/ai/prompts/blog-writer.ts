// ============================================================
// Blog Writer Prompt
// Expands an outline into the full article body (HTML)
// ============================================================

import { LENGTH_TARGETS, type LengthType } from '@/lib/blog/types'

interface BlogWriterParams {
  outline: string
  writingStyle: string
  lengthType: LengthType
}

interface BlogWriterPrompt {
  system: string
  user: string
}

export function buildBlogWriterPrompt(params: BlogWriterParams): BlogWriterPrompt {
  const { outline, writingStyle, lengthType } = params
  const target = LENGTH_TARGETS[lengthType]

  const system = `You are an experienced blog writer. Your writing style is: ${writingStyle}. You write for people first and search engines second.`

  const user = `Write the complete blog post that follows this outline:

${outline}

Rules:
- Length: ${target.minWords}-${target.maxWords} words
- Output clean HTML suitable for a WordPress post body: <h2>, <h3>, <p>, <ul>/<li>, <strong>
- Do not include the H1 title, <html>, <head> or <body> tags
- No Markdown, no code fences, no text before or after the article`

  return { system, user }
}
