// ============================================================
// Blog generation steps
// Thin wrappers over the AI router: build the prompt, run the
// task, clean the reply. Each call is independent and stateless.
// ============================================================

import type { TextGenerator } from '@/lib/ai/types'
import { buildIdeaGeneratorPrompt } from '@/lib/ai/prompts/idea-generator'
import { buildIdeaReviewerPrompt } from '@/lib/ai/prompts/idea-reviewer'
import { buildOutlineArchitectPrompt } from '@/lib/ai/prompts/outline-architect'
import { buildBlogWriterPrompt } from '@/lib/ai/prompts/blog-writer'
import { ConfigurationError, GenerationError, errorMessage } from '@/lib/errors'
import { DEFAULT_WRITING_STYLE, IDEA_COUNT, type LengthType } from './types'

// ---- Helpers ----

function stripCodeFence(text: string): string {
  let content = text.trim()
  content = content.replace(/^```[a-z]*\s*\n?/i, '')
  if (content.endsWith('```')) {
    content = content.slice(0, -3)
  }
  return content.trim()
}

/**
 * Run one task and return the trimmed reply text.
 * Provider failures become GenerationError; missing keys stay ConfigurationError.
 */
async function runTask(
  generate: TextGenerator,
  task: Parameters<TextGenerator>[0],
  prompt: { system: string; user: string }
): Promise<string> {
  let content: string
  try {
    const response = await generate(task, [{ role: 'user', content: prompt.user }], prompt.system)
    content = response.content
  } catch (error) {
    if (error instanceof ConfigurationError) throw error
    throw new GenerationError(`Text generation failed (${task}): ${errorMessage(error)}`, { cause: error })
  }

  const cleaned = stripCodeFence(content)
  if (!cleaned) {
    throw new GenerationError(`Text generation returned an empty response (${task})`)
  }
  return cleaned
}

/**
 * Parse the idea list out of a model reply.
 * Prefers a JSON array of strings; otherwise falls back to one idea per line,
 * dropping list markers such as "1." or "-".
 */
export function parseIdeas(reply: string): string[] {
  try {
    const data: unknown = JSON.parse(reply)
    if (Array.isArray(data)) {
      const ideas = data
        .filter((item): item is string => typeof item === 'string')
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
      if (ideas.length > 0) return ideas
    }
  } catch {
    // not JSON: fall through to line parsing
  }

  return reply
    .split('\n')
    .map((line) => line.replace(/^\s*(?:\d+[.)]|[-*•])\s*/, '').trim())
    .filter((line) => line.length > 0)
}

/**
 * Resolve the reviewer's answer to one of the candidate ideas.
 * A bare number selects by position; a verbatim idea is returned as the
 * matching candidate; anything else is passed through unchanged.
 */
export function resolveSelection(reply: string, ideas: string[]): string {
  const indexMatch = reply.match(/^\s*(\d+)\s*[.)]?\s*$/) ?? reply.match(/^\s*(\d+)[.)]\s/)
  if (indexMatch) {
    const index = Number(indexMatch[1]) - 1
    const idea = ideas[index]
    if (idea !== undefined) return idea
  }

  const normalized = reply.replace(/^["'\s]+|["'\s]+$/g, '').toLowerCase()
  const exact = ideas.find((idea) => idea.trim().toLowerCase() === normalized)
  return exact ?? reply
}

// ---- Public API ----

export async function generateIdeas(generate: TextGenerator, genre: string): Promise<string[]> {
  const reply = await runTask(generate, 'generate_ideas', buildIdeaGeneratorPrompt(genre, IDEA_COUNT))
  const ideas = parseIdeas(reply)
  if (ideas.length === 0) {
    throw new GenerationError('Text generation returned no ideas')
  }
  return ideas
}

export async function selectIdea(generate: TextGenerator, ideas: string[]): Promise<string> {
  if (ideas.length === 1) return ideas[0]

  const reply = await runTask(generate, 'select_idea', buildIdeaReviewerPrompt(ideas))
  return resolveSelection(reply, ideas)
}

export async function generateOutline(
  generate: TextGenerator,
  idea: string,
  lengthType: LengthType
): Promise<string> {
  return runTask(generate, 'generate_outline', buildOutlineArchitectPrompt(idea, lengthType))
}

export async function writeBlogPost(
  generate: TextGenerator,
  params: { outline: string; writingStyle?: string; lengthType: LengthType }
): Promise<string> {
  return runTask(
    generate,
    'write_blog',
    buildBlogWriterPrompt({
      outline: params.outline,
      writingStyle: params.writingStyle || DEFAULT_WRITING_STYLE,
      lengthType: params.lengthType,
    })
  )
}
