// ============================================================
// Idea Reviewer Prompt
// Picks the strongest idea from a numbered list
// ============================================================

interface IdeaReviewerPrompt {
  system: string
  user: string
}

export function buildIdeaReviewerPrompt(ideas: string[]): IdeaReviewerPrompt {
  const system = `You are a senior blog editor. You judge ideas on search demand, originality and how much value a reader gets from the finished article.`

  const numbered = ideas.map((idea, i) => `${i + 1}. ${idea}`).join('\n')

  const user = `Here are the candidate blog ideas:

${numbered}

Pick the single best idea. Answer with its number only (for example "2"), nothing else.`

  return { system, user }
}
