// ============================================================
// Idea Generator Prompt
// Asks for a fixed number of SEO-minded blog ideas as a JSON array
// ============================================================

interface IdeaGeneratorPrompt {
  system: string
  user: string
}

export function buildIdeaGeneratorPrompt(genre: string, count: number): IdeaGeneratorPrompt {
  const system = `You are an SEO content strategist. You propose blog post ideas that answer real search intent, have a clear angle and can rank on the first page of Google.`

  const user = `Propose exactly ${count} blog post ideas for the genre "${genre}".

Each idea is a single line: a working title followed by a one-sentence angle.

Return ONLY a valid JSON array of ${count} strings, no text before or after:
["idea 1", "idea 2", "idea 3"]`

  return { system, user }
}
