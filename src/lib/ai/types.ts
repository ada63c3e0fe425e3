// ============================================================
// Common AI types for the blog pipeline
// ============================================================

export type AIProvider = 'anthropic' | 'google' | 'openai'

export type AITask =
  | 'generate_ideas'     // Brainstorm blog ideas for a genre -> GPT-4o mini
  | 'select_idea'        // Pick the strongest idea -> Claude
  | 'generate_outline'   // Build an outline for one idea -> Claude
  | 'write_blog'         // Expand an outline into the article -> Claude

export interface AIMessage {
  role: 'user' | 'assistant'
  content: string
}

export interface AIResponse {
  content: string
  model: string
  provider: AIProvider
  tokensIn: number
  tokensOut: number
  durationMs: number
}

export interface ModelConfig {
  provider: AIProvider
  model: string
  maxTokens: number
  temperature: number
}

/** Options shared by every provider wrapper */
export interface ProviderCallOptions {
  apiKey: string
  timeoutMs: number
  model?: string
  messages: AIMessage[]
  system?: string
  maxTokens?: number
  temperature?: number
}

/**
 * A function that runs one AI task. The router implements it; tests
 * substitute a deterministic stub.
 */
export type TextGenerator = (
  task: AITask,
  messages: AIMessage[],
  system?: string
) => Promise<AIResponse>
