// ============================================================
// Google Gemini SDK wrapper
// Uses @google/generative-ai for text generation
// ============================================================

import { GoogleGenerativeAI } from '@google/generative-ai'
import type { AIResponse, ProviderCallOptions } from './types'

let genai: GoogleGenerativeAI | null = null
let cachedKey: string | null = null

function getClient(apiKey: string): GoogleGenerativeAI {
  if (!genai || cachedKey !== apiKey) {
    genai = new GoogleGenerativeAI(apiKey)
    cachedKey = apiKey
  }
  return genai
}

/**
 * Call Gemini for a single message completion.
 * Earlier messages become chat history; the last one is sent.
 */
export async function callGemini(options: ProviderCallOptions): Promise<AIResponse> {
  const start = Date.now()
  const client = getClient(options.apiKey)

  const modelName = options.model || 'gemini-2.0-flash'
  const model = client.getGenerativeModel(
    {
      model: modelName,
      systemInstruction: options.system || undefined,
      generationConfig: {
        maxOutputTokens: options.maxTokens || 2048,
        temperature: options.temperature ?? 0.7,
      },
    },
    { timeout: options.timeoutMs }
  )

  const lastMessage = options.messages[options.messages.length - 1]
  if (!lastMessage) {
    throw new Error('Gemini call requires at least one message')
  }

  // Gemini expects role: 'user' | 'model' (not 'assistant')
  const history = options.messages.slice(0, -1).map((m) => ({
    role: m.role === 'assistant' ? ('model' as const) : ('user' as const),
    parts: [{ text: m.content }],
  }))

  const chat = model.startChat({ history })
  const result = await chat.sendMessage(lastMessage.content)
  const response = result.response
  const usage = response.usageMetadata

  return {
    content: response.text(),
    model: modelName,
    provider: 'google',
    tokensIn: usage?.promptTokenCount || 0,
    tokensOut: usage?.candidatesTokenCount || 0,
    durationMs: Date.now() - start,
  }
}
