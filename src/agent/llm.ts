import Anthropic from "@anthropic-ai/sdk"
import type { AgentConfig } from "./config.js"

/**
 * Message format for LLM conversation
 */
export interface LLMMessage {
  role: "system" | "user" | "assistant"
  content: string
}

/**
 * LLM client wrapper for Anthropic API
 */
export interface LLMClient {
  getModel(): string

  /**
   * Set the system prompt (clears history and adds system message)
   */
  setSystemPrompt(prompt: string): void

  addMessage(message: LLMMessage): void

  getHistory(): LLMMessage[]

  clearHistory(): void

  /**
   * Keep at most `limit` messages (the system message counts toward it)
   */
  setHistoryLimit(limit: number): void

  /**
   * Send a message and get a response from the LLM
   */
  chat(userMessage: string): Promise<string>
}

const RETRYABLE_ERRORS = ["rate limit", "timeout", "ECONNRESET", "overloaded"]

function isRetryable(error: unknown): boolean {
  return error instanceof Error && RETRYABLE_ERRORS.some((text) => error.message.includes(text))
}

/**
 * Merge consecutive messages of the same role (the API requires alternation)
 */
export function consolidateMessages(messages: LLMMessage[]): Anthropic.MessageParam[] {
  const consolidated: Anthropic.MessageParam[] = []

  for (const msg of messages) {
    if (msg.role === "system") continue
    const last = consolidated[consolidated.length - 1]

    if (last && last.role === msg.role && typeof last.content === "string") {
      last.content = last.content + "\n\n" + msg.content
    } else {
      consolidated.push({ role: msg.role, content: msg.content })
    }
  }

  return consolidated
}

/**
 * The request body for one turn. The system prompt travels as plain text.
 */
export function buildRequest(
  model: string,
  systemPrompt: string,
  history: LLMMessage[]
): Anthropic.MessageCreateParamsNonStreaming {
  return {
    model,
    max_tokens: 1024,
    system: systemPrompt,
    messages: consolidateMessages(history),
  }
}

/**
 * Create an LLM client with the given configuration
 */
export function createLLMClient(config: AgentConfig): LLMClient {
  if (!config.anthropicApiKey) {
    throw new Error("API key is required")
  }

  const anthropic = new Anthropic({
    apiKey: config.anthropicApiKey,
  })

  let history: LLMMessage[] = []
  let historyLimit: number | null = null
  let systemPrompt = ""
  const model = config.model

  function trimHistory(): void {
    if (historyLimit !== null && history.length > historyLimit) {
      const systemMessage = history.find((m) => m.role === "system")
      const nonSystemMessages = history.filter((m) => m.role !== "system")
      const trimmedNonSystem = nonSystemMessages.slice(-(historyLimit - (systemMessage ? 1 : 0)))

      history = systemMessage ? [systemMessage, ...trimmedNonSystem] : trimmedNonSystem
    }
  }

  async function send(): Promise<string> {
    const response = await anthropic.messages.create(buildRequest(model, systemPrompt, history))
    const first = response.content[0]
    return first?.type === "text" ? first.text : ""
  }

  return {
    getModel(): string {
      return model
    },

    setSystemPrompt(prompt: string): void {
      systemPrompt = prompt
      history = [{ role: "system", content: prompt }]
    },

    addMessage(message: LLMMessage): void {
      history.push(message)
      trimHistory()
    },

    getHistory(): LLMMessage[] {
      return [...history]
    },

    clearHistory(): void {
      history = []
      systemPrompt = ""
    },

    setHistoryLimit(limit: number): void {
      historyLimit = limit
      trimHistory()
    },

    async chat(userMessage: string): Promise<string> {
      this.addMessage({ role: "user", content: userMessage })

      let assistantMessage: string
      try {
        assistantMessage = await send()
      } catch (error) {
        if (!isRetryable(error)) throw error
        // Wait and retry once
        await new Promise((resolve) => globalThis.setTimeout(resolve, 2000))
        assistantMessage = await send()
      }

      this.addMessage({ role: "assistant", content: assistantMessage })
      return assistantMessage
    },
  }
}
