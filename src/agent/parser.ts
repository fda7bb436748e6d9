import type { SweeperAction } from "../policy-runner/types.js"

/**
 * Parsed response from the LLM agent
 */
export interface AgentResponse {
  reasoning: string
  action: SweeperAction | null
  learning: string
  notes: string | null
  error?: string
}

const SECTION_NAMES = "REASONING|ACTION|LEARNING|NOTES"

/**
 * Extract a section from the response text
 */
function extractSection(text: string, sectionName: string): string {
  const pattern = new RegExp(`${sectionName}:\\s*(.+?)(?=\\n\\s*(?:${SECTION_NAMES}):|$)`, "is")
  const match = text.match(pattern)
  return match ? match[1].trim() : ""
}

/**
 * Strip markdown and punctuation an LLM tends to wrap an id in
 */
function cleanId(raw: string): string {
  return raw.replace(/^[`"'<]+|[`"'>.,;:!]+$/g, "")
}

/**
 * Parse the ACTION section into a SweeperAction
 */
export function parseAction(actionText: string): SweeperAction | null {
  const text = actionText.split("\n")[0].trim().replace(/^`+|`+$/g, "")
  if (!text) return null

  // "clean 42", "clean and move to 42", "cleanAndMoveTo(42)"
  const cleanMatch = text.match(/^clean(?:\s*and\s*move(?:\s*to)?)?[\s(]+(\S+?)\)?$/i)
  if (cleanMatch) {
    const to = cleanId(cleanMatch[1])
    return to ? { type: "CleanAndMove", to } : null
  }

  // "move 42", "move to 42", "moveTo(42)"
  const moveMatch = text.match(/^move(?:\s*to)?[\s(]+(\S+?)\)?$/i)
  if (moveMatch) {
    const to = cleanId(moveMatch[1])
    return to ? { type: "Move", to } : null
  }

  // "backup", "backup 3", "back up 2 steps", "backup(2)"
  const backupMatch = text.match(/^back\s*up(?:[\s(]+(\d+)\)?)?(?:\s+steps?)?\.?$/i)
  if (backupMatch) {
    const steps = backupMatch[1] !== undefined ? parseInt(backupMatch[1], 10) : 1
    return { type: "Backup", steps }
  }

  return null
}

/**
 * Parse an LLM response into a structured AgentResponse
 */
export function parseAgentResponse(response: string): AgentResponse {
  const reasoning = extractSection(response, "REASONING")
  const actionText = extractSection(response, "ACTION")
  const learning = extractSection(response, "LEARNING")
  const notes = extractSection(response, "NOTES") || null

  const action = parseAction(actionText)

  if (!action && actionText) {
    return {
      reasoning,
      action: null,
      learning,
      notes,
      error: `Could not parse action: "${actionText}"`,
    }
  }

  if (!action) {
    return {
      reasoning,
      action: null,
      learning,
      notes,
      error: "No ACTION section found in response",
    }
  }

  return { reasoning, action, learning, notes }
}
