import { describe, it, expect } from "@jest/globals"
import { parseAction, parseAgentResponse } from "./parser.js"

describe("Action Parser", () => {
  describe("parseAgentResponse", () => {
    it("should parse all sections", () => {
      const response = `
REASONING: The street to 1004 is dirty and long.

ACTION: clean 1004

LEARNING: Dirty streets cluster near the river.

NOTES: Dirt seen around 1004 and 1014.
`
      expect(parseAgentResponse(response)).toEqual({
        reasoning: "The street to 1004 is dirty and long.",
        action: { type: "CleanAndMove", to: "1004" },
        learning: "Dirty streets cluster near the river.",
        notes: "Dirt seen around 1004 and 1014.",
      })
    })

    it("should report a missing ACTION section", () => {
      const parsed = parseAgentResponse("I think I will go left.")
      expect(parsed.action).toBeNull()
      expect(parsed.error).toBe("No ACTION section found in response")
    })

    it("should report an action it cannot parse", () => {
      const parsed = parseAgentResponse("REASONING: hmm\nACTION: teleport home")
      expect(parsed.action).toBeNull()
      expect(parsed.error).toBe('Could not parse action: "teleport home"')
    })

    it("should leave notes null when absent", () => {
      expect(parseAgentResponse("ACTION: backup").notes).toBeNull()
    })

    it("should be case-insensitive about section names", () => {
      expect(parseAgentResponse("action: move 7").action).toEqual({ type: "Move", to: "7" })
    })
  })

  describe("parseAction", () => {
    it("parses move variants", () => {
      expect(parseAction("move 1002")).toEqual({ type: "Move", to: "1002" })
      expect(parseAction("Move to 1002")).toEqual({ type: "Move", to: "1002" })
      expect(parseAction("moveTo(1002)")).toEqual({ type: "Move", to: "1002" })
      expect(parseAction("move tower")).toEqual({ type: "Move", to: "tower" })
    })

    it("parses clean variants", () => {
      expect(parseAction("clean 1002")).toEqual({ type: "CleanAndMove", to: "1002" })
      expect(parseAction("clean and move to 1002")).toEqual({ type: "CleanAndMove", to: "1002" })
      expect(parseAction("cleanAndMoveTo(1002)")).toEqual({ type: "CleanAndMove", to: "1002" })
    })

    it("strips markdown and trailing punctuation from ids", () => {
      expect(parseAction("`move 1002`")).toEqual({ type: "Move", to: "1002" })
      expect(parseAction('clean "1002".')).toEqual({ type: "CleanAndMove", to: "1002" })
    })

    it("parses backup variants", () => {
      expect(parseAction("backup")).toEqual({ type: "Backup", steps: 1 })
      expect(parseAction("backup 3")).toEqual({ type: "Backup", steps: 3 })
      expect(parseAction("back up 2 steps")).toEqual({ type: "Backup", steps: 2 })
      expect(parseAction("backup(4)")).toEqual({ type: "Backup", steps: 4 })
    })

    it("uses only the first line", () => {
      expect(parseAction("move 5\nthen clean 6")).toEqual({ type: "Move", to: "5" })
    })

    it("returns null for anything else", () => {
      expect(parseAction("")).toBeNull()
      expect(parseAction("clean")).toBeNull()
      expect(parseAction("wait")).toBeNull()
    })
  })
})
