import type {
  SessionRecord,
  SessionMessage,
  ContentBlock,
  ConvertedSession,
  ParsedSession,
  Role,
  Turn,
} from "./types"
import { formatConversation, formatToolUse, truncateChars } from "./format"

const PREVIEW_LENGTH = 100

// Regions of injected markup and what replaces them
const SYSTEM_TAGS: ReadonlyArray<[tag: string, replacement: string]> = [
  ["system-reminder", ""],
  ["local-command-caveat", ""],
  ["local-command-stdout", "[command output]"],
  ["command-name", ""],
  ["command-message", ""],
  ["command-args", ""],
]

export function cleanSystemTags(text: string): string {
  let cleaned = text
  for (const [tag, replacement] of SYSTEM_TAGS) {
    const pattern = new RegExp(`<${tag}>[\\s\\S]*?</${tag}>`, "g")
    cleaned = cleaned.replace(pattern, () => replacement)
  }
  return cleaned.trim()
}

export function extractText(content: unknown): string {
  if (typeof content === "string") return content
  if (content === undefined) return ""

  if (Array.isArray(content)) {
    const parts: string[] = []
    for (const item of content) {
      if (!isContentBlock(item)) continue

      switch (item.type) {
        case "text":
          parts.push(typeof item.text === "string" ? item.text : "")
          break
        case "tool_use":
          parts.push(formatToolUse(item))
          break
        case "tool_result":
          // Tool output is left out of the transcript
          break
        case "thinking":
          break
      }
    }
    return parts.join("\n")
  }

  if (typeof content === "object" && content !== null) return JSON.stringify(content)
  return String(content)
}

function isContentBlock(value: unknown): value is ContentBlock {
  if (!isObject(value)) return false
  return value.type === "text"
    || value.type === "thinking"
    || value.type === "tool_use"
    || value.type === "tool_result"
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function isConversationType(type: unknown): type is Role {
  return type === "user" || type === "assistant"
}

function toSessionRecord(value: unknown): SessionRecord | null {
  if (!isObject(value) || typeof value.type !== "string") return null

  const message: SessionMessage | undefined = isObject(value.message)
    ? {
        role: typeof value.message.role === "string" ? value.message.role : undefined,
        content: value.message.content,
      }
    : undefined

  return {
    type: value.type,
    timestamp: typeof value.timestamp === "string" ? value.timestamp : undefined,
    message,
  }
}

/**
 * Collects the conversational turns of one session, one JSONL line at a time.
 */
export class SessionParser {
  private turns: Turn[] = []
  private firstTimestamp: string | null = null
  private preview = ""

  constructor(private readonly sessionId: string) {}

  parse(line: string): Turn | null {
    const trimmed = line.trim()
    if (!trimmed) return null

    let parsed: unknown
    try {
      parsed = JSON.parse(trimmed)
    }
    catch {
      return null
    }

    const record = toSessionRecord(parsed)
    if (!record || !isConversationType(record.type)) return null

    const role = record.message?.role ?? record.type
    const timestamp = record.timestamp ?? ""
    const text = cleanSystemTags(extractText(record.message?.content))

    if (!text) return null

    if (this.firstTimestamp === null && timestamp) {
      this.firstTimestamp = timestamp
    }
    if (role === "user" && !this.preview) {
      this.preview = truncateChars(text, PREVIEW_LENGTH).replace(/\n/g, " ")
    }

    const turn: Turn = { role, text, timestamp }
    this.turns.push(turn)
    return turn
  }

  finalize(): ParsedSession | null {
    if (this.turns.length === 0) return null
    return {
      sessionId: this.sessionId,
      turns: [...this.turns],
      firstTimestamp: this.firstTimestamp,
      preview: this.preview,
    }
  }
}

export function convertSession(lines: Iterable<string>, sessionId: string): ConvertedSession | null {
  const parser = new SessionParser(sessionId)
  for (const line of lines) {
    parser.parse(line)
  }

  const session = parser.finalize()
  if (!session) return null

  return {
    markdown: formatConversation(session.sessionId, session.turns, session.firstTimestamp),
    session,
  }
}
