import { basename } from "node:path"
import type { ExportResult, ToolUseBlock, Turn } from "./types"

export const EMOJI = {
  user: "🧑",
  assistant: "🤖",
} as const

export const BASH_COMMAND_LIMIT = 120

type ToolInput = Record<string, unknown>
type ToolSummary = (name: string, input: ToolInput) => string

const pathSummary: ToolSummary = (name, input) =>
  `[Tool: ${name} → ${field(input.file_path)}]`

const patternSummary: ToolSummary = (name, input) =>
  `[Tool: ${name} → ${field(input.pattern)}]`

// Tools not listed here fall back to `[Tool: <name>]`
export const TOOL_SUMMARIES: Readonly<Record<string, ToolSummary>> = {
  Write: pathSummary,
  Edit: pathSummary,
  Read: pathSummary,
  Bash: (_name, input) => `[Tool: Bash → \`${truncateChars(field(input.command), BASH_COMMAND_LIMIT)}\`]`,
  Glob: patternSummary,
  Grep: patternSummary,
}

export function formatToolUse(block: ToolUseBlock): string {
  const name = field(block.name)
  const summary = Object.hasOwn(TOOL_SUMMARIES, name) ? TOOL_SUMMARIES[name] : undefined
  if (!summary) return `[Tool: ${name}]`
  return summary(name, block.input ?? {})
}

/** First `limit` characters of `text`, counted by code point. */
export function truncateChars(text: string, limit: number): string {
  return Array.from(text).slice(0, limit).join("")
}

function field(value: unknown): string {
  if (value === undefined || value === null) return ""
  if (typeof value === "string") return value
  if (typeof value === "object") return JSON.stringify(value)
  return String(value)
}

const ISO_TIMESTAMP =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2})(?::(\d{2})(?::(\d{2})(?:[.,]\d+)?)?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/

/**
 * Wall-clock `HH:MM` of an ISO-8601 timestamp, read in the timestamp's own
 * zone. Returns null when the value is missing or not a valid date-time.
 */
export function formatTime(timestamp: string | null | undefined): string | null {
  if (!timestamp) return null

  const match = timestamp.match(ISO_TIMESTAMP)
  if (!match) return null

  const [, year, month, day, hour = "00", minute = "00", second = "00", zone] = match

  const y = Number(year)
  const mo = Number(month)
  const d = Number(day)
  if (mo < 1 || mo > 12) return null
  if (d < 1 || d > daysInMonth(y, mo)) return null
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null

  if (zone && zone !== "Z") {
    const offsetHours = Number(zone.slice(1, 3))
    const offsetMinutes = Number(zone.slice(1).replace(":", "").slice(2) || "0")
    if (offsetHours > 23 || offsetMinutes > 59) return null
  }

  return `${hour}:${minute}`
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate()
}

export function formatConversation(
  sessionId: string,
  turns: Turn[],
  firstTimestamp: string | null
): string {
  const date = firstTimestamp ? firstTimestamp.slice(0, 10) : "unknown"

  let output = `# Conversation ${truncateChars(sessionId, 8)}\n\n`
  output += `- Date: ${date}\n`
  output += `- Session: \`${sessionId}\`\n`
  output += `- Messages: ${turns.length}\n\n`
  output += "---\n\n"

  for (const turn of turns) {
    output += formatTurnHeading(turn) + "\n\n"
    output += turn.text.trim() + "\n\n"
  }

  return output
}

function formatTurnHeading(turn: Turn): string {
  const time = formatTime(turn.timestamp)
  const suffix = time ? ` (${time})` : ""
  if (turn.role === "user") {
    return `## ${EMOJI.user} User${suffix}`
  }
  return `## ${EMOJI.assistant} Assistant${suffix}`
}

/** `YYYYMMDD-<first 8 chars of session id>.md`, dated by local time. */
export function outputFileName(sessionId: string, modified: Date): string {
  const year = modified.getFullYear()
  const month = String(modified.getMonth() + 1).padStart(2, "0")
  const day = String(modified.getDate()).padStart(2, "0")
  return `${year}${month}${day}-${truncateChars(sessionId, 8)}.md`
}

export function formatExportResult(result: ExportResult): string {
  const lines = [`Exported ${result.exported.length} of ${result.found} conversations`]
  for (const entry of result.exported) {
    lines.push(`${basename(entry.file)} — ${entry.turns} messages — ${entry.preview}`)
  }
  return lines.join("\n")
}

/** Whole kilobytes, ties rounded to even. */
export function formatKilobytes(bytes: number): string {
  const kb = bytes / 1024
  const floor = Math.floor(kb)
  const rest = kb - floor
  if (rest > 0.5) return String(floor + 1)
  if (rest < 0.5) return String(floor)
  return String(floor % 2 === 0 ? floor : floor + 1)
}
