import { readdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { EMOJI } from "./format"

export type MessageFilter = "user" | "assistant" | "all"

export interface SearchOptions {
  keywords: string[]
  limit?: number
  context_lines?: number
  message_type?: MessageFilter
}

export interface SearchResult {
  file: string
  matches: string[]
}

const MAX_MATCHES_PER_FILE = 3
const MAX_FILES = 100

const USER_HEADING = `## ${EMOJI.user} User`
const ASSISTANT_HEADING = `## ${EMOJI.assistant} Assistant`

export async function searchConversations(dir: string, options: SearchOptions): Promise<SearchResult[]> {
  const { keywords, limit = 20, context_lines = 2, message_type = "all" } = options
  const pattern = new RegExp(keywords.map(escapeRegex).join("|"), "i")

  const files = await findExportedFiles(dir)
  const results: SearchResult[] = []

  for (const file of files.slice(0, MAX_FILES)) {
    const text = await readFile(join(dir, file), "utf8")
    const matches = searchLines(text.split("\n"), pattern, context_lines, message_type)
    if (matches.length === 0) continue

    results.push({ file, matches })
    if (results.length >= limit) break
  }

  return results
}

/** Exported Markdown files, most recent first by their date prefix. */
async function findExportedFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(".md"))
    .map((entry) => entry.name)
    .sort()
    .reverse()
}

function searchLines(
  lines: string[],
  pattern: RegExp,
  contextLines: number,
  filter: MessageFilter
): string[] {
  const roles = sectionRoles(lines)
  const selected = new Set<number>()
  let found = 0

  for (const [index, line] of lines.entries()) {
    if (found >= MAX_MATCHES_PER_FILE) break
    if (filter !== "all" && roles[index] !== filter) continue
    if (line.startsWith("## ") || !pattern.test(line)) continue

    found++
    const start = Math.max(0, index - contextLines)
    const end = Math.min(lines.length - 1, index + contextLines)
    for (let i = start; i <= end; i++) {
      selected.add(i)
    }
  }

  return [...selected]
    .sort((a, b) => a - b)
    .map((i) => lines[i])
    .filter((line) => line.trim() !== "")
}

// Role of the turn section each line belongs to, null for the header block
function sectionRoles(lines: string[]): Array<MessageFilter | null> {
  let current: MessageFilter | null = null
  return lines.map((line) => {
    if (line.startsWith(USER_HEADING)) current = "user"
    else if (line.startsWith(ASSISTANT_HEADING)) current = "assistant"
    return current
  })
}

function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}

export function formatResults(results: SearchResult[]): string {
  if (results.length === 0) {
    return "No matches found."
  }

  let output = ""
  for (const result of results) {
    output += `\n${result.file}\n`
    for (const line of result.matches) {
      output += `  ${line}\n`
    }
  }
  return output.trim()
}
