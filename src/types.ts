export interface SessionRecord {
  type: string
  timestamp?: string
  message?: SessionMessage
}

export interface SessionMessage {
  role?: string
  content?: unknown
}

export type ContentBlock =
  | TextBlock
  | ThinkingBlock
  | ToolUseBlock
  | ToolResultBlock

export interface TextBlock {
  type: "text"
  text?: string
}

export interface ThinkingBlock {
  type: "thinking"
  thinking?: string
}

export interface ToolUseBlock {
  type: "tool_use"
  id?: string
  name?: string
  input?: Record<string, unknown>
}

export interface ToolResultBlock {
  type: "tool_result"
  tool_use_id?: string
  content?: unknown
  is_error?: boolean
}

export type Role = "user" | "assistant"

export interface Turn {
  role: string
  text: string
  timestamp: string
}

export interface ParsedSession {
  sessionId: string
  turns: Turn[]
  firstTimestamp: string | null
  preview: string
}

export interface ConvertedSession {
  markdown: string
  session: ParsedSession
}

export interface ExportedConversation {
  sessionId: string
  file: string
  bytes: number
  turns: number
  date: string
  preview: string
}

export interface ExportResult {
  found: number
  exported: ExportedConversation[]
}

export type Logger = (line: string) => void
