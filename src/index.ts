#!/usr/bin/env tsx
import { parseArgs } from "node:util"
import { SessionParser } from "./parse"
import { formatConversation } from "./format"
import { exportConversations } from "./batch"
import { resolveConfig } from "./config"

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      source: { type: "string", short: "s" },
      output: { type: "string", short: "o" },
      stdin: { type: "boolean", default: false },
      session: { type: "string", default: "stdin" },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  })

  if (values.help) {
    printUsage()
    process.exit(0)
  }

  if (values.stdin) {
    await streamMode(values.session ?? "stdin")
    return
  }

  const config = resolveConfig({ source: values.source, output: values.output })
  await exportConversations(config)
}

async function streamMode(sessionId: string): Promise<void> {
  const parser = new SessionParser(sessionId)

  const decoder = new TextDecoder()
  let buffer = ""

  for await (const chunk of process.stdin) {
    buffer += typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true })

    const lines = buffer.split("\n")
    // Keep the last potentially incomplete line in buffer
    buffer = lines.pop() ?? ""

    for (const line of lines) {
      parser.parse(line)
    }
  }

  buffer += decoder.decode()
  if (buffer.trim()) {
    parser.parse(buffer)
  }

  const session = parser.finalize()
  if (session) {
    process.stdout.write(formatConversation(session.sessionId, session.turns, session.firstTimestamp))
  }
}

function printUsage(): void {
  console.log(`
conversation-export - Convert Claude Code session logs to Markdown

Usage:
  conversation-export                              Export this project's sessions
  conversation-export -s <dir> -o <dir>            Export from/to explicit directories
  cat session.jsonl | conversation-export --stdin  Stream mode (stdin -> stdout)

Options:
  -s, --source      Session directory (default: ~/.claude/projects/<this project>)
  -o, --output      Output directory (default: current directory)
      --stdin       Convert a single session read from stdin
      --session     Session id used in stream mode (default: stdin)
  -h, --help        Show this help

Output files are named <YYYYMMDD>-<session id prefix>.md after the session
log's modification date. Existing files with the same name are overwritten.
`)
}

main().catch((err) => {
  console.error(err)
  process.exit(1)
})
