import { Server } from "@modelcontextprotocol/sdk/server/index.js"
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js"
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js"
import { exportConversations } from "./batch"
import { resolveConfig } from "./config"
import { searchConversations, formatResults } from "./search"
import type { MessageFilter } from "./search"
import { formatExportResult } from "./format"

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isFinite(value) ? value : undefined
}

function messageFilter(value: unknown): MessageFilter | undefined {
  return value === "user" || value === "assistant" || value === "all" ? value : undefined
}

function stringArray(value: unknown): string[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is string => typeof item === "string" && item.length > 0)
}

// MCP Server setup
const server = new Server(
  { name: "conversation-export", version: "1.0.0" },
  { capabilities: { tools: {} } }
)

server.setRequestHandler(ListToolsRequestSchema, async () => {
  return {
    tools: [
      {
        name: "export_conversations",
        description: "Export Claude Code session logs to Markdown files, one file per conversation.",
        inputSchema: {
          type: "object",
          properties: {
            source: {
              type: "string",
              description: "Session log directory (default: this project's Claude Code sessions)"
            },
            output: {
              type: "string",
              description: "Directory the Markdown files are written to (default: current directory)"
            }
          }
        }
      },
      {
        name: "search_conversations",
        description: "Search exported conversations for previous discussions about a topic.",
        inputSchema: {
          type: "object",
          properties: {
            keywords: {
              type: "array",
              items: { type: "string" },
              description: "Keywords to search for (OR matched)"
            },
            output: {
              type: "string",
              description: "Directory holding the exported Markdown (default: current directory)"
            },
            limit: {
              type: "number",
              description: "Maximum conversations to return (default: 20)"
            },
            context_lines: {
              type: "number",
              description: "Lines of context around matches (default: 2)"
            },
            message_type: {
              type: "string",
              enum: ["user", "assistant", "all"],
              description: "Filter by message author (default: all)"
            }
          },
          required: ["keywords"]
        }
      }
    ]
  }
})

server.setRequestHandler(CallToolRequestSchema, async (request) => {
  const rawArgs = request.params.arguments ?? {}

  if (request.params.name === "export_conversations") {
    const config = resolveConfig({
      source: optionalString(rawArgs.source),
      output: optionalString(rawArgs.output),
    })
    // stdout carries the protocol, progress goes to stderr
    const result = await exportConversations({ ...config, log: console.error })

    return {
      content: [{ type: "text", text: formatExportResult(result) }]
    }
  }

  if (request.params.name === "search_conversations") {
    const keywords = stringArray(rawArgs.keywords)
    if (keywords.length === 0) {
      return {
        content: [{ type: "text", text: "Error: keywords array is required" }]
      }
    }

    const { destDir } = resolveConfig({ output: optionalString(rawArgs.output) })
    const results = await searchConversations(destDir, {
      keywords,
      limit: optionalNumber(rawArgs.limit),
      context_lines: optionalNumber(rawArgs.context_lines),
      message_type: messageFilter(rawArgs.message_type),
    })

    return {
      content: [{ type: "text", text: formatResults(results) }]
    }
  }

  return {
    content: [{ type: "text", text: `Unknown tool: ${request.params.name}` }]
  }
})

async function main() {
  const transport = new StdioServerTransport()
  await server.connect(transport)
}

main().catch((err) => {
  console.error("MCP server error:", err)
  process.exit(1)
})
