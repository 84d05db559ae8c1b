import { readdir, readFile, stat, mkdir, writeFile } from "node:fs/promises"
import { join, basename } from "node:path"
import { convertSession } from "./parse"
import { formatKilobytes, outputFileName } from "./format"
import type { ExportConfig } from "./config"
import type { ExportedConversation, ExportResult, Logger } from "./types"

export interface BatchOptions extends ExportConfig {
  log?: Logger
}

export interface SessionFile {
  path: string
  sessionId: string
  modified: Date
}

export async function exportConversations(options: BatchOptions): Promise<ExportResult> {
  const log = options.log ?? console.log
  const files = await findSessionFiles(options.sourceDir)
  log(`Found ${files.length} conversation files`)

  await mkdir(options.destDir, { recursive: true })

  const exported: ExportedConversation[] = []

  for (const [index, file] of files.entries()) {
    const name = outputFileName(file.sessionId, file.modified)
    const outPath = join(options.destDir, name)

    const entry = await processFile(file, outPath)
    if (!entry) continue

    log(`  [${index + 1}] ${name} (${formatKilobytes(entry.bytes)} KB)`)
    exported.push(entry)
  }

  log(`\nExported ${exported.length} conversations to ${options.destDir}`)
  return { found: files.length, exported }
}

/** Session logs directly inside `dir`, oldest modification first. */
export async function findSessionFiles(dir: string): Promise<SessionFile[]> {
  const entries = await readdir(dir, { withFileTypes: true })
  const results: SessionFile[] = []

  for (const entry of entries) {
    if (!entry.name.endsWith(".jsonl")) continue

    // stat follows symlinked session logs
    const path = join(dir, entry.name)
    const info = await stat(path)
    if (!info.isFile()) continue

    results.push({
      path,
      sessionId: basename(entry.name, ".jsonl"),
      modified: info.mtime,
    })
  }

  return results.sort((a, b) => a.modified.getTime() - b.modified.getTime())
}

async function processFile(file: SessionFile, outputPath: string): Promise<ExportedConversation | null> {
  const text = await readFile(file.path, "utf8")
  const converted = convertSession(text.split("\n"), file.sessionId)
  if (!converted) return null

  await writeFile(outputPath, converted.markdown, "utf8")
  const info = await stat(outputPath)

  const { session } = converted
  return {
    sessionId: session.sessionId,
    file: outputPath,
    bytes: info.size,
    turns: session.turns.length,
    date: session.firstTimestamp ? session.firstTimestamp.slice(0, 10) : "unknown",
    preview: session.preview,
  }
}
