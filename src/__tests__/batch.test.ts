import * as fs from "node:fs"
import * as os from "node:os"
import * as path from "node:path"
import { afterEach, beforeEach, describe, expect, it } from "vitest"
import { exportConversations, findSessionFiles } from "../batch"

const HELLO = JSON.stringify({
  type: "user",
  timestamp: "2024-01-01T10:30:00Z",
  message: { role: "user", content: "Hello" },
})

const SUMMARY_ONLY = JSON.stringify({ type: "summary", summary: "Nothing to see" })

// ── Test setup ───────────────────────────────────────────────────────────────

let tmpDir: string
let sourceDir: string
let destDir: string

function writeSession(name: string, content: string, modified: Date): string {
  const file = path.join(sourceDir, name)
  fs.writeFileSync(file, content)
  fs.utimesSync(file, modified, modified)
  return file
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "conversation-export-"))
  sourceDir = path.join(tmpDir, "sessions")
  destDir = path.join(tmpDir, "out")
  fs.mkdirSync(sourceDir)
})

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true })
})

// ── findSessionFiles ─────────────────────────────────────────────────────────

describe("findSessionFiles", () => {
  it("returns an empty list for an empty directory", async () => {
    expect(await findSessionFiles(sourceDir)).toEqual([])
  })

  it("orders session logs by modification time and ignores other files", async () => {
    writeSession("zzzz-old.jsonl", HELLO, new Date(2024, 0, 1))
    writeSession("aaaa-new.jsonl", HELLO, new Date(2024, 5, 1))
    writeSession("notes.txt", "x", new Date(2023, 0, 1))
    fs.mkdirSync(path.join(sourceDir, "nested.jsonl"))

    const files = await findSessionFiles(sourceDir)
    expect(files.map((f) => f.sessionId)).toEqual(["zzzz-old", "aaaa-new"])
  })

  it("follows symlinked session logs", async () => {
    const target = path.join(tmpDir, "real-session.jsonl")
    fs.writeFileSync(target, HELLO + "\n")
    fs.symlinkSync(target, path.join(sourceDir, "abcdefgh-1.jsonl"))

    const files = await findSessionFiles(sourceDir)
    expect(files.map((f) => f.sessionId)).toEqual(["abcdefgh-1"])

    const result = await exportConversations({ sourceDir, destDir, log: () => {} })
    expect(result.found).toBe(1)
    expect(result.exported.map((e) => e.sessionId)).toEqual(["abcdefgh-1"])
  })

  it("fails when the directory does not exist", async () => {
    await expect(findSessionFiles(path.join(tmpDir, "missing"))).rejects.toThrow()
  })
})

// ── exportConversations ──────────────────────────────────────────────────────

describe("exportConversations", () => {
  it("writes one Markdown file per session with turns", async () => {
    writeSession("bbbbbbbb-2222.jsonl", SUMMARY_ONLY + "\n", new Date(2024, 0, 1, 12))
    writeSession("aaaaaaaa-1111.jsonl", "not json\n" + HELLO + "\n", new Date(2024, 2, 5, 12))

    const logs: string[] = []
    const result = await exportConversations({ sourceDir, destDir, log: (l) => logs.push(l) })

    expect(fs.readdirSync(destDir)).toEqual(["20240305-aaaaaaaa.md"])
    expect(fs.readFileSync(path.join(destDir, "20240305-aaaaaaaa.md"), "utf8")).toBe(
      "# Conversation aaaaaaaa\n\n"
      + "- Date: 2024-01-01\n"
      + "- Session: `aaaaaaaa-1111`\n"
      + "- Messages: 1\n\n"
      + "---\n\n"
      + "## 🧑 User (10:30)\n\n"
      + "Hello\n\n"
    )

    expect(logs).toEqual([
      "Found 2 conversation files",
      "  [2] 20240305-aaaaaaaa.md (0 KB)",
      `\nExported 1 conversations to ${destDir}`,
    ])

    expect(result.found).toBe(2)
    expect(result.exported).toHaveLength(1)
    expect(result.exported[0]).toMatchObject({
      sessionId: "aaaaaaaa-1111",
      file: path.join(destDir, "20240305-aaaaaaaa.md"),
      turns: 1,
      date: "2024-01-01",
      preview: "Hello",
    })
  })

  it("exports nothing for sessions without conversation turns", async () => {
    writeSession("cccccccc-3333.jsonl", SUMMARY_ONLY + "\n{broken\n", new Date(2024, 0, 1))

    const result = await exportConversations({ sourceDir, destDir, log: () => {} })

    expect(result.exported).toEqual([])
    expect(fs.readdirSync(destDir)).toEqual([])
  })

  it("produces identical output when run twice", async () => {
    writeSession("dddddddd-4444.jsonl", HELLO + "\n", new Date(2024, 4, 20, 8))
    const outFile = path.join(destDir, "20240520-dddddddd.md")

    await exportConversations({ sourceDir, destDir, log: () => {} })
    const first = fs.readFileSync(outFile, "utf8")
    await exportConversations({ sourceDir, destDir, log: () => {} })

    expect(fs.readdirSync(destDir)).toEqual(["20240520-dddddddd.md"])
    expect(fs.readFileSync(outFile, "utf8")).toBe(first)
  })

  it("aborts when the source directory is missing", async () => {
    await expect(exportConversations({
      sourceDir: path.join(tmpDir, "missing"),
      destDir,
      log: () => {},
    })).rejects.toThrow()
  })
})
