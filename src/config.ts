import { homedir } from "node:os"
import { join, resolve } from "node:path"

export interface ExportConfig {
  sourceDir: string
  destDir: string
}

export interface ConfigOverrides {
  source?: string
  output?: string
  cwd?: string
  home?: string
}

/**
 * Claude Code keeps each project's sessions under a directory named after
 * the project path: /home/me/my.app -> -home-me-my-app
 */
export function projectSlug(path: string): string {
  return path.replace(/[/.]/g, "-")
}

export function resolveConfig(overrides: ConfigOverrides = {}): ExportConfig {
  const cwd = overrides.cwd ?? process.cwd()
  const home = overrides.home ?? homedir()

  const sourceDir = overrides.source
    ? resolve(cwd, overrides.source)
    : join(home, ".claude/projects", projectSlug(cwd))
  const destDir = overrides.output ? resolve(cwd, overrides.output) : cwd

  return { sourceDir, destDir }
}
