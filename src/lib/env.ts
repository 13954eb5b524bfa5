import fs from "node:fs"
import path from "node:path"

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/u

const loadedDirs = new Set<string>()

function unquote(raw: string): string {
  const quote = raw[0]
  if ((quote === '"' || quote === "'") && raw.length >= 2 && raw.endsWith(quote)) {
    const inner = raw.slice(1, -1)
    return quote === '"' ? inner.replace(/\\n/g, "\n") : inner
  }
  const comment = raw.indexOf(" #")
  return (comment >= 0 ? raw.slice(0, comment) : raw).trim()
}

/**
 * Parses dotenv text: `KEY=value` lines, optional `export`, quoted values
 * (`\n` expands inside double quotes) and ` #` trailing comments. A later
 * assignment of a key wins.
 */
export function parseEnvFile(text: string): Map<string, string> {
  const values = new Map<string, string>()
  for (const line of text.split(/\r?\n/u)) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith("#")) continue
    const m = ASSIGNMENT.exec(trimmed)
    if (m) values.set(m[1], unquote(m[2]))
  }
  return values
}

/**
 * Copies the assignments of a dotenv file into `env`. A missing file is ignored.
 * @returns The keys that were set.
 */
export function loadEnvFromFile(
  filePath: string,
  { override = false, env = process.env }: { override?: boolean; env?: NodeJS.ProcessEnv } = {},
): string[] {
  let text: string
  try {
    text = fs.readFileSync(filePath, "utf8")
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return []
    throw err
  }

  const applied: string[] = []
  for (const [key, value] of parseEnvFile(text)) {
    if (!override && env[key] !== undefined) continue
    env[key] = value
    applied.push(key)
  }
  return applied
}

/**
 * Loads `.env.local` from `cwd` into `process.env`, once per directory.
 * Variables already set in the environment keep their values.
 */
export function loadLocalEnv(cwd: string = process.cwd()): string[] {
  const dir = path.resolve(cwd)
  if (loadedDirs.has(dir)) return []
  loadedDirs.add(dir)
  return loadEnvFromFile(path.join(dir, ".env.local"))
}
