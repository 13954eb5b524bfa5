import { readFile } from "node:fs/promises"

/**
 * Reads a JSONL file line by line, yielding parsed JSON values with their line numbers.
 * @param filePath - Path to the JSONL file.
 * @param limit - Optional maximum number of rows to read.
 * @yields `{ line, value }` for every non-blank line.
 * @throws Error if the file doesn't exist or contains invalid JSON.
 */
export async function* readJsonlLines<T = unknown>(
  filePath: string,
  limit?: number,
): AsyncGenerator<{ line: number; value: T }, void, void> {
  if (!filePath || typeof filePath !== "string") {
    throw new Error("File path must be a non-empty string")
  }
  if (limit !== undefined && (limit < 0 || !Number.isInteger(limit))) {
    throw new Error("Limit must be a non-negative integer")
  }

  let text: string
  try {
    text = await readFile(filePath, "utf8")
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`JSONL file not found: ${filePath}`)
    }
    throw err
  }
  const lines = text.split(/\r?\n/)

  let yielded = 0
  for (let i = 0; i < lines.length; i++) {
    if (limit != null && yielded >= limit) break
    const trimmed = lines[i].trim()
    if (!trimmed) continue

    let value: T
    try {
      value = JSON.parse(trimmed) as T
    } catch (err) {
      throw new Error(
        `Invalid JSON on line ${i + 1} of ${filePath}: ${err instanceof Error ? err.message : String(err)}`,
      )
    }
    yield { line: i + 1, value }
    yielded++
  }
}

/**
 * Reads a JSONL file, yielding only the parsed values.
 */
export async function* readJsonlFile<T = unknown>(
  filePath: string,
  limit?: number,
): AsyncGenerator<T, void, void> {
  for await (const { value } of readJsonlLines<T>(filePath, limit)) yield value
}
