import { mkdir, readFile, writeFile } from "node:fs/promises"
import path from "node:path"
import type { Report } from "./evaluator"
import type { GapReport } from "./gap"

/**
 * Accuracy as a percentage with one decimal; `n/a` when nothing was graded.
 */
function pct(x: number | null): string {
  return x === null ? "n/a" : `${(x * 100).toFixed(1)}%`
}

/**
 * Signed percentage-point difference, e.g. `+40.0pp`.
 */
function pp(x: number | null): string {
  if (x === null) return "n/a"
  const v = (x * 100).toFixed(1)
  return x > 0 ? `+${v}pp` : `${v}pp`
}

/**
 * Writes pre-serialized lines to a file, one per line, creating parent directories.
 * An empty list produces an empty file.
 */
export async function writeLines(filePath: string, lines: string[]) {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, lines.map((l) => l + "\n").join(""), "utf8")
}

/**
 * Writes rows to a JSONL file, creating parent directories.
 */
export async function writeJsonl(filePath: string, rows: unknown[]) {
  await writeLines(filePath, rows.map((r) => JSON.stringify(r)))
}

export async function writeJson(filePath: string, value: unknown) {
  await mkdir(path.dirname(filePath), { recursive: true })
  await writeFile(filePath, JSON.stringify(value, null, 2) + "\n", "utf8")
}

export async function readJson(filePath: string): Promise<unknown> {
  let text: string
  try {
    text = await readFile(filePath, "utf8")
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
  try {
    return JSON.parse(text)
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

/**
 * Renders a markdown summary table of an evaluation report.
 * @param report - Report produced by the evaluator.
 * @returns Markdown string, one row per model.
 */
export function renderReportSummary(report: Report): string {
  const lines: string[] = []
  lines.push(`# Evaluation: \`${report.dataset}\``)
  lines.push("")
  lines.push("| model | accuracy | correct/graded | parse errors | ungraded |")
  lines.push("|---|---:|---:|---:|---:|")
  for (const [model, m] of Object.entries(report.models)) {
    lines.push(
      `| \`${model}\` | ${pct(m.overall.n > 0 ? m.overall.accuracy : null)} | ${m.overall.n_correct}/${m.overall.n} | ${m.parse_errors} | ${m.ungraded.count} |`,
    )
  }
  lines.push("")

  for (const [model, m] of Object.entries(report.models)) {
    const byTask = Object.entries(m.by_task_type)
      .map(([task, b]) => `${task} ${pct(b.accuracy)} (${b.n_correct}/${b.n})`)
      .join(", ")
    lines.push(`- **${model}**: ${byTask || "no graded records"}`)
  }

  return lines.join("\n")
}

/**
 * Renders a markdown summary table of a gap report.
 */
export function renderGapSummary(gap: GapReport): string {
  const lines: string[] = []
  lines.push("| model | original | isomorphic | gap |")
  lines.push("|---|---:|---:|---:|")
  for (const [model, g] of Object.entries(gap.models)) {
    lines.push(
      `| \`${model}\` | ${pct(g.overall.score_original)} | ${pct(g.overall.score_isomorphic)} | ${pp(g.overall.gap)} |`,
    )
  }
  return lines.join("\n")
}
