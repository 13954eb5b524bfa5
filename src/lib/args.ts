import { Command, type OptionValues } from "commander"
import { DEFAULT_MODELS } from "../config/models"
import { DEFAULT_DECODING, DEFAULT_RETRY_POLICY, type DecodingOptions, type RetryPolicy } from "./invoke"
import type { TokenStyle } from "./isomorph"

export type RunArgs = RetryPolicy & {
  command: "run"
  dataset: string
  models: string[]
  outdir: string
  limit?: number
  concurrency: number
  decoding: DecodingOptions
  overwrite: boolean
}

export type EvalArgs = {
  command: "eval"
  dataset: string
  rundir: string
  report: string
  details: boolean
  limit?: number
}

export type IsomorphArgs = {
  command: "isomorph"
  dataset: string
  out: string
  k: number
  seed: number
  style: TokenStyle
}

export type GapArgs = {
  command: "gap"
  original: string
  isomorphic: string
  out: string
}

export type CliArgs = RunArgs | EvalArgs | IsomorphArgs | GapArgs

function requirePath(raw: unknown, name: string): string {
  const value = raw === undefined ? "" : String(raw).trim()
  if (!value) {
    throw new Error(`${name} cannot be empty`)
  }
  return value
}

function parseInteger(raw: unknown, name: string, min: number): number {
  const text = String(raw).trim()
  const n = /^-?\d+$/.test(text) ? Number.parseInt(text, 10) : NaN
  if (isNaN(n) || n < min) {
    const kind = min > 0 ? "a positive integer" : "a non-negative integer"
    throw new Error(`Invalid ${name}: ${String(raw)}. Must be ${kind}.`)
  }
  return n
}

function parseFraction(raw: unknown, name: string, max: number): number {
  const text = String(raw).trim()
  const n = /^\d+(\.\d+)?$/.test(text) ? Number(text) : NaN
  if (isNaN(n) || n > max) {
    throw new Error(`Invalid ${name}: ${String(raw)}. Must be a number between 0 and ${max}.`)
  }
  return n
}

function parseModels(raw: unknown): string[] {
  const models = String(raw)
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
  if (models.length === 0) {
    throw new Error("At least one model must be specified")
  }
  return [...new Set(models)]
}

function parseStyle(raw: unknown): TokenStyle {
  const style = String(raw)
  if (style !== "pseudoword" && style !== "tag") {
    throw new Error(`Invalid style: ${style}. Must be one of: pseudoword, tag.`)
  }
  return style
}

/**
 * Parses command-line arguments and validates them.
 * @param argv - Command-line arguments array, including the node binary and script path.
 * @param defaults - Retry settings used when no flag overrides them.
 * @returns The selected subcommand with its validated options.
 * @throws Error if arguments are invalid, CommanderError on usage errors or `--help`.
 */
export function parseArgs(argv: string[], defaults: { retry: RetryPolicy } = { retry: DEFAULT_RETRY_POLICY }): CliArgs {
  let parsed: CliArgs | undefined

  const program = new Command()
    .name("olyleak")
    .description("Benchmark models on linguistics olympiad problems and measure the memorization gap")
    .exitOverride()

  program
    .command("run")
    .description("Query models on a dataset, storing raw outputs (resumable)")
    .requiredOption("--dataset <path>", "JSONL dataset file")
    .option("--models <csv>", "Comma-separated model IDs (ollama:<tag> for local models)", DEFAULT_MODELS.join(","))
    .option("--outdir <dir>", "Directory for raw outputs", "runs")
    .option("--limit <n>", "Only the first n dataset rows")
    .option("--timeout <ms>", "Per-attempt timeout in milliseconds", String(defaults.retry.timeoutMs))
    .option("--retries <n>", "Retries after a failed attempt", String(defaults.retry.maxRetries))
    .option("--retry-delay <ms>", "Base delay between attempts", String(defaults.retry.retryDelayMs))
    .option("--concurrency <n>", "Endpoints queried side by side (ollama: models share one)", "1")
    .option("--temperature <t>", "Sampling temperature", String(DEFAULT_DECODING.temperature))
    .option("--top-p <p>", "Nucleus sampling cutoff", String(DEFAULT_DECODING.topP))
    .option("--num-ctx <n>", "Context window for Ollama models", String(DEFAULT_DECODING.numCtx))
    .option("--seed <n>", "Sampling seed", String(DEFAULT_DECODING.seed))
    .option("--overwrite", "Discard stored outputs and query every record again", false)
    .action((opts: OptionValues) => {
      parsed = {
        command: "run",
        dataset: requirePath(opts.dataset, "Dataset path"),
        models: parseModels(opts.models),
        outdir: requirePath(opts.outdir, "Output directory"),
        limit: opts.limit === undefined ? undefined : parseInteger(opts.limit, "limit", 1),
        timeoutMs: parseInteger(opts.timeout, "timeout", 1),
        maxRetries: parseInteger(opts.retries, "retries", 0),
        retryDelayMs: parseInteger(opts.retryDelay, "retry delay", 0),
        concurrency: parseInteger(opts.concurrency, "concurrency", 1),
        decoding: {
          temperature: parseFraction(opts.temperature, "temperature", 2),
          topP: parseFraction(opts.topP, "top-p", 1),
          numCtx: parseInteger(opts.numCtx, "num-ctx", 1),
          seed: parseInteger(opts.seed, "seed", 0),
        },
        overwrite: opts.overwrite === true,
      }
    })

  program
    .command("eval")
    .description("Grade stored outputs and write a JSON report")
    .requiredOption("--dataset <path>", "JSONL dataset file the outputs answer")
    .requiredOption("--rundir <dir>", "Directory written by the run command")
    .requiredOption("--report <path>", "Output report path (.json)")
    .option("--limit <n>", "Only the first n dataset rows")
    .option("--details", "Include per-record grading details", false)
    .action((opts: OptionValues) => {
      parsed = {
        command: "eval",
        dataset: requirePath(opts.dataset, "Dataset path"),
        rundir: requirePath(opts.rundir, "Run directory"),
        report: requirePath(opts.report, "Report path"),
        details: opts.details === true,
        limit: opts.limit === undefined ? undefined : parseInteger(opts.limit, "limit", 1),
      }
    })

  program
    .command("isomorph")
    .description("Generate isomorphic variants of a dataset")
    .requiredOption("--dataset <path>", "JSONL dataset file")
    .requiredOption("--out <path>", "Output JSONL path for the variants")
    .option("--k <n>", "Variants per record", "3")
    .option("--seed <n>", "Base seed", "0")
    .option("--style <style>", "Replacement tokens: pseudoword or tag", "pseudoword")
    .action((opts: OptionValues) => {
      parsed = {
        command: "isomorph",
        dataset: requirePath(opts.dataset, "Dataset path"),
        out: requirePath(opts.out, "Output path"),
        k: parseInteger(opts.k, "k", 1),
        seed: parseInteger(opts.seed, "seed", 0),
        style: parseStyle(opts.style),
      }
    })

  program
    .command("gap")
    .description("Compute the memorization gap between two reports")
    .requiredOption("--original <path>", "Report on the original dataset")
    .requiredOption("--isomorphic <path>", "Report on the variant dataset")
    .requiredOption("--out <path>", "Output gap report path (.json)")
    .action((opts: OptionValues) => {
      parsed = {
        command: "gap",
        original: requirePath(opts.original, "Original report path"),
        isomorphic: requirePath(opts.isomorphic, "Isomorphic report path"),
        out: requirePath(opts.out, "Output path"),
      }
    })

  program.parse(argv)

  if (!parsed) {
    throw new Error("No command given. Use one of: run, eval, isomorph, gap.")
  }
  return parsed
}
