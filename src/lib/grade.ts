import { ParseError, type ParseErrorCode } from "./errors"
import type { DatasetRecord, MatchingRecord, McqRecord, ShortTextRecord } from "./record"
import { normalizeText } from "./text"

export type GradeError = {
  kind: "ParseError"
  code: ParseErrorCode
  message: string
}

export type GradeResult<P = unknown> = {
  correct: boolean
  parsed: P | null
  error?: GradeError
}

type JsonObject = Record<string, unknown>

function isJsonObject(x: unknown): x is JsonObject {
  return typeof x === "object" && x !== null && !Array.isArray(x)
}

function tryJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

/**
 * Pulls a JSON object out of free-form model output: the whole text when it is
 * one, otherwise the span from the first `{` to the last `}` (which also covers
 * fenced code blocks).
 * @throws ParseError when no object can be decoded.
 */
export function extractJsonObject(text: string): JsonObject {
  const t = text.trim()
  const direct = tryJson(t)
  if (direct.ok && isJsonObject(direct.value)) return direct.value

  const start = t.indexOf("{")
  const end = t.lastIndexOf("}")
  if (start === -1 || end <= start) {
    if (direct.ok) {
      throw new ParseError("not_an_object", "Output is JSON but not an object")
    }
    throw new ParseError("no_json_object", "No JSON object found in output")
  }
  const block = tryJson(t.slice(start, end + 1))
  if (!block.ok) {
    throw new ParseError("invalid_json", "Output contains a {...} block that is not valid JSON")
  }
  if (!isJsonObject(block.value)) {
    throw new ParseError("not_an_object", "Output is JSON but not an object")
  }
  return block.value
}

function scalarToString(value: unknown): string | null {
  if (typeof value === "string") return value.trim()
  if (typeof value === "number" || typeof value === "boolean") return String(value)
  return null
}

/**
 * Parses a matching answer. Every key of `output_spec.keys` is required;
 * unexpected keys are ignored.
 */
export function parseMatching(record: MatchingRecord, rawOutput: string): Record<string, string> {
  const obj = extractJsonObject(rawOutput)
  const byKey = new Map<string, unknown>()
  for (const [k, v] of Object.entries(obj)) byKey.set(k.trim(), v)

  const parsed: Record<string, string> = {}
  const missing: string[] = []
  for (const key of record.output_spec.keys) {
    const value = byKey.has(key) ? scalarToString(byKey.get(key)) : null
    if (value === null) {
      missing.push(key)
      continue
    }
    parsed[key] = value
  }
  if (missing.length > 0) {
    throw new ParseError("missing_keys", `Output is missing keys: ${missing.join(", ")}`)
  }
  return parsed
}

const LETTER_TOKEN = /(?<![\p{L}\p{N}])(\p{L})(?![\p{L}\p{N}])/gu

/**
 * Returns the first standalone single-letter token that is an allowed option,
 * uppercased. Letters glued to other letters or digits are not tokens.
 */
export function parseMcq(record: McqRecord, rawOutput: string): string {
  const allowed = new Set(record.output_spec.allowed.map((l) => l.toUpperCase()))
  for (const m of rawOutput.matchAll(LETTER_TOKEN)) {
    const letter = m[1].toUpperCase()
    if (allowed.has(letter)) return letter
  }
  throw new ParseError(
    "no_allowed_letter",
    `No standalone option letter from [${[...allowed].join(", ")}] found in output`,
  )
}

export function parseShortText(record: ShortTextRecord, rawOutput: string): string {
  const out = normalizeText(rawOutput, record.output_spec)
  if (!out) throw new ParseError("empty_output", "Output is empty after normalization")
  return out
}

function gradeOrParseError<P>(parse: () => P, score: (parsed: P) => boolean): GradeResult<P> {
  let parsed: P
  try {
    parsed = parse()
  } catch (err) {
    if (err instanceof ParseError) {
      return {
        correct: false,
        parsed: null,
        error: { kind: "ParseError", code: err.code, message: err.message },
      }
    }
    throw err
  }
  return { correct: score(parsed), parsed }
}

/**
 * Grades one raw model output against a record. Pure and total: malformed
 * output yields `correct: false` with a ParseError, it never throws.
 * @param record - The dataset record the output answers.
 * @param rawOutput - Raw text returned by the model.
 * @returns Correctness, the parsed answer (null when unparseable) and the parse error if any.
 */
export function grade(record: DatasetRecord, rawOutput: string): GradeResult {
  switch (record.task_type) {
    case "matching":
      return gradeOrParseError(
        () => parseMatching(record, rawOutput),
        (parsed) => record.output_spec.keys.every((k) => parsed[k] === record.answer[k].trim()),
      )
    case "mcq":
      return gradeOrParseError(
        () => parseMcq(record, rawOutput),
        (letter) => letter === record.answer.toUpperCase(),
      )
    case "short_text": {
      const golds = typeof record.answer === "string" ? [record.answer] : record.answer
      const accepted = new Set(golds.map((g) => normalizeText(g, record.output_spec)))
      return gradeOrParseError(
        () => parseShortText(record, rawOutput),
        (out) => accepted.has(out),
      )
    }
    default: {
      const unreachable: never = record
      throw new Error(`Unsupported task_type: ${JSON.stringify(unreachable)}`)
    }
  }
}
