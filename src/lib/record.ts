import { z } from "zod"
import { SchemaError } from "./errors"
import { normalizeText } from "./text"

export const TASK_TYPES = ["matching", "mcq", "short_text"] as const
export type TaskType = (typeof TASK_TYPES)[number]

/**
 * Output-spec `type` tags written by the original dataset tooling, one per task type.
 */
export const OUTPUT_SPEC_TAGS = {
  matching: "json_mapping",
  mcq: "mcq_letter",
  short_text: "short_text",
} as const satisfies Record<TaskType, string>

export type Span = {
  text: string
  kind?: string
}

export type RecordMeta = {
  variantable?: { spans: Span[]; [key: string]: unknown }
  source_url?: string
  page?: number | string
  [key: string]: unknown
}

export type MatchingSpec = { type?: "json_mapping"; keys: string[]; [key: string]: unknown }
export type McqSpec = { type?: "mcq_letter"; allowed: string[]; [key: string]: unknown }
export type ShortTextSpec = {
  type?: "short_text"
  lower?: boolean
  strip_punct?: boolean
  [key: string]: unknown
}

type RecordBase = {
  id: string
  source: string
  year?: number
  prompt: string
  meta: RecordMeta
  variant_of?: string
  variant_index?: number
  /** Top-level keys outside the record schema, in input order. Written back verbatim. */
  extras?: Record<string, unknown>
}

export type MatchingRecord = RecordBase & {
  task_type: "matching"
  answer: Record<string, string>
  output_spec: MatchingSpec
}

export type McqRecord = RecordBase & {
  task_type: "mcq"
  answer: string
  output_spec: McqSpec
}

export type ShortTextRecord = RecordBase & {
  task_type: "short_text"
  answer: string | string[]
  output_spec: ShortTextSpec
}

export type DatasetRecord = MatchingRecord | McqRecord | ShortTextRecord

export type VariantRecord = DatasetRecord & {
  variant_of: string
  variant_index: number
}

const scalarString = z
  .union([z.string(), z.number()])
  .transform((v) => String(v))

const spanSchema = z.object({
  text: z.string().min(1),
  kind: z.string().min(1).optional(),
})

const metaSchema = z
  .object({
    variantable: z.object({ spans: z.array(spanSchema) }).passthrough().optional(),
    source_url: z.string().optional(),
    page: z.union([z.number(), z.string()]).optional(),
  })
  .passthrough()

const baseShape = {
  id: scalarString.pipe(z.string().trim().min(1, "id must be non-empty")),
  source: z.string().min(1),
  year: z
    .union([z.number().int(), z.string().regex(/^\d+$/).transform(Number)])
    .nullish(),
  prompt: z.string().min(1),
  meta: metaSchema.nullish(),
  variant_of: z.string().min(1).optional(),
  variant_index: z.number().int().nonnegative().optional(),
}

const letter = z.string().regex(/^[A-Za-z]$/, "expected a single letter")

const rowSchema = z.discriminatedUnion("task_type", [
  z.object({
    ...baseShape,
    task_type: z.literal("matching"),
    answer: z.record(z.string(), scalarString),
    output_spec: z
      .object({
        type: z.literal(OUTPUT_SPEC_TAGS.matching).optional(),
        keys: z.array(scalarString).min(1),
      })
      .passthrough(),
  }).passthrough(),
  z.object({
    ...baseShape,
    task_type: z.literal("mcq"),
    answer: letter,
    output_spec: z
      .object({
        type: z.literal(OUTPUT_SPEC_TAGS.mcq).optional(),
        allowed: z.array(letter).min(1),
      })
      .passthrough(),
  }).passthrough(),
  z.object({
    ...baseShape,
    task_type: z.literal("short_text"),
    answer: z.union([z.string(), z.array(z.string()).min(1)]),
    output_spec: z
      .object({
        type: z.literal(OUTPUT_SPEC_TAGS.short_text).optional(),
        lower: z.boolean().optional(),
        strip_punct: z.boolean().optional(),
      })
      .passthrough(),
  }).passthrough(),
])

type ParsedRow = z.infer<typeof rowSchema>

const RECORD_KEY_ORDER = [
  "id",
  "source",
  "year",
  "task_type",
  "prompt",
  "answer",
  "output_spec",
  "meta",
  "variant_of",
  "variant_index",
] as const

const SCHEMA_KEYS: ReadonlySet<string> = new Set(RECORD_KEY_ORDER)

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length ? issue.path.join(".") : "<row>"}: ${issue.message}`)
    .join("; ")
}

function rowId(row: unknown): string | undefined {
  if (!row || typeof row !== "object" || !("id" in row)) return undefined
  const id = row.id
  return typeof id === "string" || typeof id === "number" ? String(id) : undefined
}

/**
 * Rebuilds a parsed row with a fixed key order so serialization is byte-stable.
 */
function toRecord(row: ParsedRow): DatasetRecord {
  const base = {
    id: row.id,
    source: row.source,
    year: row.year ?? undefined,
  }
  const extras = Object.fromEntries(Object.entries(row).filter(([key]) => !SCHEMA_KEYS.has(key)))
  const tail = {
    meta: row.meta ?? {},
    variant_of: row.variant_of,
    variant_index: row.variant_index,
    ...(Object.keys(extras).length > 0 ? { extras } : {}),
  }
  switch (row.task_type) {
    case "matching":
      return {
        ...base,
        task_type: "matching",
        prompt: row.prompt,
        answer: row.answer,
        output_spec: row.output_spec,
        ...tail,
      }
    case "mcq":
      return {
        ...base,
        task_type: "mcq",
        prompt: row.prompt,
        answer: row.answer,
        output_spec: row.output_spec,
        ...tail,
      }
    case "short_text":
      return {
        ...base,
        task_type: "short_text",
        prompt: row.prompt,
        answer: row.answer,
        output_spec: row.output_spec,
        ...tail,
      }
  }
}

/**
 * Checks the cross-field invariants zod cannot express on its own.
 * @throws SchemaError naming the first violated invariant.
 */
export function checkInvariants(record: DatasetRecord, line?: number): void {
  const fail = (message: string): never => {
    throw new SchemaError(`Record ${record.id}: ${message}`, { recordId: record.id, line })
  }

  if ((record.variant_of === undefined) !== (record.variant_index === undefined)) {
    fail("variant_of and variant_index must appear together")
  }

  switch (record.task_type) {
    case "matching": {
      const keys = record.output_spec.keys
      const keySet = new Set(keys)
      if (keySet.size !== keys.length) fail("output_spec.keys contains duplicates")
      const answerKeys = Object.keys(record.answer)
      const missing = keys.filter((k) => !(k in record.answer))
      const extra = answerKeys.filter((k) => !keySet.has(k))
      if (missing.length || extra.length) {
        fail(
          `answer keys must equal output_spec.keys (missing: [${missing.join(", ")}], unexpected: [${extra.join(", ")}])`,
        )
      }
      return
    }
    case "mcq": {
      const allowed = record.output_spec.allowed.map((l) => l.toUpperCase())
      if (new Set(allowed).size !== allowed.length) fail("output_spec.allowed contains duplicates")
      if (!allowed.includes(record.answer.toUpperCase())) {
        fail(`answer ${record.answer} is not one of [${record.output_spec.allowed.join(", ")}]`)
      }
      return
    }
    case "short_text": {
      const golds = typeof record.answer === "string" ? [record.answer] : record.answer
      for (const gold of golds) {
        if (!normalizeText(gold, record.output_spec)) {
          fail(`acceptable answer ${JSON.stringify(gold)} is empty after normalization`)
        }
      }
      return
    }
  }
}

/**
 * Validates one raw dataset row and returns the typed record.
 * @param row - Parsed JSON value from one dataset line.
 * @param line - 1-based line number, used in error messages.
 * @throws SchemaError if the row violates the record schema or its invariants.
 */
export function parseRecord(row: unknown, line?: number): DatasetRecord {
  const parsed = rowSchema.safeParse(row)
  if (!parsed.success) {
    const id = rowId(row)
    const where = line !== undefined ? ` (line ${line})` : ""
    throw new SchemaError(`Invalid record id=${id ?? "unknown"}${where}: ${formatIssues(parsed.error)}`, {
      recordId: id,
      line,
    })
  }
  const record = toRecord(parsed.data)
  checkInvariants(record, line)
  return record
}

export function isVariantRecord(record: DatasetRecord): record is VariantRecord {
  return record.variant_of !== undefined && record.variant_index !== undefined
}

/**
 * Id of the dataset record a record was derived from (its own id for originals).
 */
export function originId(record: DatasetRecord): string {
  return record.variant_of ?? record.id
}

/**
 * One JSONL line for a record, schema keys in a fixed order followed by any
 * extra keys in the order they were read. Absent optional fields are omitted.
 */
export function serializeRecord(record: DatasetRecord): string {
  const ordered: Record<string, unknown> = {}
  for (const key of RECORD_KEY_ORDER) ordered[key] = record[key]
  for (const [key, value] of Object.entries(record.extras ?? {})) ordered[key] = value
  return JSON.stringify(ordered)
}
