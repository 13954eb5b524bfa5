import { VariantGenerationError, SchemaError, errorMessage } from "./errors"
import { SplitMix64, variantSeed } from "./hash"
import {
  isVariantRecord,
  parseRecord,
  type DatasetRecord,
  type RecordMeta,
  type Span,
  type VariantRecord,
} from "./record"
import { escapeRegExp, wordsOf } from "./text"

/**
 * `pseudoword`: CV-syllable words for mystery-language spans, `wug<NNN>` for
 * English glosses. `tag`: bracketed `[<kind>-<NNN>]` tokens.
 */
export type TokenStyle = "pseudoword" | "tag"

export type VariantWarningCode = "duplicate_permutation" | "unused_span"

export type VariantWarning = {
  recordId: string
  variantIndex?: number
  code: VariantWarningCode
  message: string
}

export type VariantOptions = {
  style?: TokenStyle
  onWarning?: (warning: VariantWarning) => void
}

export type SkippedRecord = {
  recordId: string
  reason: string
}

export type VariantDataset = {
  variants: VariantRecord[]
  skipped: SkippedRecord[]
  warnings: VariantWarning[]
}

export const MAX_TOKEN_ATTEMPTS = 32
export const MAX_SHUFFLE_DRAWS = 16

const CONSONANTS = "ptkbdgmnszrlfvjhw".split("")
const VOWELS = "aeiou".split("")

export function variantId(recordId: string, variantIndex: number): string {
  return `${recordId}__iso${variantIndex}`
}

// ---------------------------------------------------------------------------
// Span replacement

type SpanPlan = {
  strategy: "span"
  spans: Array<{ text: string; kind: string }>
  vocabulary: Set<string>
  haystack: string
}

function answerStrings(record: DatasetRecord): string[] {
  switch (record.task_type) {
    case "matching":
      return [...Object.keys(record.answer), ...Object.values(record.answer)]
    case "mcq":
      return [record.answer]
    case "short_text":
      return typeof record.answer === "string" ? [record.answer] : record.answer
  }
}

function uniqueSpans(spans: Span[]): Array<{ text: string; kind: string }> {
  const seen = new Map<string, string>()
  for (const span of spans) {
    if (!seen.has(span.text)) seen.set(span.text, span.kind ?? "l1")
  }
  return Array.from(seen, ([text, kind]) => ({ text, kind }))
}

function pseudoToken(rng: SplitMix64, kind: string, style: TokenStyle): string {
  if (style === "tag") return `[${kind}-${100 + rng.nextInt(900)}]`
  if (kind === "en") return `wug${10 + rng.nextInt(990)}`
  const syllables = 1 + rng.nextInt(3)
  let word = ""
  for (let i = 0; i < syllables; i++) word += rng.pick(CONSONANTS) + rng.pick(VOWELS)
  if (rng.nextFloat() < 0.4) word += rng.pick(CONSONANTS)
  return word
}

function replacementMapping(
  record: DatasetRecord,
  plan: SpanPlan,
  rng: SplitMix64,
  style: TokenStyle,
): Map<string, string> {
  const taken = new Set(plan.spans.map((s) => s.text.toLowerCase()))
  const mapping = new Map<string, string>()
  for (const span of plan.spans) {
    let accepted: string | undefined
    for (let attempt = 0; attempt < MAX_TOKEN_ATTEMPTS && accepted === undefined; attempt++) {
      const candidate = pseudoToken(rng, span.kind, style)
      const key = candidate.toLowerCase()
      if (taken.has(key)) continue
      if (style === "tag" ? plan.haystack.includes(candidate) : plan.vocabulary.has(key)) continue
      accepted = candidate
    }
    if (accepted === undefined) {
      throw new VariantGenerationError(
        record.id,
        `Could not find a collision-free replacement for span ${JSON.stringify(span.text)} after ${MAX_TOKEN_ATTEMPTS} attempts`,
      )
    }
    taken.add(accepted.toLowerCase())
    mapping.set(span.text, accepted)
  }
  return mapping
}

/**
 * Replaces every occurrence of every mapped text in a single pass, longest
 * source first, so a replacement is never itself rewritten.
 */
function substituter(mapping: Map<string, string>): (text: string) => string {
  const sources = [...mapping.keys()].sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0))
  if (sources.length === 0) return (text) => text
  const pattern = new RegExp(sources.map(escapeRegExp).join("|"), "gu")
  return (text) => text.replace(pattern, (m) => mapping.get(m) ?? m)
}

function spanVariantRow(
  record: DatasetRecord,
  plan: SpanPlan,
  index: number,
  seed: number,
  style: TokenStyle,
): Record<string, unknown> {
  const rng = new SplitMix64(variantSeed(record.id, index, seed))
  const mapping = replacementMapping(record, plan, rng, style)
  const sub = substituter(mapping)

  const meta: RecordMeta = structuredClone(record.meta)
  meta.variantable = {
    ...meta.variantable,
    spans: (record.meta.variantable?.spans ?? []).map((s) => ({ ...s, text: sub(s.text) })),
  }
  meta.isomorph = { strategy: "span", seed, mapping: Object.fromEntries(mapping) }

  let answer: unknown
  let outputSpec: Record<string, unknown> = { ...record.output_spec }
  switch (record.task_type) {
    case "matching":
      answer = Object.fromEntries(Object.entries(record.answer).map(([k, v]) => [sub(k), sub(v)]))
      outputSpec = { ...record.output_spec, keys: record.output_spec.keys.map(sub) }
      break
    case "mcq":
      answer = record.answer
      break
    case "short_text":
      answer = typeof record.answer === "string" ? sub(record.answer) : record.answer.map(sub)
      break
  }

  return variantRow(record, index, sub(record.prompt), answer, outputSpec, meta)
}

// ---------------------------------------------------------------------------
// Shuffling fallback

/** Fewest labelled lines a block needs before it is worth shuffling. */
export const MIN_SHUFFLE_LINES = 4

const LABELLED_LINE = /^\s*(\d+|[A-Za-z])[.)]\s+\S/

type ShuffleBlock = {
  kind: "numbered" | "lettered"
  /** Prompt line indices of the block, top to bottom. */
  lineIndices: number[]
  labels: string[]
}

type ShufflePlan = {
  strategy: "shuffle"
  lines: string[]
  blocks: ShuffleBlock[]
}

function labelledBlocks(lines: string[]): ShuffleBlock[] {
  const numbered: ShuffleBlock = { kind: "numbered", lineIndices: [], labels: [] }
  const lettered: ShuffleBlock = { kind: "lettered", lineIndices: [], labels: [] }
  lines.forEach((line, lineIndex) => {
    const m = LABELLED_LINE.exec(line)
    if (!m) return
    const block = /^\d+$/.test(m[1]) ? numbered : lettered
    block.lineIndices.push(lineIndex)
    block.labels.push(m[1])
  })
  // a repeated label means the lines are not one enumeration
  return [numbered, lettered].filter(
    (b) =>
      b.labels.length >= MIN_SHUFFLE_LINES &&
      new Set(b.labels.map((l) => l.toUpperCase())).size === b.labels.length,
  )
}

function shufflePlan(record: DatasetRecord): ShufflePlan | null {
  if (record.task_type === "short_text") return null
  const lines = record.prompt.split("\n")
  const blocks = labelledBlocks(lines)
  return blocks.length > 0 ? { strategy: "shuffle", lines, blocks } : null
}

function isIdentity(perm: number[]): boolean {
  return perm.every((v, i) => v === i)
}

/**
 * Reorders whole labelled lines. A label travels with its content, so the gold
 * answer and output_spec still hold unchanged.
 */
function shuffleVariantRow(
  record: DatasetRecord,
  plan: ShufflePlan,
  index: number,
  seed: number,
  seen: Set<string>,
  warn: (warning: VariantWarning) => void,
): Record<string, unknown> {
  const rng = new SplitMix64(variantSeed(record.id, index, seed))
  let perms: number[][] = []
  let fresh = false
  for (let draw = 0; draw < MAX_SHUFFLE_DRAWS && !fresh; draw++) {
    perms = plan.blocks.map((b) => rng.permutation(b.lineIndices.length))
    const key = perms.map((p) => p.join(",")).join("|")
    fresh = !perms.every(isIdentity) && !seen.has(key)
    if (fresh) seen.add(key)
  }
  if (!fresh) {
    warn({
      recordId: record.id,
      variantIndex: index,
      code: "duplicate_permutation",
      message: `Variant ${index} of ${record.id} repeats an earlier ordering (too few shufflable lines)`,
    })
  }

  const lines = [...plan.lines]
  const order: Partial<Record<ShuffleBlock["kind"], string[]>> = {}
  plan.blocks.forEach((block, b) => {
    const perm = perms[b]
    perm.forEach((from, to) => {
      lines[block.lineIndices[to]] = plan.lines[block.lineIndices[from]]
    })
    order[block.kind] = perm.map((from) => block.labels[from])
  })

  const meta: RecordMeta = structuredClone(record.meta)
  meta.isomorph = { strategy: "shuffle", seed, order }
  return variantRow(record, index, lines.join("\n"), record.answer, { ...record.output_spec }, meta)
}

// ---------------------------------------------------------------------------

function variantRow(
  record: DatasetRecord,
  index: number,
  prompt: string,
  answer: unknown,
  outputSpec: Record<string, unknown>,
  meta: RecordMeta,
): Record<string, unknown> {
  return {
    id: variantId(record.id, index),
    source: record.source,
    year: record.year,
    task_type: record.task_type,
    prompt,
    answer,
    output_spec: outputSpec,
    meta,
    variant_of: record.id,
    variant_index: index,
    ...structuredClone(record.extras ?? {}),
  }
}

function toVariant(recordId: string, row: Record<string, unknown>): VariantRecord {
  let parsed: DatasetRecord
  try {
    parsed = parseRecord(row)
  } catch (err) {
    if (err instanceof SchemaError) {
      throw new VariantGenerationError(recordId, `Variant violates record invariants: ${err.message}`, {
        cause: err,
      })
    }
    throw err
  }
  if (!isVariantRecord(parsed)) {
    throw new VariantGenerationError(recordId, "Variant lost its variant_of/variant_index fields")
  }
  return parsed
}

function planFor(record: DatasetRecord): SpanPlan | ShufflePlan {
  const spans = record.meta.variantable?.spans ?? []
  if (spans.length > 0) {
    const texts = [record.prompt, ...answerStrings(record)]
    return {
      strategy: "span",
      spans: uniqueSpans(spans),
      vocabulary: new Set(texts.flatMap(wordsOf)),
      haystack: texts.join("\n"),
    }
  }
  const plan = shufflePlan(record)
  if (!plan) {
    throw new VariantGenerationError(
      record.id,
      record.task_type === "short_text"
        ? "short_text record has no span annotations to substitute"
        : `Record has no span annotations and no block of ${MIN_SHUFFLE_LINES} or more labelled lines to shuffle`,
    )
  }
  return plan
}

/**
 * Produces `k` isomorphic variants of a record.
 *
 * The result is lazy and restartable: every iteration replays the same
 * sequence for the same (record, k, seed). Whether the record can be varied at
 * all is decided up front, so a record without spans or shufflable structure
 * throws immediately.
 * @throws VariantGenerationError when the record cannot be variant-ized, or
 *   (during iteration) when a variant cannot satisfy the uniqueness constraints.
 */
export function generateVariants(
  record: DatasetRecord,
  k: number,
  seed: number,
  options: VariantOptions = {},
): Iterable<VariantRecord> {
  if (!Number.isInteger(k) || k < 0) throw new RangeError(`k must be a non-negative integer, got ${k}`)
  if (!Number.isSafeInteger(seed)) throw new RangeError(`seed must be an integer, got ${seed}`)

  const style = options.style ?? "pseudoword"
  const warn = options.onWarning ?? (() => {})
  const plan = planFor(record)

  if (plan.strategy === "span") {
    const unused = plan.spans.filter((s) => !plan.haystack.includes(s.text))
    for (const span of unused) {
      warn({
        recordId: record.id,
        code: "unused_span",
        message: `Span ${JSON.stringify(span.text)} of ${record.id} occurs in neither prompt nor answer`,
      })
    }
  }

  return {
    *[Symbol.iterator]() {
      const seen = new Set<string>()
      for (let index = 0; index < k; index++) {
        const row =
          plan.strategy === "span"
            ? spanVariantRow(record, plan, index, seed, style)
            : shuffleVariantRow(record, plan, index, seed, seen, warn)
        yield toVariant(record.id, row)
      }
    },
  }
}

/**
 * Variant-izes a whole dataset. Records that cannot be varied are skipped and
 * listed; they never abort the batch.
 */
export function buildVariantDataset(
  records: DatasetRecord[],
  k: number,
  seed: number,
  options: Omit<VariantOptions, "onWarning"> = {},
): VariantDataset {
  const variants: VariantRecord[] = []
  const skipped: SkippedRecord[] = []
  const warnings: VariantWarning[] = []

  for (const record of records) {
    const pending: VariantWarning[] = []
    try {
      const produced = [
        ...generateVariants(record, k, seed, { ...options, onWarning: (w) => pending.push(w) }),
      ]
      variants.push(...produced)
      warnings.push(...pending)
    } catch (err) {
      if (!(err instanceof VariantGenerationError)) throw err
      skipped.push({ recordId: record.id, reason: errorMessage(err) })
    }
  }

  return { variants, skipped, warnings }
}
