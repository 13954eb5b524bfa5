import { parseRecord, type DatasetRecord, type MatchingRecord, type McqRecord, type ShortTextRecord } from "../src/lib/record"

export function mcqRecord(overrides: Record<string, unknown> = {}): McqRecord {
  const record = parseRecord({
    id: "q1",
    source: "NACLO",
    year: 2019,
    task_type: "mcq",
    prompt: "Which word means 'river'?\nA. sulo\nB. kema\nC. ratu\nD. pila",
    answer: "C",
    output_spec: { type: "mcq_letter", allowed: ["A", "B", "C", "D"] },
    meta: {},
    ...overrides,
  })
  if (record.task_type !== "mcq") throw new Error("expected an mcq record")
  return record
}

export function matchingRecord(overrides: Record<string, unknown> = {}): MatchingRecord {
  const record = parseRecord({
    id: "m1",
    source: "IOL",
    year: 2012,
    task_type: "matching",
    prompt: "Match each word to its meaning.\n1. akun\n2. bemi\n3. coro\n4. dalu\nA. sun\nB. moon\nC. star\nD. rain",
    answer: { "1": "B", "2": "C", "3": "A", "4": "D" },
    output_spec: { type: "json_mapping", keys: ["1", "2", "3", "4"] },
    meta: {},
    ...overrides,
  })
  if (record.task_type !== "matching") throw new Error("expected a matching record")
  return record
}

export function shortTextRecord(overrides: Record<string, unknown> = {}): ShortTextRecord {
  const record = parseRecord({
    id: "s1",
    source: "UKLO",
    year: 2015,
    task_type: "short_text",
    prompt: "In Zorvan, 'tamu' means 'water' and 'tamuka' means 'waters'. Translate 'tamuka'.",
    answer: "waters",
    output_spec: { type: "short_text", lower: true },
    meta: {
      variantable: {
        spans: [
          { text: "tamu", kind: "l1" },
          { text: "tamuka" },
          { text: "waters", kind: "en" },
        ],
      },
    },
    ...overrides,
  })
  if (record.task_type !== "short_text") throw new Error("expected a short_text record")
  return record
}

/**
 * Content of each labelled line (`1. akun` -> `1` => `akun`).
 */
export function labelledContents(prompt: string): Record<string, string> {
  const out: Record<string, string> = {}
  for (const line of prompt.split("\n")) {
    const m = /^([0-9]+|[A-Za-z])\. (.*)$/.exec(line)
    if (m) out[m[1]] = m[2]
  }
  return out
}

export type { DatasetRecord }
