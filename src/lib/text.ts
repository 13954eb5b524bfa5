export type NormalizeFlags = {
  lower?: boolean
  strip_punct?: boolean
}

const WHITESPACE_RUN = /\s+/gu
// Everything that is not a letter, combining mark, digit, underscore or whitespace.
const PUNCTUATION = /[^\p{L}\p{M}\p{N}_\s]/gu
const WORD = /[\p{L}\p{M}\p{N}_]+/gu

export function collapseWhitespace(text: string): string {
  return text.replace(WHITESPACE_RUN, " ").trim()
}

/**
 * Canonical form used by short_text grading. Whitespace is always trimmed and
 * collapsed; `lower` defaults to true and `strip_punct` to false.
 */
export function normalizeText(text: string, flags: NormalizeFlags = {}): string {
  let out = collapseWhitespace(text)
  if (flags.lower ?? true) out = out.toLowerCase()
  if (flags.strip_punct ?? false) out = collapseWhitespace(out.replace(PUNCTUATION, ""))
  return out
}

/**
 * Lowercased word tokens of a text, used to keep generated tokens away from real words.
 */
export function wordsOf(text: string): string[] {
  return Array.from(text.matchAll(WORD), (m) => m[0].toLowerCase())
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")
}
