/**
 * Base class for every error the pipeline raises on purpose.
 * Anything else reaching the CLI is a bug.
 */
export class BenchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

export type ParseErrorCode =
  | "no_json_object"
  | "invalid_json"
  | "not_an_object"
  | "missing_keys"
  | "no_allowed_letter"
  | "empty_output"

/**
 * Model output does not match the shape its output_spec asks for.
 * Graded as incorrect, never fatal.
 */
export class ParseError extends BenchError {
  readonly code: ParseErrorCode

  constructor(code: ParseErrorCode, message: string) {
    super(message)
    this.code = code
  }
}

/**
 * A dataset row violates the record invariants. The row is skipped.
 */
export class SchemaError extends BenchError {
  readonly recordId?: string
  readonly line?: number

  constructor(message: string, details: { recordId?: string; line?: number } = {}) {
    super(message)
    this.recordId = details.recordId
    this.line = details.line
  }
}

export class VariantGenerationError extends BenchError {
  readonly recordId: string

  constructor(recordId: string, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.recordId = recordId
  }
}

/**
 * The model collaborator failed or timed out after every allowed attempt.
 */
export class InvocationFailure extends BenchError {
  readonly modelId: string
  readonly attempts: number
  readonly timedOut: boolean

  constructor(
    modelId: string,
    message: string,
    details: { attempts: number; timedOut?: boolean; cause?: unknown },
  ) {
    super(message, { cause: details.cause })
    this.modelId = modelId
    this.attempts = details.attempts
    this.timedOut = details.timedOut ?? false
  }
}

/**
 * Two reports cannot be diffed because their model sets differ.
 */
export class ReportMismatchError extends BenchError {
  readonly missingFromOriginal: string[]
  readonly missingFromIsomorphic: string[]

  constructor(missingFromOriginal: string[], missingFromIsomorphic: string[]) {
    const parts: string[] = []
    if (missingFromIsomorphic.length > 0) {
      parts.push(`missing from isomorphic report: ${missingFromIsomorphic.join(", ")}`)
    }
    if (missingFromOriginal.length > 0) {
      parts.push(`missing from original report: ${missingFromOriginal.join(", ")}`)
    }
    super(`Reports do not cover the same models (${parts.join("; ")})`)
    this.missingFromOriginal = missingFromOriginal
    this.missingFromIsomorphic = missingFromIsomorphic
  }
}

/**
 * Renders any thrown value as a one-line message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
