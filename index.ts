export { BenchError, ParseError, SchemaError, VariantGenerationError, InvocationFailure, ReportMismatchError } from "./src/lib/errors"

export {
  TASK_TYPES,
  type TaskType,
  type Span,
  type DatasetRecord,
  type MatchingRecord,
  type McqRecord,
  type ShortTextRecord,
  type VariantRecord,
  parseRecord,
  serializeRecord,
  originId,
} from "./src/lib/record"

export { readJsonlFile } from "./src/lib/readJsonl"
export { loadDataset, writeDataset, datasetName, type LoadedDataset, type RejectedRow } from "./src/lib/dataset"
export { writeJsonl } from "./src/lib/report"

export { normalizeText } from "./src/lib/text"
export { grade, extractJsonObject, type GradeResult, type GradeError } from "./src/lib/grade"

export {
  generateVariants,
  buildVariantDataset,
  type TokenStyle,
  type VariantOptions,
  type VariantWarning,
  type VariantDataset,
} from "./src/lib/isomorph"

export {
  createOpenRouterInvoker,
  createOllamaInvoker,
  createRoutingInvoker,
  invokeWithRetry,
  modelEndpoint,
  DEFAULT_DECODING,
  type DecodingOptions,
  type ModelInvoker,
  type RetryPolicy,
} from "./src/lib/invoke"

export {
  RunStore,
  withRunStore,
  readRunDir,
  runFilePath,
  type RunEntry,
  type ModelRunIndex,
  type RunStoreParams,
} from "./src/lib/runStore"
export { runModels, type RunConfig, type ModelRunSummary, type RunProgressEvent } from "./src/lib/runner"
export { mergeTallies, type Bucket, type Tally } from "./src/lib/tally"
export { evaluateRuns, type Report, type ModelReport } from "./src/lib/evaluator"
export { computeGap, loadReport, type GapReport, type GapEntry } from "./src/lib/gap"
