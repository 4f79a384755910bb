export { analyze, countTokens } from "./budget"
export { Diagnostics } from "./diagnostics"
export type { DiagnosticsSink, SummarizationState, SummaryEvent } from "./diagnostics"
export {
  CapabilityUnavailableError,
  describeError,
  SummarizationError,
} from "./errors"
export type { Result, SummaryError, SummaryErrorKind } from "./errors"
export { mapChunk, mapChunks } from "./map"
export { resolveOptions, SummarizerOptionsSchema } from "./options"
export type { GenerationParams, SummarizerOptions, SummarizerOptionsInput } from "./options"
export { summarize, summarizeOrThrow } from "./orchestrator"
export type { SummarizeDependencies } from "./orchestrator"
export { reduce } from "./reduce"
export type { ReduceOutcome } from "./reduce"
export { split } from "./splitter"
export type {
  Chunk,
  FinalSummary,
  GenerateCallOptions,
  ModelCapability,
  PartialSummary,
  Prompt,
  TokenMeasurement,
} from "./types"
