/**
 * Error kinds of a summarization run.
 *
 * Stages never throw these: each returns a Result and the orchestrator
 * routes a failed Result to its `failed` state.
 */

export type SummaryError =
  | {
      kind: "capability-unavailable"
      message: string
    }
  | {
      kind: "invalid-configuration"
      message: string
      issues: string[]
    }
  | {
      kind: "chunk-summarization-failed"
      /** Chunk index within its round */
      index: number
      /** 0 for the initial map, n for reduction round n */
      round: number
      attempts: number
      reason: string
    }
  | {
      kind: "consolidation-failed"
      round: number
      attempts: number
      reason: string
    }
  | {
      kind: "reduction-depth-exceeded"
      depth: number
      partialCount: number
      tokenCount: number
    }
  | {
      kind: "reduction-not-converging"
      round: number
      tokensBefore: number
      tokensAfter: number
    }

export type SummaryErrorKind = SummaryError["kind"]

export type Result<T> = { ok: true; value: T } | { ok: false; error: SummaryError }

export function ok<T>(value: T): Result<T> {
  return { ok: true, value }
}

export function fail<T>(error: SummaryError): Result<T> {
  return { ok: false, error }
}

export function invalidConfiguration<T>(issues: string[]): Result<T> {
  return fail({
    kind: "invalid-configuration",
    message: `Invalid configuration: ${issues.join("; ")}`,
    issues,
  })
}

/**
 * Thrown by a ModelCapability when the tokenizer or model cannot be reached.
 */
export class CapabilityUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "CapabilityUnavailableError"
  }
}

/**
 * Thrown by summarizeOrThrow.
 */
export class SummarizationError extends Error {
  constructor(readonly error: SummaryError) {
    super(describeError(error))
    this.name = "SummarizationError"
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * One-line description for reporting to a user.
 */
export function describeError(error: SummaryError): string {
  switch (error.kind) {
    case "capability-unavailable":
      return `Model capability unavailable: ${error.message}`
    case "invalid-configuration":
      return error.message
    case "chunk-summarization-failed": {
      const where = error.round === 0 ? "" : ` (reduction round ${error.round})`
      return `Chunk ${error.index}${where} could not be summarized after ${error.attempts} attempt(s): ${error.reason}`
    }
    case "consolidation-failed":
      return `Consolidation in round ${error.round} failed after ${error.attempts} attempt(s): ${error.reason}`
    case "reduction-depth-exceeded":
      return `Reduction did not fit the budget within ${error.depth} round(s) (${error.partialCount} partial summaries, ~${error.tokenCount} tokens left)`
    case "reduction-not-converging":
      return `Reduction round ${error.round} did not shrink the summaries (${error.tokensBefore} -> ${error.tokensAfter} tokens)`
  }
}
