import type { DiagnosticsSink } from "./diagnostics"
import { errorMessage, fail, ok, type Result } from "./errors"
import type { ModelCapability, TokenMeasurement } from "./types"

/**
 * Count tokens, turning a tokenizer failure into a capability error.
 */
export function countTokens(capability: ModelCapability, text: string): Result<number> {
  try {
    return ok(capability.tokenCount(text))
  } catch (error) {
    return fail({
      kind: "capability-unavailable",
      message: `tokenizer failed: ${errorMessage(error)}`,
    })
  }
}

/**
 * Measure a text against the context limit.
 */
export function analyze(
  capability: ModelCapability,
  text: string,
  contextLimit: number,
  sink: DiagnosticsSink,
): Result<TokenMeasurement> {
  const counted = countTokens(capability, text)
  if (!counted.ok) return counted

  const tokenCount = counted.value
  const exceedsLimit = tokenCount > contextLimit
  sink.emit({ type: "token-check", tokenCount, contextLimit, exceedsLimit })

  return ok({
    tokenCount,
    contextLimit,
    exceedsLimit,
    overflowTokens: exceedsLimit ? tokenCount - contextLimit : 0,
  })
}
