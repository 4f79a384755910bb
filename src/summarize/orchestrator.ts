/**
 * Map-reduce summarization of arbitrarily long text.
 *
 * A run walks these states:
 *
 *   init -> token-check -> direct ------------------> done
 *                       \-> map -> reduce (xN) ----/
 *
 * and moves to `failed` from any of them on the first unrecovered error.
 * Nothing is kept between runs.
 */

import { analyze } from "./budget"
import { Diagnostics, type DiagnosticsSink, type SummarizationState } from "./diagnostics"
import { fail, ok, SummarizationError, type Result, type SummaryError } from "./errors"
import { generateWithRetry, type StageContext } from "./generation"
import { mapChunks } from "./map"
import { resolveOptions, type SummarizerOptionsInput } from "./options"
import { buildDirectPrompt } from "./prompt"
import { finalSummary, reduce } from "./reduce"
import { split } from "./splitter"
import type { FinalSummary, ModelCapability, PartialSummary } from "./types"

export interface SummarizeDependencies {
  capability: ModelCapability
  options?: SummarizerOptionsInput
  /** Defaults to the structured logger */
  sink?: DiagnosticsSink
}

export async function summarize(
  document: string,
  dependencies: SummarizeDependencies,
): Promise<Result<FinalSummary>> {
  const { capability } = dependencies
  const sink = dependencies.sink ?? Diagnostics.logSink()

  let state: SummarizationState = "init"
  const enter = (next: SummarizationState): void => {
    sink.emit({ type: "state", from: state, to: next })
    state = next
  }
  const failed = (error: SummaryError): Result<FinalSummary> => {
    enter("failed")
    return fail(error)
  }

  const resolved = resolveOptions(dependencies.options)
  if (!resolved.ok) return failed(resolved.error)
  const options = resolved.value
  const context: StageContext = { capability, options, sink }

  enter("token-check")
  const measured = analyze(capability, document, options.contextLimit, sink)
  if (!measured.ok) return failed(measured.error)

  if (!measured.value.exceedsLimit) {
    enter("direct")
    const prompt = buildDirectPrompt(document, options.language)
    const outcome = await generateWithRetry(context, prompt, "document")
    if (outcome.status === "unavailable") return failed(outcome.error)
    if (outcome.status === "failed") {
      return failed({
        kind: "chunk-summarization-failed",
        index: 0,
        round: 0,
        attempts: outcome.attempts,
        reason: outcome.reason,
      })
    }
    enter("done")
    return ok(finalSummary(outcome.text, 1))
  }

  enter("map")
  const chunks = split(capability, document, options.chunkBudget)
  if (!chunks.ok) return failed(chunks.error)
  const sourceChunkCount = chunks.value.length
  sink.emit({ type: "chunked", round: 0, chunkCount: sourceChunkCount })

  const mapped = await mapChunks(context, chunks.value, 0)
  if (!mapped.ok) return failed(mapped.error)

  let partials: PartialSummary[] = mapped.value
  for (let round = 1; round <= options.maxReductionDepth; round++) {
    enter("reduce")
    const reduced = await reduce(context, partials, round, sourceChunkCount)
    if (!reduced.ok) return failed(reduced.error)
    if (reduced.value.kind === "final") {
      enter("done")
      return ok(reduced.value.summary)
    }
    partials = reduced.value.partials
  }

  return failed({
    kind: "reduction-depth-exceeded",
    depth: options.maxReductionDepth,
    partialCount: partials.length,
    tokenCount: partials.reduce((sum, partial) => sum + partial.tokenCount, 0),
  })
}

/**
 * Same as summarize, but throws SummarizationError on failure.
 */
export async function summarizeOrThrow(
  document: string,
  dependencies: SummarizeDependencies,
): Promise<FinalSummary> {
  const result = await summarize(document, dependencies)
  if (!result.ok) throw new SummarizationError(result.error)
  return result.value
}
