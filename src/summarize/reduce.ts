/**
 * One consolidation round over partial summaries.
 */

import { countTokens } from "./budget"
import { fail, ok, type Result } from "./errors"
import { generateWithRetry, type StageContext } from "./generation"
import { mapChunks } from "./map"
import { buildConsolidationPrompt, SUMMARY_DELIMITER } from "./prompt"
import { split } from "./splitter"
import type { FinalSummary, PartialSummary } from "./types"

export type ReduceOutcome =
  | { kind: "final"; summary: FinalSummary }
  | { kind: "partials"; partials: PartialSummary[] }

export function finalSummary(text: string, sourceChunkCount: number): FinalSummary {
  return Object.freeze({ text, sourceChunkCount })
}

/**
 * Join partial summaries in source order.
 */
export function combinePartials(partials: PartialSummary[]): string {
  return [...partials]
    .sort((a, b) => a.sourceChunkIndex - b.sourceChunkIndex)
    .map((partial) => partial.text)
    .join(SUMMARY_DELIMITER)
}

/**
 * Consolidate when the joined summaries fit the chunk budget; otherwise
 * re-chunk them and summarize each piece, returning a shorter sequence for
 * the next round.
 */
export async function reduce(
  context: StageContext,
  partials: PartialSummary[],
  round: number,
  sourceChunkCount: number,
): Promise<Result<ReduceOutcome>> {
  const { capability, options, sink } = context
  const combined = combinePartials(partials)
  const counted = countTokens(capability, combined)
  if (!counted.ok) return counted
  const tokensBefore = counted.value

  sink.emit({
    type: "consolidation-start",
    round,
    partialCount: partials.length,
    tokenCount: tokensBefore,
  })

  if (tokensBefore <= options.chunkBudget) {
    let text = combined
    if (partials.length > 1) {
      const prompt = buildConsolidationPrompt(combined, options.language)
      const outcome = await generateWithRetry(context, prompt, `consolidation round ${round}`)
      if (outcome.status === "unavailable") return fail(outcome.error)
      if (outcome.status === "failed") {
        return fail({
          kind: "consolidation-failed",
          round,
          attempts: outcome.attempts,
          reason: outcome.reason,
        })
      }
      text = outcome.text
    }
    const final = countTokens(capability, text)
    if (!final.ok) return final
    sink.emit({ type: "consolidation-end", round, outcome: "final", tokenCount: final.value })
    return ok({ kind: "final", summary: finalSummary(text, sourceChunkCount) })
  }

  const chunks = split(capability, combined, options.chunkBudget)
  if (!chunks.ok) return chunks
  sink.emit({ type: "chunked", round, chunkCount: chunks.value.length })

  const next = await mapChunks(context, chunks.value, round)
  if (!next.ok) return next

  const tokensAfter = next.value.reduce((sum, partial) => sum + partial.tokenCount, 0)
  if (tokensAfter >= tokensBefore) {
    return fail({ kind: "reduction-not-converging", round, tokensBefore, tokensAfter })
  }

  sink.emit({ type: "consolidation-end", round, outcome: "partials", tokenCount: tokensAfter })
  return ok({ kind: "partials", partials: next.value })
}
