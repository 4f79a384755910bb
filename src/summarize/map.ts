import { countTokens } from "./budget"
import { fail, ok, type Result } from "./errors"
import { generateWithRetry, type StageContext } from "./generation"
import { buildChunkPrompt } from "./prompt"
import type { Chunk, PartialSummary } from "./types"

/**
 * Summarize one chunk. `round` is 0 for the document's own chunks and the
 * reduction round number for re-chunked summaries.
 */
export async function mapChunk(
  context: StageContext,
  chunk: Chunk,
  round = 0,
): Promise<Result<PartialSummary>> {
  const prompt = buildChunkPrompt(chunk.text, context.options.language)
  const outcome = await generateWithRetry(context, prompt, `chunk ${chunk.index}`)

  switch (outcome.status) {
    case "unavailable":
      return fail(outcome.error)
    case "failed":
      return fail({
        kind: "chunk-summarization-failed",
        index: chunk.index,
        round,
        attempts: outcome.attempts,
        reason: outcome.reason,
      })
    case "ok": {
      const counted = countTokens(context.capability, outcome.text)
      if (!counted.ok) return counted
      return ok({
        sourceChunkIndex: chunk.index,
        text: outcome.text,
        tokenCount: counted.value,
      })
    }
  }
}

/**
 * Summarize chunks one after another, in index order. Stops at the first
 * chunk that fails.
 */
export async function mapChunks(
  context: StageContext,
  chunks: Chunk[],
  round = 0,
): Promise<Result<PartialSummary[]>> {
  const partials: PartialSummary[] = []
  for (const chunk of chunks) {
    context.sink.emit({
      type: "chunk-progress",
      round,
      index: chunk.index,
      total: chunks.length,
    })
    const mapped = await mapChunk(context, chunk, round)
    if (!mapped.ok) return mapped
    partials.push(mapped.value)
  }
  return ok(partials)
}
