/**
 * Progress events emitted during a summarization run.
 *
 * The engine only emits; formatting and persistence belong to the sink.
 */

import { Log } from "../util/log"

export type SummarizationState =
  | "init"
  | "token-check"
  | "direct"
  | "map"
  | "reduce"
  | "done"
  | "failed"

export type SummaryEvent =
  | { type: "state"; from: SummarizationState; to: SummarizationState }
  | { type: "token-check"; tokenCount: number; contextLimit: number; exceedsLimit: boolean }
  | { type: "chunked"; round: number; chunkCount: number }
  | { type: "chunk-progress"; round: number; index: number; total: number }
  | { type: "generation-failed"; label: string; attempt: number; reason: string }
  | { type: "consolidation-start"; round: number; partialCount: number; tokenCount: number }
  | {
      type: "consolidation-end"
      round: number
      outcome: "final" | "partials"
      tokenCount: number
    }

export interface DiagnosticsSink {
  emit(event: SummaryEvent): void
}

export namespace Diagnostics {
  /**
   * Forward events to the structured logger.
   */
  export function logSink(service = "summarizer"): DiagnosticsSink {
    const log = Log.create({ service })
    return {
      emit(event) {
        switch (event.type) {
          case "state":
            log.debug("state transition", { from: event.from, to: event.to })
            break
          case "token-check":
            log.info("token check", {
              tokens: event.tokenCount,
              limit: event.contextLimit,
              exceeds: event.exceedsLimit,
            })
            break
          case "chunked":
            log.info(`text split into ${event.chunkCount} chunks`, { round: event.round })
            break
          case "chunk-progress":
            log.info(`summarizing chunk ${event.index + 1}/${event.total}`, { round: event.round })
            break
          case "generation-failed":
            log.warn("generation failed", {
              label: event.label,
              attempt: event.attempt,
              reason: event.reason,
            })
            break
          case "consolidation-start":
            log.info("consolidating summaries", {
              round: event.round,
              partials: event.partialCount,
              tokens: event.tokenCount,
            })
            break
          case "consolidation-end":
            log.info("consolidation round complete", {
              round: event.round,
              outcome: event.outcome,
              tokens: event.tokenCount,
            })
            break
        }
      },
    }
  }
}
