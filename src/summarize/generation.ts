/**
 * A single generation call with local retry.
 */

import { withTimeout } from "../util/timeout"
import type { DiagnosticsSink } from "./diagnostics"
import { CapabilityUnavailableError, errorMessage, type SummaryError } from "./errors"
import type { SummarizerOptions } from "./options"
import type { ModelCapability, Prompt } from "./types"

/**
 * Everything a stage needs for one run. Built once per summarize call.
 */
export interface StageContext {
  capability: ModelCapability
  options: SummarizerOptions
  sink: DiagnosticsSink
}

export type GenerationOutcome =
  | { status: "ok"; text: string }
  | { status: "unavailable"; error: SummaryError }
  | { status: "failed"; attempts: number; reason: string }

/**
 * Output with no letter or digit in it carries no summary.
 */
export function isDegenerate(text: string): boolean {
  return !/[\p{L}\p{N}]/u.test(text)
}

/**
 * Call the model until it returns usable text or the retry budget runs out.
 * `label` names the call in diagnostics (e.g. "chunk 3").
 */
export async function generateWithRetry(
  context: StageContext,
  prompt: Prompt,
  label: string,
): Promise<GenerationOutcome> {
  const { capability, options, sink } = context
  const maxAttempts = options.chunkRetries + 1
  let reason = "no attempt made"

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      const output = await withTimeout(
        (signal) => capability.generate(prompt, options.generationParams, { signal }),
        options.generationTimeoutMs,
      )
      const text = output.trim()
      if (!isDegenerate(text)) {
        return { status: "ok", text }
      }
      reason = text.length === 0 ? "empty output" : "degenerate output"
    } catch (error) {
      if (error instanceof CapabilityUnavailableError) {
        return {
          status: "unavailable",
          error: { kind: "capability-unavailable", message: error.message },
        }
      }
      reason = errorMessage(error)
    }
    sink.emit({ type: "generation-failed", label, attempt, reason })
  }

  return { status: "failed", attempts: maxAttempts, reason }
}
