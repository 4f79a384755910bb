/**
 * Data types shared by the summarization stages.
 */

import type { GenerationParams } from "./options"

/**
 * A role-framed prompt: the system part sets the role, the user part carries
 * the instruction and the text to work on.
 */
export interface Prompt {
  system: string
  user: string
}

export interface GenerateCallOptions {
  /** Aborted when the engine's per-call deadline passes */
  signal?: AbortSignal
}

/**
 * The two things the engine needs from a model. Implementations are built
 * and owned by the caller; the engine never loads or reconfigures a model.
 *
 * `generate` may throw CapabilityUnavailableError to report that the model
 * cannot be reached at all; any other failure counts against the retry
 * budget of the call.
 */
export interface ModelCapability {
  tokenCount(text: string): number
  generate(
    prompt: Prompt,
    params: GenerationParams,
    options?: GenerateCallOptions,
  ): Promise<string>
}

export interface Chunk {
  /** Position in document order, contiguous from 0 */
  index: number
  text: string
  tokenCount: number
}

export interface PartialSummary {
  sourceChunkIndex: number
  text: string
  tokenCount: number
}

export interface FinalSummary {
  readonly text: string
  /** Number of chunks the document was split into (1 for the direct path) */
  readonly sourceChunkCount: number
}

export interface TokenMeasurement {
  tokenCount: number
  contextLimit: number
  exceedsLimit: boolean
  overflowTokens: number
}
