/**
 * Options bundle for a summarization run.
 */

import { z } from "zod"
import { invalidConfiguration, ok, type Result } from "./errors"

export const GenerationParamsSchema = z.object({
  temperature: z.number().min(0).default(0.3),
  topK: z.number().int().positive().default(40),
  topP: z.number().gt(0).max(1).default(0.9),
  repetitionPenalty: z.number().positive().default(1.1),
  /** Output tokens reserved per generation call */
  maxNewTokens: z.number().int().positive().default(2048),
})

export const SummarizerOptionsSchema = z.object({
  /** Largest token count a single generation call accepts */
  contextLimit: z.number().int().positive().default(32_768),
  /** Largest token count of one chunk; leaves room for prompt and output */
  chunkBudget: z.number().int().positive().default(28_000),
  /** Reduction rounds allowed before giving up */
  maxReductionDepth: z.number().int().positive().default(5),
  /** Extra attempts per generation call after the first failure */
  chunkRetries: z.number().int().min(0).default(1),
  /** Per-call deadline; unset means calls are never cut short */
  generationTimeoutMs: z.number().int().positive().optional(),
  /** Language the summary is written in; unset leaves it to the model */
  language: z.string().min(1).optional(),
  generationParams: GenerationParamsSchema.default({}),
})

export type GenerationParams = z.infer<typeof GenerationParamsSchema>
export type SummarizerOptions = z.infer<typeof SummarizerOptionsSchema>
export type SummarizerOptionsInput = z.input<typeof SummarizerOptionsSchema>

function formatIssue(issue: z.ZodIssue): string {
  const path = issue.path.join(".")
  return path ? `${path}: ${issue.message}` : issue.message
}

/**
 * Apply defaults and check the budgets against each other.
 */
export function resolveOptions(
  input: SummarizerOptionsInput = {},
): Result<SummarizerOptions> {
  const parsed = SummarizerOptionsSchema.safeParse(input)
  if (!parsed.success) {
    return invalidConfiguration(parsed.error.issues.map(formatIssue))
  }

  const options = parsed.data
  const issues: string[] = []
  if (options.chunkBudget >= options.contextLimit) {
    issues.push(
      `chunkBudget (${options.chunkBudget}) must be less than contextLimit (${options.contextLimit})`,
    )
  }
  const reserved = options.chunkBudget + options.generationParams.maxNewTokens
  if (reserved > options.contextLimit) {
    issues.push(
      `chunkBudget + maxNewTokens (${reserved}) must not exceed contextLimit (${options.contextLimit})`,
    )
  }
  if (issues.length > 0) {
    return invalidConfiguration(issues)
  }

  return ok(options)
}
