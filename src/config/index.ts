/**
 * Configuration for condense
 *
 * Env-based config: provider selection and model ID are required to reach a
 * model; engine options fall back to the engine's defaults.
 */

import { z } from "zod";
import type { SummarizerOptionsInput } from "../summarize/options";

export namespace Config {
  export const KnownProviders = [
    "anthropic",
    "openai",
    "openai-compatible",
  ] as const;

  export type ProviderName = (typeof KnownProviders)[number];

  const NumericOptionEnvKeys = {
    contextLimit: "CONDENSE_CONTEXT_LIMIT",
    chunkBudget: "CONDENSE_CHUNK_BUDGET",
    maxReductionDepth: "CONDENSE_MAX_REDUCTION_DEPTH",
    chunkRetries: "CONDENSE_CHUNK_RETRIES",
    generationTimeoutMs: "CONDENSE_GENERATION_TIMEOUT_MS",
  } as const;

  const GenerationParamEnvKeys = {
    temperature: "CONDENSE_TEMPERATURE",
    topK: "CONDENSE_TOP_K",
    topP: "CONDENSE_TOP_P",
    repetitionPenalty: "CONDENSE_REPETITION_PENALTY",
    maxNewTokens: "CONDENSE_MAX_NEW_TOKENS",
  } as const;

  type NumericOption = keyof typeof NumericOptionEnvKeys;
  type GenerationParam = keyof typeof GenerationParamEnvKeys;

  function parseNumberEnv(value: string | undefined, envKey: string): number | undefined {
    if (value === undefined || value.trim() === "") return undefined;
    const parsed = Number(value);
    if (Number.isNaN(parsed)) {
      throw new Error(`Invalid numeric value for ${envKey}`);
    }
    return parsed;
  }

  function readNumbers<K extends string>(
    keys: Record<K, string>,
  ): Partial<Record<K, number>> {
    const values: Partial<Record<K, number>> = {};
    for (const key of Object.keys(keys) as K[]) {
      const envKey = keys[key];
      const value = parseNumberEnv(process.env[envKey], envKey);
      if (value !== undefined) {
        values[key] = value;
      }
    }
    return values;
  }

  function readSummarizerOptions(): SummarizerOptionsInput {
    const numbers: Partial<Record<NumericOption, number>> = readNumbers(NumericOptionEnvKeys);
    const generationParams: Partial<Record<GenerationParam, number>> =
      readNumbers(GenerationParamEnvKeys);
    return {
      ...numbers,
      language: process.env.CONDENSE_LANGUAGE || undefined,
      generationParams,
    };
  }

  const ProviderSettingsSchema = z.object({
    apiKey: z.string().optional(),
    baseUrl: z.string().optional(),
  });

  export const Schema = z.object({
    provider: z.enum(KnownProviders),
    /** Model ID passed to the provider */
    model: z.string().optional(),
    providers: z
      .object({
        anthropic: ProviderSettingsSchema,
        openai: ProviderSettingsSchema,
        openaiCompatible: ProviderSettingsSchema,
      })
      .default({ anthropic: {}, openai: {}, openaiCompatible: {} }),
    summarizer: z.custom<SummarizerOptionsInput>(
      (value) => typeof value === "object" && value !== null,
    ),
  });

  export type Config = z.infer<typeof Schema>;

  let cached: Config | null = null;

  /**
   * Get the current configuration.
   * Loads from environment variables; engine options are validated later,
   * when a run starts.
   */
  export function get(): Config {
    if (cached) return cached;

    cached = Schema.parse({
      provider: process.env.CONDENSE_PROVIDER ?? "openai",
      model: process.env.CONDENSE_MODEL,
      providers: {
        anthropic: {
          apiKey: process.env.ANTHROPIC_API_KEY,
          baseUrl: process.env.ANTHROPIC_BASE_URL,
        },
        openai: {
          apiKey: process.env.OPENAI_API_KEY,
          baseUrl: process.env.OPENAI_BASE_URL ?? process.env.LLM_BASE_URL,
        },
        openaiCompatible: {
          apiKey:
            process.env.OPENAI_COMPATIBLE_API_KEY ?? process.env.OPENAI_API_KEY,
          baseUrl:
            process.env.OPENAI_COMPATIBLE_BASE_URL ??
            process.env.OPENAI_BASE_URL ??
            process.env.LLM_BASE_URL,
        },
      },
      summarizer: readSummarizerOptions(),
    });

    return cached;
  }

  /**
   * Reset cached config (for testing).
   */
  export function reset(): void {
    cached = null;
  }
}
