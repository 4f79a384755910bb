/**
 * Provider integration for condense.
 * Supports Anthropic, OpenAI, and OpenAI-compatible endpoints (local
 * inference servers included).
 */

import { createAnthropic } from "@ai-sdk/anthropic"
import { createOpenAI } from "@ai-sdk/openai"
import {
  APICallError,
  generateText,
  type FinishReason,
  type LanguageModel,
  type LanguageModelUsage,
} from "ai"
import { Config } from "../config"
import { CapabilityUnavailableError, errorMessage } from "../summarize/errors"
import type { GenerationParams } from "../summarize/options"
import type { GenerateCallOptions, ModelCapability, Prompt } from "../summarize/types"
import { Log } from "../util/log"
import { estimateTokens } from "../util/tokens"

export namespace Provider {
  const log = Log.create({ service: "provider" })

  type ProviderFactory = (modelId: string) => LanguageModel
  type ProviderCreator = (config: Config.Config) => ProviderFactory

  const providerRegistry: Record<Config.ProviderName, ProviderCreator> = {
    anthropic: createAnthropicProvider,
    openai: createOpenAIProvider,
    "openai-compatible": createOpenAICompatibleProvider,
  }

  /** Status codes meaning the model will not answer however often we ask */
  const UNAVAILABLE_STATUS = new Set([401, 403, 404])

  /**
   * Create an Anthropic provider instance.
   */
  function createAnthropicProvider(config: Config.Config): ProviderFactory {
    const providerConfig = config.providers.anthropic
    if (!providerConfig.apiKey) {
      throw new Error(
        "ANTHROPIC_API_KEY environment variable is required.\n" +
          "Set it with: export ANTHROPIC_API_KEY=<your key>",
      )
    }
    return createAnthropic({
      apiKey: providerConfig.apiKey,
      baseURL: providerConfig.baseUrl,
    })
  }

  /**
   * Create an OpenAI provider instance.
   */
  function createOpenAIProvider(config: Config.Config): ProviderFactory {
    const providerConfig = config.providers.openai
    if (!providerConfig.apiKey) {
      throw new Error(
        "OPENAI_API_KEY environment variable is required.\n" +
          "Set it with: export OPENAI_API_KEY=<your key>",
      )
    }
    return createOpenAI({
      apiKey: providerConfig.apiKey,
      baseURL: providerConfig.baseUrl,
    })
  }

  /**
   * Create an OpenAI-compatible provider instance (local or alternative hosts).
   */
  function createOpenAICompatibleProvider(config: Config.Config): ProviderFactory {
    const providerConfig = config.providers.openaiCompatible
    if (!providerConfig.baseUrl) {
      throw new Error(
        "OpenAI-compatible base URL is required via " +
          "OPENAI_COMPATIBLE_BASE_URL/OPENAI_BASE_URL/LLM_BASE_URL.\n" +
          "Set it with: export OPENAI_COMPATIBLE_BASE_URL=http://localhost:8000/v1",
      )
    }

    const apiKey = providerConfig.apiKey ?? "no-key"
    if (apiKey === "no-key") {
      log.warn("openai-compatible provider missing API key; continuing without one")
    }

    return createOpenAI({
      apiKey,
      baseURL: providerConfig.baseUrl,
      compatibility: "compatible",
    })
  }

  /**
   * Resolve the configured model.
   */
  export function getModel(config: Config.Config = Config.get()): LanguageModel {
    if (!config.model) {
      throw new Error(
        `Missing model ID for provider "${config.provider}".\n` +
          "Set it with: export CONDENSE_MODEL=<model id>",
      )
    }
    const factory = providerRegistry[config.provider](config)
    log.debug("resolved model", { provider: config.provider, model: config.model })
    return factory(config.model)
  }

  /**
   * Options for text generation
   */
  export interface GenerateOptions {
    model: LanguageModel
    system?: string
    prompt: string
    maxTokens?: number
    temperature?: number
    topK?: number
    topP?: number
    frequencyPenalty?: number
    abortSignal?: AbortSignal
  }

  export interface GenerateResult {
    text: string
    finishReason: FinishReason
    usage: LanguageModelUsage
  }

  /**
   * Generate text without streaming. Retries are left to the caller.
   */
  export async function generate(options: GenerateOptions): Promise<GenerateResult> {
    log.debug("generate", {
      model: options.model.modelId,
      promptChars: options.prompt.length,
      maxTokens: options.maxTokens,
    })

    const result = await generateText({
      model: options.model,
      system: options.system,
      prompt: options.prompt,
      maxTokens: options.maxTokens,
      temperature: options.temperature,
      topK: options.topK,
      topP: options.topP,
      frequencyPenalty: options.frequencyPenalty,
      abortSignal: options.abortSignal,
      maxRetries: 0,
    })

    log.debug("generated", {
      finishReason: result.finishReason,
      promptTokens: result.usage.promptTokens,
      completionTokens: result.usage.completionTokens,
    })

    return {
      text: result.text,
      finishReason: result.finishReason,
      usage: result.usage,
    }
  }

  /**
   * Whether a failed call means the model cannot be reached at all:
   * no HTTP response, bad credentials, or an unknown model.
   */
  export function isUnavailable(error: unknown): boolean {
    if (!APICallError.isInstance(error)) return false
    return error.statusCode === undefined || UNAVAILABLE_STATUS.has(error.statusCode)
  }

  /**
   * Map the engine's generation parameters onto AI SDK call settings.
   * The SDK has no repetition penalty; the additive frequency penalty is the
   * closest setting providers accept.
   */
  export function callSettings(
    params: GenerationParams,
  ): Pick<GenerateOptions, "maxTokens" | "temperature" | "topK" | "topP" | "frequencyPenalty"> {
    return {
      maxTokens: params.maxNewTokens,
      temperature: params.temperature,
      topK: params.topK,
      topP: params.topP,
      frequencyPenalty: params.repetitionPenalty - 1,
    }
  }

  /**
   * Expose a language model as the engine's model capability.
   * Token counts use the character estimate.
   */
  export function capability(model: LanguageModel): ModelCapability {
    return {
      tokenCount: estimateTokens,
      async generate(prompt: Prompt, params: GenerationParams, options?: GenerateCallOptions) {
        try {
          const result = await generate({
            model,
            system: prompt.system,
            prompt: prompt.user,
            ...callSettings(params),
            abortSignal: options?.signal,
          })
          return result.text
        } catch (error) {
          if (isUnavailable(error)) {
            throw new CapabilityUnavailableError(
              `${model.provider}/${model.modelId}: ${errorMessage(error)}`,
              { cause: error },
            )
          }
          throw error
        }
      },
    }
  }
}
