#!/usr/bin/env node
/**
 * condense CLI entry point
 *
 * `condense -i notes.txt --report`
 */

import type { LanguageModel } from "ai"
import { parseArgs } from "util"
import { Config } from "../config"
import { Provider } from "../provider"
import { describeError, errorMessage } from "../summarize/errors"
import { Log } from "../util/log"
import { runSummarize, type OutputFormat } from "./run"

interface CliOptions {
  input: string | undefined
  format: OutputFormat
  report: boolean
  verbose: boolean
  help: boolean
}

const Formats: readonly OutputFormat[] = ["text", "json", "markdown"]

function parseFormat(value: string | undefined): OutputFormat {
  const format = Formats.find((candidate) => candidate === value)
  if (!format) {
    throw new Error(`Unknown format "${value}". Use one of: ${Formats.join(", ")}`)
  }
  return format
}

function parseCliArgs(): CliOptions {
  const { values } = parseArgs({
    options: {
      input: { type: "string", short: "i" },
      format: { type: "string", short: "f", default: "text" },
      report: { type: "boolean", short: "r", default: false },
      verbose: { type: "boolean", short: "v", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: false,
  })

  return {
    input: values.input,
    format: parseFormat(values.format),
    report: values.report ?? false,
    verbose: values.verbose ?? false,
    help: values.help ?? false,
  }
}

function printHelp(): void {
  console.log(`
condense - Summarize long text with a fixed-context language model

Usage:
  condense -i <file>                Print a summary of a text file
  condense -i <file> --report       Also write <name>_summary.md beside it
  condense --help                   Show this help

Options:
  -i, --input <path>    UTF-8 text file to summarize (required)
  -f, --format <type>   Output format: text, json or markdown (default: text)
  -r, --report          Write a Markdown report next to the input file
  -v, --verbose         Log every step, including each model call
  -h, --help            Show this help message

Environment:
  CONDENSE_PROVIDER     anthropic, openai or openai-compatible (default: openai)
  CONDENSE_MODEL        Model ID (required)
  CONDENSE_CONTEXT_LIMIT, CONDENSE_CHUNK_BUDGET, CONDENSE_MAX_REDUCTION_DEPTH,
  CONDENSE_CHUNK_RETRIES, CONDENSE_GENERATION_TIMEOUT_MS, CONDENSE_LANGUAGE,
  CONDENSE_TEMPERATURE, CONDENSE_TOP_K, CONDENSE_TOP_P,
  CONDENSE_REPETITION_PENALTY, CONDENSE_MAX_NEW_TOKENS

Examples:
  condense -i paper.txt
  CONDENSE_LANGUAGE=Portuguese condense -i paper.txt --format=markdown
`)
}

function resolveModel(config: Config.Config): LanguageModel | undefined {
  try {
    return Provider.getModel(config)
  } catch (error) {
    const message = errorMessage(error)
    console.error(`Error: ${describeError({ kind: "capability-unavailable", message })}`)
    return undefined
  }
}

async function main(): Promise<void> {
  const options = parseCliArgs()

  if (options.help) {
    printHelp()
    return
  }

  if (!options.input) {
    console.error("Error: --input (-i) is required")
    console.error("Run with --help for usage information")
    process.exitCode = 1
    return
  }

  if (options.verbose) {
    Log.init({ level: "debug" })
  }

  const config = Config.get()
  const model = resolveModel(config)
  if (!model) {
    process.exitCode = 1
    return
  }

  const result = await runSummarize(
    { input: options.input, format: options.format, report: options.report },
    {
      capability: Provider.capability(model),
      modelName: `${config.provider}/${model.modelId}`,
      options: config.summarizer,
    },
  )

  if (!result.ok) {
    console.error(`Error: ${describeError(result.error)}`)
    process.exitCode = 1
  }
}

main().catch((error: unknown) => {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`)
    if (error.stack) {
      Log.create({ service: "cli" }).debug("stack", { stack: error.stack })
    }
  } else {
    console.error("Unknown error:", error)
  }
  process.exitCode = 1
})
