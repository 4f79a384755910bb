/**
 * Summarize one text file and print the result.
 */

import { readFile, writeFile } from "node:fs/promises"
import { buildReport, reportPath } from "../report/markdown"
import type { DiagnosticsSink } from "../summarize/diagnostics"
import { ok, type Result } from "../summarize/errors"
import type { SummarizerOptionsInput } from "../summarize/options"
import { summarize } from "../summarize/orchestrator"
import type { FinalSummary, ModelCapability } from "../summarize/types"
import { Log } from "../util/log"

const log = Log.create({ service: "cli" })

export type OutputFormat = "text" | "json" | "markdown"

export interface RunOptions {
  input: string
  format: OutputFormat
  /** Also write `<name>_summary.md` beside the input */
  report: boolean
}

export interface RunDependencies {
  capability: ModelCapability
  /** Shown in reports, e.g. "openai/gpt-4o-mini" */
  modelName: string
  options?: SummarizerOptionsInput
  sink?: DiagnosticsSink
  stdout?: (text: string) => void
}

export async function runSummarize(
  run: RunOptions,
  dependencies: RunDependencies,
): Promise<Result<FinalSummary>> {
  const stdout = dependencies.stdout ?? ((text: string) => process.stdout.write(text))
  const text = await readFile(run.input, "utf8")
  log.info("summarizing file", { file: run.input, characters: text.length })

  const started = Date.now()
  const result = await summarize(text, {
    capability: dependencies.capability,
    options: dependencies.options,
    sink: dependencies.sink,
  })
  if (!result.ok) return result

  const summary = result.value
  log.info("summary generated", {
    seconds: (Date.now() - started) / 1000,
    chunks: summary.sourceChunkCount,
    characters: summary.text.length,
  })

  const report = buildReport({
    file: run.input,
    characters: text.length,
    tokenCount: dependencies.capability.tokenCount(text),
    model: dependencies.modelName,
    summary,
  })

  switch (run.format) {
    case "text":
      stdout(`${summary.text}\n`)
      break
    case "json":
      stdout(
        `${JSON.stringify({
          file: run.input,
          characters: text.length,
          summary: summary.text,
          sourceChunkCount: summary.sourceChunkCount,
        })}\n`,
      )
      break
    case "markdown":
      stdout(report)
      break
  }

  if (run.report) {
    const target = reportPath(run.input)
    await writeFile(target, report, "utf8")
    log.info("report saved", { file: target })
  }

  return ok(summary)
}
