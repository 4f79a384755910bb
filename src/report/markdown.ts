/**
 * Markdown report written next to a summarized file.
 */

import path from "node:path"
import type { FinalSummary } from "../summarize/types"

export interface ReportInput {
  /** Path of the summarized file, as given by the user */
  file: string
  characters: number
  tokenCount: number
  model: string
  summary: FinalSummary
}

export function buildReport(input: ReportInput): string {
  const lines = [
    "## Document",
    `- **File**: ${path.basename(input.file)}`,
    `- **Characters**: ${input.characters}`,
    `- **Estimated tokens**: ${input.tokenCount}`,
    `- **Chunks summarized**: ${input.summary.sourceChunkCount}`,
    `- **Model**: ${input.model}`,
    "",
    "### Summary",
    input.summary.text.trim(),
    "",
  ]
  return lines.join("\n")
}

/**
 * `docs/paper.txt` -> `docs/paper_summary.md`
 */
export function reportPath(file: string): string {
  const { dir, name } = path.parse(file)
  return path.join(dir || ".", `${name}_summary.md`)
}
