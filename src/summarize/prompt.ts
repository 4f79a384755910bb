import type { Prompt } from "./types"

/** Joins partial summaries before consolidation */
export const SUMMARY_DELIMITER = "\n\n"

const DIRECT_ROLE = "You are an assistant that summarizes texts clearly and objectively."
const CHUNK_ROLE = "You summarize excerpts of a longer document clearly and faithfully."
const CONSOLIDATE_ROLE = "You consolidate several partial summaries into a single coherent summary."

function role(base: string, language: string | undefined): string {
  return language ? `${base} Write the summary in ${language}.` : base
}

/**
 * Prompt for a document that fits in one call.
 */
export function buildDirectPrompt(text: string, language?: string): Prompt {
  return {
    system: role(DIRECT_ROLE, language),
    user: `Summarize the following text:\n\n${text}`,
  }
}

/**
 * Prompt for one chunk of an oversized document.
 */
export function buildChunkPrompt(text: string, language?: string): Prompt {
  return {
    system: role(CHUNK_ROLE, language),
    user: `Summarize the following excerpt:\n\n${text}`,
  }
}

/**
 * Prompt merging partial summaries, already joined in document order.
 */
export function buildConsolidationPrompt(combined: string, language?: string): Prompt {
  return {
    system: role(CONSOLIDATE_ROLE, language),
    user: `Consolidate these summaries into one, keeping the order of events:\n\n${combined}`,
  }
}
