import { describe, expect, test } from "vitest"
import { collectingSink, fakeCapability, testOptions } from "../test/fakes"
import { CapabilityUnavailableError } from "./errors"
import type { StageContext } from "./generation"
import { mapChunk, mapChunks } from "./map"
import { buildChunkPrompt } from "./prompt"
import type { Chunk, ModelCapability } from "./types"

function context(capability: ModelCapability, chunkRetries = 1): StageContext {
  return {
    capability,
    options: testOptions({ chunkRetries }),
    sink: collectingSink(),
  }
}

const chunk: Chunk = { index: 3, text: "the quick brown fox", tokenCount: 4 }

describe("mapChunk", () => {
  test("wraps the generated text with the chunk index", async () => {
    const capability = fakeCapability(() => "  a fox jumps \n")
    const result = await mapChunk(context(capability), chunk)
    expect(result).toEqual({
      ok: true,
      value: { sourceChunkIndex: 3, text: "a fox jumps", tokenCount: 3 },
    })
    expect(capability.calls).toHaveLength(1)
    expect(capability.calls[0].prompt).toEqual(buildChunkPrompt("the quick brown fox"))
  })

  test("passes the configured generation parameters through", async () => {
    const capability = fakeCapability()
    const stage: StageContext = {
      capability,
      options: testOptions({ generationParams: { temperature: 0, topK: 5, maxNewTokens: 64 } }),
      sink: collectingSink(),
    }
    await mapChunk(stage, chunk)
    expect(capability.calls[0].params).toEqual({
      temperature: 0,
      topK: 5,
      topP: 0.9,
      repetitionPenalty: 1.1,
      maxNewTokens: 64,
    })
  })

  test("asks for the configured language", async () => {
    const capability = fakeCapability()
    const stage: StageContext = {
      capability,
      options: testOptions({ language: "Portuguese" }),
      sink: collectingSink(),
    }
    await mapChunk(stage, chunk)
    expect(capability.calls[0].prompt.system).toBe(
      "You summarize excerpts of a longer document clearly and faithfully. Write the summary in Portuguese.",
    )
  })

  test("retries once and then succeeds", async () => {
    const capability = fakeCapability((_, call) => {
      if (call === 0) throw new Error("overloaded")
      return "fox summary"
    })
    const stage = context(capability)
    const result = await mapChunk(stage, chunk)
    expect(result.ok).toBe(true)
    expect(capability.calls).toHaveLength(2)
  })

  test("fails with the chunk index once retries run out", async () => {
    const capability = fakeCapability(() => {
      throw new Error("overloaded")
    })
    const sink = collectingSink()
    const result = await mapChunk({ ...context(capability), sink }, chunk)
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "chunk-summarization-failed",
        index: 3,
        round: 0,
        attempts: 2,
        reason: "overloaded",
      },
    })
    expect(sink.events).toEqual([
      { type: "generation-failed", label: "chunk 3", attempt: 1, reason: "overloaded" },
      { type: "generation-failed", label: "chunk 3", attempt: 2, reason: "overloaded" },
    ])
  })

  test("treats output without letters or digits as a failure", async () => {
    const capability = fakeCapability(() => " ... ")
    const result = await mapChunk(context(capability, 0), chunk, 2)
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "chunk-summarization-failed",
        index: 3,
        round: 2,
        attempts: 1,
        reason: "degenerate output",
      },
    })
  })

  test("treats empty output as a failure", async () => {
    const capability = fakeCapability(() => "")
    const result = await mapChunk(context(capability, 0), chunk)
    expect(result).toEqual({
      ok: false,
      error: {
        kind: "chunk-summarization-failed",
        index: 3,
        round: 0,
        attempts: 1,
        reason: "empty output",
      },
    })
  })

  test("does not retry an unreachable model", async () => {
    const capability = fakeCapability(() => {
      throw new CapabilityUnavailableError("connection refused")
    })
    const result = await mapChunk(context(capability, 3), chunk)
    expect(result).toEqual({
      ok: false,
      error: { kind: "capability-unavailable", message: "connection refused" },
    })
    expect(capability.calls).toHaveLength(1)
  })

  test("counts a call past the deadline as a failed attempt", async () => {
    const capability: ModelCapability & { signals: AbortSignal[] } = {
      signals: [],
      tokenCount: (text) => text.length,
      async generate(_prompt, _params, options) {
        if (options?.signal) capability.signals.push(options.signal)
        if (capability.signals.length === 1) {
          return new Promise<string>(() => {})
        }
        return "made it"
      },
    }
    const stage: StageContext = {
      capability,
      options: testOptions({ generationTimeoutMs: 20 }),
      sink: collectingSink(),
    }
    const result = await mapChunk(stage, chunk)
    expect(result).toEqual({
      ok: true,
      value: { sourceChunkIndex: 3, text: "made it", tokenCount: 7 },
    })
    expect(capability.signals).toHaveLength(2)
    expect(capability.signals[0].aborted).toBe(true)
    expect(capability.signals[1].aborted).toBe(false)
  })
})

describe("mapChunks", () => {
  test("summarizes chunks in index order and reports progress", async () => {
    const capability = fakeCapability((prompt) => `about ${prompt.user.split("\n\n")[1]}`)
    const sink = collectingSink()
    const chunks: Chunk[] = [
      { index: 0, text: "first", tokenCount: 1 },
      { index: 1, text: "second", tokenCount: 1 },
    ]
    const result = await mapChunks({ ...context(capability), sink }, chunks)
    expect(result).toEqual({
      ok: true,
      value: [
        { sourceChunkIndex: 0, text: "about first", tokenCount: 2 },
        { sourceChunkIndex: 1, text: "about second", tokenCount: 2 },
      ],
    })
    expect(sink.events).toEqual([
      { type: "chunk-progress", round: 0, index: 0, total: 2 },
      { type: "chunk-progress", round: 0, index: 1, total: 2 },
    ])
  })

  test("stops at the first failing chunk", async () => {
    const capability = fakeCapability(() => {
      throw new Error("down")
    })
    const chunks: Chunk[] = [
      { index: 0, text: "first", tokenCount: 1 },
      { index: 1, text: "second", tokenCount: 1 },
    ]
    const result = await mapChunks(context(capability, 0), chunks)
    expect(result.ok).toBe(false)
    expect(capability.calls).toHaveLength(1)
  })
})
