import { describe, expect, test } from "vitest"
import { fakeCapability, sentenceParagraph, wordTokens, words } from "../test/fakes"
import { segment, split } from "./splitter"

const byWords = fakeCapability()
const byChars = fakeCapability(undefined, (text) => text.length)

describe("segment", () => {
  test("keeps separators on the preceding piece", () => {
    expect(segment("a\n\nb\n\nc", /\n\n/g)).toEqual(["a\n\n", "b\n\n", "c"])
  })

  test("returns the whole text when nothing matches", () => {
    expect(segment("abc", /\n/g)).toEqual(["abc"])
  })
})

describe("split", () => {
  test("returns no chunks for empty text", () => {
    expect(split(byWords, "", 10)).toEqual({ ok: true, value: [] })
  })

  test("rejects a non-positive budget", () => {
    const result = split(byWords, "a b c", 0)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe("invalid-configuration")
    }
  })

  test("rejects a fractional budget", () => {
    const result = split(byWords, "a b c", 1.5)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe("invalid-configuration")
    }
  })

  test("keeps text that fits as a single chunk", () => {
    expect(split(byWords, "a b c", 3)).toEqual({
      ok: true,
      value: [{ index: 0, text: "a b c", tokenCount: 3 }],
    })
  })

  test("packs whole paragraphs up to the budget", () => {
    const result = split(byWords, "a b c\n\nd e f\n\ng h", 6)
    expect(result).toEqual({
      ok: true,
      value: [
        { index: 0, text: "a b c\n\nd e f\n\n", tokenCount: 6 },
        { index: 1, text: "g h", tokenCount: 2 },
      ],
    })
  })

  test("falls back to sentence boundaries inside a long paragraph", () => {
    const result = split(byWords, "One two three. Four five six. Seven eight.", 4)
    expect(result).toEqual({
      ok: true,
      value: [
        { index: 0, text: "One two three. ", tokenCount: 3 },
        { index: 1, text: "Four five six. ", tokenCount: 3 },
        { index: 2, text: "Seven eight.", tokenCount: 2 },
      ],
    })
  })

  test("fills a chunk with the sentences of the next paragraph", () => {
    const result = split(byWords, "One two.\n\nThree four. Five six. Seven.", 5)
    expect(result).toEqual({
      ok: true,
      value: [
        { index: 0, text: "One two.\n\nThree four. ", tokenCount: 4 },
        { index: 1, text: "Five six. Seven.", tokenCount: 3 },
      ],
    })
  })

  test("ends each chunk at the last sentence break within the budget", () => {
    const text = [sentenceParagraph(1500), sentenceParagraph(1500), sentenceParagraph(1523)].join("\n\n")
    expect(byWords.tokenCount(text)).toBe(45_230)

    const result = split(byWords, text, 28_000)
    expect(result).toEqual({
      ok: true,
      value: [
        {
          index: 0,
          text: `${sentenceParagraph(1500)}\n\n${`${words(10)}. `.repeat(1300)}`,
          tokenCount: 28_000,
        },
        {
          index: 1,
          text: `${sentenceParagraph(200)}\n\n${sentenceParagraph(1523)}`,
          tokenCount: 17_230,
        },
      ],
    })
  })

  test("measures a logarithmic number of prefixes per chunk", () => {
    let measured = 0
    const counting = fakeCapability(undefined, (text) => {
      measured += 1
      return wordTokens(text)
    })
    const text = Array.from({ length: 1000 }, () => "w").join("\n\n")

    const result = split(counting, text, 600)
    expect(result).toEqual({
      ok: true,
      value: [
        { index: 0, text: "w\n\n".repeat(600), tokenCount: 600 },
        { index: 1, text: `${"w\n\n".repeat(399)}w`, tokenCount: 400 },
      ],
    })
    expect(measured).toBeLessThan(100)
  })

  test("hard cuts text with no natural boundary", () => {
    const result = split(byChars, "abcdefghij", 4)
    expect(result).toEqual({
      ok: true,
      value: [
        { index: 0, text: "abcd", tokenCount: 4 },
        { index: 1, text: "efgh", tokenCount: 4 },
        { index: 2, text: "ij", tokenCount: 2 },
      ],
    })
  })

  test("moves a hard cut back to the last space", () => {
    const result = split(byChars, "aaa bbbbbb", 6)
    expect(result).toEqual({
      ok: true,
      value: [
        { index: 0, text: "aaa ", tokenCount: 4 },
        { index: 1, text: "bbbbbb", tokenCount: 6 },
      ],
    })
  })

  test("never splits a surrogate pair", () => {
    const result = split(byChars, "ab😀cd", 3)
    expect(result).toEqual({
      ok: true,
      value: [
        { index: 0, text: "ab", tokenCount: 2 },
        { index: 1, text: "😀c", tokenCount: 3 },
        { index: 2, text: "d", tokenCount: 1 },
      ],
    })
  })

  test("rejects a budget that cannot hold one character", () => {
    const doubled = fakeCapability(undefined, (text) => text.length * 2)
    const result = split(doubled, "abc", 1)
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.kind).toBe("invalid-configuration")
    }
  })

  test("reports a failing tokenizer as unavailable", () => {
    const broken = fakeCapability(undefined, () => {
      throw new Error("tokenizer offline")
    })
    expect(split(broken, "a b c", 2)).toEqual({
      ok: false,
      error: { kind: "capability-unavailable", message: "tokenizer failed: tokenizer offline" },
    })
  })

  describe("on mixed text", () => {
    const paragraphs = Array.from({ length: 40 }, (_, p) => {
      const sentences = Array.from(
        { length: (p % 7) + 1 },
        (_, s) => `Sentence ${s} of paragraph ${p} talks about item ${(p * 31 + s * 17) % 97}.`,
      )
      return sentences.join(p % 3 === 0 ? "\n" : " ")
    })
    const text = paragraphs.join("\n\n") + "\n" + "x".repeat(300)

    test.each([5, 12, 40, 150])("budget %i keeps every chunk within budget", (budget) => {
      const result = split(byWords, text, budget)
      expect(result.ok).toBe(true)
      if (result.ok) {
        for (const chunk of result.value) {
          expect(chunk.tokenCount).toBeLessThanOrEqual(budget)
          expect(byWords.tokenCount(chunk.text)).toBe(chunk.tokenCount)
        }
        expect(result.value.map((chunk) => chunk.text).join("")).toBe(text)
        expect(result.value.map((chunk) => chunk.index)).toEqual(
          result.value.map((_, index) => index),
        )
      }
    })

    test("gives the same boundaries on every run", () => {
      expect(split(byChars, text, 64)).toEqual(split(byChars, text, 64))
    })
  })
})
