/**
 * Token-bounded text splitting.
 *
 * Text is packed greedily into chunks. A segment that does not fit beside the
 * current chunk is broken at the next finer boundary (paragraph, then line,
 * then sentence) so each chunk ends at the last boundary within the budget.
 * Only a single sentence longer than the whole budget gets a hard cut at the
 * longest prefix the budget holds.
 *
 * Chunks never overlap: joining them in order gives back the input exactly.
 * Token counts are assumed to grow with prefix length, which holds for
 * character estimates and for BPE tokenizers alike.
 */

import { countTokens } from "./budget"
import { fail, invalidConfiguration, ok, type Result, type SummaryError } from "./errors"
import type { Chunk, ModelCapability } from "./types"

const SEGMENT_PATTERNS: readonly RegExp[] = [
  // blank line, plus any indentation that follows it
  /\n[ \t]*\n\s*/g,
  /\n/g,
  // sentence terminator, optional closing quote or bracket, trailing space
  /[.!?]+["'”’)\]]*\s+/g,
]

/**
 * Split text after every match of `pattern`, keeping the separators.
 */
export function segment(text: string, pattern: RegExp): string[] {
  const pieces: string[] = []
  let start = 0
  for (const match of text.matchAll(pattern)) {
    const end = (match.index ?? start) + match[0].length
    pieces.push(text.slice(start, end))
    start = end
  }
  if (start < text.length) {
    pieces.push(text.slice(start))
  }
  return pieces
}

class SplitAbort extends Error {
  constructor(readonly error: SummaryError) {
    super(error.kind)
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff
}

class ChunkPacker {
  private readonly chunks: Chunk[] = []
  private current = ""
  private currentTokens = 0

  constructor(
    private readonly capability: ModelCapability,
    private readonly budget: number,
  ) {}

  pack(text: string): Chunk[] {
    this.addAll([text], 0)
    this.flush()
    return this.chunks
  }

  private measure(text: string): number {
    const counted = countTokens(this.capability, text)
    if (!counted.ok) throw new SplitAbort(counted.error)
    return counted.value
  }

  private push(text: string, tokenCount: number): void {
    this.chunks.push({ index: this.chunks.length, text, tokenCount })
  }

  private flush(): void {
    if (this.current.length === 0) return
    this.push(this.current, this.currentTokens)
    this.current = ""
    this.currentTokens = 0
  }

  /**
   * Append consecutive segments while they fit; a segment that does not is
   * broken at the next finer boundary so the chunk fills up to the budget.
   */
  private addAll(pieces: string[], level: number): void {
    let next = 0
    while (next < pieces.length) {
      const fit = this.fitting(pieces, next)
      if (fit.count > 0) {
        this.current += pieces.slice(next, next + fit.count).join("")
        this.currentTokens = fit.tokens
        next += fit.count
        continue
      }
      this.addOverflowing(pieces[next], level)
      next += 1
    }
  }

  /**
   * How many segments from `start` fit beside the current chunk. Galloping
   * then binary search keeps tokenizer calls logarithmic in the segment count.
   */
  private fitting(pieces: string[], start: number): { count: number; tokens: number } {
    const remaining = pieces.length - start
    const measureCount = (count: number) =>
      this.measure(this.current + pieces.slice(start, start + count).join(""))

    let fits = 0
    let fitsTokens = this.currentTokens
    let overflows = remaining + 1
    let probe = 1
    for (;;) {
      const tokens = measureCount(probe)
      if (tokens > this.budget) {
        overflows = probe
        break
      }
      fits = probe
      fitsTokens = tokens
      if (probe === remaining) break
      probe = Math.min(probe * 2, remaining)
    }

    while (overflows - fits > 1) {
      const mid = Math.floor((fits + overflows) / 2)
      const tokens = measureCount(mid)
      if (tokens <= this.budget) {
        fits = mid
        fitsTokens = tokens
      } else {
        overflows = mid
      }
    }
    return { count: fits, tokens: fitsTokens }
  }

  private addOverflowing(unit: string, level: number): void {
    if (level < SEGMENT_PATTERNS.length) {
      const pieces = segment(unit, SEGMENT_PATTERNS[level])
      if (pieces.length > 1) {
        this.addAll(pieces, level + 1)
      } else {
        this.addOverflowing(unit, level + 1)
      }
      return
    }

    // a single sentence: start a fresh chunk, cutting only if it still overflows
    if (this.current.length > 0) {
      this.flush()
      const unitTokens = this.measure(unit)
      if (unitTokens <= this.budget) {
        this.current = unit
        this.currentTokens = unitTokens
        return
      }
    }
    this.hardCut(unit)
  }

  private hardCut(unit: string): void {
    let rest = unit
    for (;;) {
      const tokens = this.measure(rest)
      if (tokens <= this.budget) {
        this.current = rest
        this.currentTokens = tokens
        return
      }
      const cut = this.cutPoint(rest)
      const head = rest.slice(0, cut)
      this.push(head, this.measure(head))
      rest = rest.slice(cut)
    }
  }

  /**
   * Length of the longest prefix that fits, moved back to a word boundary
   * when one lies in the second half of that prefix.
   */
  private cutPoint(text: string): number {
    let fits = 0
    let overflows = text.length
    while (overflows - fits > 1) {
      const mid = Math.floor((fits + overflows) / 2)
      if (this.measure(text.slice(0, mid)) <= this.budget) {
        fits = mid
      } else {
        overflows = mid
      }
    }

    let cut = fits
    if (cut > 0 && isHighSurrogate(text.charCodeAt(cut - 1)) && isLowSurrogate(text.charCodeAt(cut))) {
      cut -= 1
    }
    if (cut === 0) {
      throw new SplitAbort({
        kind: "invalid-configuration",
        message: `Invalid configuration: chunk budget ${this.budget} cannot hold a single character`,
        issues: [`chunkBudget (${this.budget}) cannot hold a single character`],
      })
    }

    for (let i = cut - 1; i >= Math.ceil(cut / 2); i--) {
      if (/\s/.test(text[i])) {
        return i + 1
      }
    }
    return cut
  }
}

/**
 * Partition text into ordered chunks of at most `chunkBudget` tokens.
 */
export function split(
  capability: ModelCapability,
  text: string,
  chunkBudget: number,
): Result<Chunk[]> {
  if (!Number.isInteger(chunkBudget) || chunkBudget <= 0) {
    return invalidConfiguration([`chunkBudget must be a positive integer (got ${chunkBudget})`])
  }
  if (text.length === 0) {
    return ok([])
  }

  try {
    return ok(new ChunkPacker(capability, chunkBudget).pack(text))
  } catch (error) {
    if (error instanceof SplitAbort) return fail(error.error)
    throw error
  }
}
