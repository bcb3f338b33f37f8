import type { PhraseMatcher } from "../matcher.js";
import type { TaskHandle, WorkerContext } from "../pool.js";
import type { TextSpan } from "../textSpan.js";

export const DEFAULT_MIN_CHUNK_LENGTH = 16 * 1024;

export interface KmpPhraseMatcherOptions {
  /** A span is only chunked when every chunk gets at least this many chars. */
  minChunkLength?: number;
}

/**
 * Knuth-Morris-Pratt phrase matcher. Literal, case-sensitive, reports
 * overlapping occurrences.
 *
 * With `parallel`, the span is cut into up to `parallelism` chunks. Each chunk
 * reads `phrase.length - 1` chars past its end and keeps only matches that
 * start inside it, so boundary matches are found exactly once.
 */
export class KmpPhraseMatcher implements PhraseMatcher {
  private readonly minChunkLength: number;

  constructor(options: KmpPhraseMatcherOptions = {}) {
    const minChunkLength = options.minChunkLength ?? DEFAULT_MIN_CHUNK_LENGTH;
    if (!Number.isInteger(minChunkLength) || minChunkLength < 1) {
      throw new RangeError(`minChunkLength must be a positive integer, got ${minChunkLength}`);
    }
    this.minChunkLength = minChunkLength;
  }

  async findMatches(span: TextSpan, phrase: string, parallel: boolean, ctx: WorkerContext): Promise<number[]> {
    if (phrase.length === 0 || phrase.length > span.length) return [];

    const table = makeKmpTable(phrase);
    const chunks = parallel ? Math.min(ctx.scheduler.parallelism, Math.floor(span.length / this.minChunkLength)) : 1;
    if (chunks < 2) return kmpScan(span, phrase, table, 0, span.length);

    const chunkLength = Math.ceil(span.length / chunks);
    const forked: TaskHandle<number[]>[] = [];
    let from = 0;
    for (; from + chunkLength < span.length; from += chunkLength) {
      const start = from;
      forked.push(ctx.scheduler.fork(async () => kmpScan(span, phrase, table, start, start + chunkLength)));
    }
    const tail = kmpScan(span, phrase, table, from, span.length);

    const positions: number[] = [];
    for (const handle of forked) {
      for (const p of await handle.join(ctx)) positions.push(p);
    }
    for (const p of tail) positions.push(p);
    return positions;
  }
}

/** Failure table with `phrase.length + 1` entries; entry 0 is -1. */
export function makeKmpTable(phrase: string): number[] {
  const table = [-1];
  let cnd = 0;
  for (let pos = 1; pos < phrase.length; pos++, cnd++) {
    if (phrase.charCodeAt(pos) === phrase.charCodeAt(cnd)) {
      table.push(table[cnd]!);
    } else {
      table.push(cnd);
      while (cnd >= 0 && phrase.charCodeAt(pos) !== phrase.charCodeAt(cnd)) {
        cnd = table[cnd]!;
      }
    }
  }
  table.push(cnd);
  return table;
}

/** Start offsets in `[from, to)` of every occurrence of `phrase` in `span`. */
function kmpScan(span: TextSpan, phrase: string, table: number[], from: number, to: number): number[] {
  const limit = Math.min(span.length, to + phrase.length - 1);
  const positions: number[] = [];
  let s = from;
  let k = 0;

  while (s < limit) {
    if (phrase.charCodeAt(k) === span.charCodeAt(s)) {
      s++;
      k++;
      if (k === phrase.length) {
        positions.push(s - k);
        k = table[k]!;
      }
    } else {
      k = table[k]!;
      if (k < 0) {
        s++;
        k++;
      }
    }
  }

  return positions;
}
