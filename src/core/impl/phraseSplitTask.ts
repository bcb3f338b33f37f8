import type { PhraseMatcher } from "../matcher.js";
import type { WorkerContext } from "../pool.js";
import type { TextSpan } from "../textSpan.js";
import { splitTitle } from "../title.js";
import type { MatchResult, Phrase, PhraseRange, SearchFlags, WorkerId } from "../types.js";

/** Receives the shape of the task tree as it unfolds. */
export interface SplitObserver {
  onFork?(left: PhraseRange): void;
  onLeaf?(range: PhraseRange, workerId: WorkerId): void;
}

export interface PhraseSplitTaskInit extends SearchFlags {
  text: TextSpan;
  phrases: readonly Phrase[];
  matcher: PhraseMatcher;
  observer?: SplitObserver;
}

/**
 * Recursive splitter over a phrase list.
 *
 * Contract notes:
 * - `minSplitSize` is fixed at the root to `floor(phrases.length / 2)` and
 *   inherited unchanged; it is not recomputed per level
 * - a range of fewer than 2 phrases is never split
 * - a split forks the left half, computes the right half in the current
 *   flow, then joins the left; results are merged left before right
 * - every task is a new immutable value; ranges are disjoint and cover the
 *   root range exactly
 */
export class PhraseSplitTask {
  private constructor(
    private readonly init: PhraseSplitTaskInit,
    readonly range: PhraseRange,
    readonly minSplitSize: number
  ) {}

  static root(init: PhraseSplitTaskInit): PhraseSplitTask {
    const count = init.phrases.length;
    return new PhraseSplitTask(init, { start: 0, end: count }, Math.floor(count / 2));
  }

  get size(): number {
    return this.range.end - this.range.start;
  }

  async compute(ctx: WorkerContext): Promise<MatchResult[]> {
    if (this.size < this.minSplitSize || !this.init.parallelPhrases || this.size < 2) {
      return this.computeSequentially(ctx);
    }
    return this.splitPhraseList(Math.floor(this.size / 2), ctx);
  }

  private async computeSequentially(ctx: WorkerContext): Promise<MatchResult[]> {
    const { text, phrases, matcher, parallelSearching, observer } = this.init;
    observer?.onLeaf?.(this.range, ctx.workerId);

    const { title, body } = splitTitle(text);
    const results: MatchResult[] = [];

    for (let i = this.range.start; i < this.range.end; i++) {
      const phrase = phrases[i]!;
      const positions = await matcher.findMatches(body, phrase, parallelSearching, ctx);
      if (positions.length > 0) {
        results.push({ workerId: ctx.workerId, count: positions.length, phrase, title, positions });
      }
    }

    return results;
  }

  private async splitPhraseList(splitPos: number, ctx: WorkerContext): Promise<MatchResult[]> {
    const mid = this.range.start + splitPos;
    const left = this.child({ start: this.range.start, end: mid });
    const right = this.child({ start: mid, end: this.range.end });

    this.init.observer?.onFork?.(left.range);
    const leftTask = ctx.scheduler.fork((leftCtx) => left.compute(leftCtx));

    const rightResult = await right.compute(ctx);
    const leftResult = await leftTask.join(ctx);

    return leftResult.concat(rightResult);
  }

  private child(range: PhraseRange): PhraseSplitTask {
    return new PhraseSplitTask(this.init, range, this.minSplitSize);
  }
}
