import { PreconditionError } from "../errors.js";
import type { PhraseMatcher } from "../matcher.js";
import type { TaskScheduler } from "../pool.js";
import { TextSpan } from "../textSpan.js";
import type { MatchResult, SearchFlags } from "../types.js";
import { commonPool } from "./forkJoinPool.js";
import { KmpPhraseMatcher } from "./kmpPhraseMatcher.js";
import { PhraseSplitTask, type SplitObserver } from "./phraseSplitTask.js";

export interface SearchOptions {
  /** Defaults to the process-wide pool. */
  scheduler?: TaskScheduler;
  matcher?: PhraseMatcher;
  observer?: SplitObserver;
}

export interface SearcherDeps {
  scheduler: TaskScheduler;
  matcher: PhraseMatcher;
}

/** Runs phrase searches on one scheduler with one matcher. */
export class PhraseSearcher {
  constructor(private readonly deps: SearcherDeps) {}

  get parallelism(): number {
    return this.deps.scheduler.parallelism;
  }

  async search(text: string, phrases: readonly string[], flags: SearchFlags, observer?: SplitObserver): Promise<MatchResult[]> {
    assertSearchInput(text, phrases);

    const root = PhraseSplitTask.root({
      text: TextSpan.of(text),
      phrases,
      matcher: this.deps.matcher,
      parallelSearching: flags.parallelSearching,
      parallelPhrases: flags.parallelPhrases,
      observer,
    });

    return this.deps.scheduler.invoke((ctx) => root.compute(ctx));
  }
}

/**
 * Finds every phrase that occurs in the body of `text` (everything after the
 * first line). Phrases without a match are left out of the result.
 */
export function search(
  text: string,
  phrases: readonly string[],
  parallelSearching: boolean,
  parallelPhrases: boolean,
  options: SearchOptions = {}
): Promise<MatchResult[]> {
  const searcher = new PhraseSearcher({
    scheduler: options.scheduler ?? commonPool(),
    matcher: options.matcher ?? new KmpPhraseMatcher(),
  });
  return searcher.search(text, phrases, { parallelSearching, parallelPhrases }, options.observer);
}

function assertSearchInput(text: unknown, phrases: unknown): void {
  if (typeof text !== "string") {
    throw new PreconditionError("text must be a string", "text");
  }
  if (!Array.isArray(phrases)) {
    throw new PreconditionError("phrases must be an array", "phrases");
  }
  if (phrases.length === 0) {
    throw new PreconditionError("phrases must contain at least 1 phrase", "phrases");
  }
  const items: readonly unknown[] = phrases;
  const bad = items.findIndex((p) => typeof p !== "string");
  if (bad >= 0) {
    throw new PreconditionError(`phrases[${bad}] must be a string`, `phrases[${bad}]`);
  }
}
