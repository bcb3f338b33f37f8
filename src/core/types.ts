/** Shared core types used by module contracts. */

export type Phrase = string;

/** Identifier of the pool worker slot that ran a task (diagnostic only). */
export type WorkerId = number;

/** Half-open `[start, end)` range of indices into a phrase list. */
export interface PhraseRange {
  start: number;
  end: number;
}

/** One entry per phrase that matched at least once. */
export interface MatchResult {
  workerId: WorkerId;
  /** Always `positions.length`, never 0. */
  count: number;
  phrase: Phrase;
  /** First line of the searched text, excluded from matching. */
  title: string;
  /**
   * Ascending start offsets into the body (text after the first `\n`),
   * counted in UTF-16 code units like `String.prototype.indexOf`.
   */
  positions: number[];
}

export interface SearchFlags {
  /** Let the matcher parallelize the scan of one phrase. */
  parallelSearching: boolean;
  /** Let the splitter fork across phrases; false scans phrase by phrase. */
  parallelPhrases: boolean;
}

export function formatMatchResult(result: MatchResult): string {
  return `[${result.workerId}] "${result.phrase}" in "${result.title}" x${result.count} at [${result.positions.join(", ")}]`;
}
