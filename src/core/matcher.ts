import type { WorkerContext } from "./pool.js";
import type { TextSpan } from "./textSpan.js";

/**
 * Finds every occurrence of one phrase in a span.
 *
 * Contract notes:
 * - returns ascending start offsets relative to `span`, possibly empty
 * - `parallel` only allows the matcher to fork on `ctx.scheduler`;
 *   callers must not depend on whether it does
 */
export interface PhraseMatcher {
  findMatches(span: TextSpan, phrase: string, parallel: boolean, ctx: WorkerContext): Promise<number[]>;
}
