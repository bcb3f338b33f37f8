export * from "./core/impl/index.js";
export { PreconditionError } from "./core/errors.js";
export type { PhraseMatcher } from "./core/matcher.js";
export type { Task, TaskHandle, TaskScheduler, WorkerContext } from "./core/pool.js";
export { TextSpan } from "./core/textSpan.js";
export { extractTitle, splitTitle, type TitledText } from "./core/title.js";
export { formatMatchResult, type MatchResult, type Phrase, type PhraseRange, type SearchFlags, type WorkerId } from "./core/types.js";
