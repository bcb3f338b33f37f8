export { ForkJoinPool, commonPool, type ForkJoinPoolOptions } from "./forkJoinPool.js";
export { KmpPhraseMatcher, DEFAULT_MIN_CHUNK_LENGTH, makeKmpTable, type KmpPhraseMatcherOptions } from "./kmpPhraseMatcher.js";
export { PhraseSplitTask, type PhraseSplitTaskInit, type SplitObserver } from "./phraseSplitTask.js";
export { PhraseSearcher, search, type SearchOptions, type SearcherDeps } from "./phraseSearcher.js";
