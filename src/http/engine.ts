import {
  ForkJoinPool,
  KmpPhraseMatcher,
  PhraseSearcher,
  type SplitObserver,
} from "../core/impl/index.js";
import type { MatchResult, SearchFlags } from "../core/types.js";

export interface SearchRequest extends SearchFlags {
  text: string;
  phrases: string[];
}

export interface SearchStats {
  phrases: number;
  matched: number;
  /** Left halves forked by the splitter. */
  forks: number;
  /** Tasks that scanned their phrases sequentially. */
  leaves: number;
}

export interface SearchResponse {
  results: MatchResult[];
  stats: SearchStats;
}

export interface Engine {
  readonly parallelism: number;
  search(req: SearchRequest): Promise<SearchResponse>;
}

export interface EngineOptions {
  parallelism?: number;
  minChunkLength?: number;
}

export function createPhraseSearchEngine(opts: EngineOptions = {}): Engine {
  const searcher = new PhraseSearcher({
    scheduler: new ForkJoinPool({ parallelism: opts.parallelism }),
    matcher: new KmpPhraseMatcher({ minChunkLength: opts.minChunkLength }),
  });

  return {
    get parallelism() {
      return searcher.parallelism;
    },
    async search(req) {
      let forks = 0;
      let leaves = 0;
      const observer: SplitObserver = {
        onFork() {
          forks++;
        },
        onLeaf() {
          leaves++;
        },
      };

      const results = await searcher.search(req.text, req.phrases, req, observer);
      return {
        results,
        stats: { phrases: req.phrases.length, matched: results.length, forks, leaves },
      };
    },
  };
}
