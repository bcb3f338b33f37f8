#!/usr/bin/env node

import { readFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";

import { loadConfig } from "./config.js";
import { ForkJoinPool, KmpPhraseMatcher, PhraseSearcher, type SplitObserver } from "./core/impl/index.js";
import { formatMatchResult } from "./core/types.js";
import { createLogger, errorMeta, type Logger } from "./logger.js";

export interface CliOptions {
  textFile?: string;
  phrasesFile?: string;
  parallelSearching?: boolean;
  parallelPhrases?: boolean;
  parallelism?: number;
  json: boolean;
  help: boolean;
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
  logger: Logger;
}

const USAGE = [
  "Usage: phrase-search --text <file> --phrases <file> [options]",
  "",
  "Options:",
  "  --sequential-phrases     scan phrases one by one instead of splitting the list",
  "  --sequential-searching   scan each phrase in one pass instead of in chunks",
  "  --parallelism <n>        worker slots in the pool",
  "  --json                   print results as JSON",
  "",
  "The phrases file holds one phrase per line, searched exactly as written",
  "(spaces included); blank lines are ignored.",
  "The first line of the text file is its title and is not searched.",
].join("\n");

export function parseArgs(argv: string[]): CliOptions {
  const opts: CliOptions = { json: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const current = argv[i];
    const next = argv[i + 1];
    if (current === "--text" && next !== undefined) {
      opts.textFile = next;
      i += 1;
    } else if (current === "--phrases" && next !== undefined) {
      opts.phrasesFile = next;
      i += 1;
    } else if (current === "--parallelism" && next !== undefined) {
      const n = Number(next);
      if (!Number.isInteger(n) || n < 1) {
        throw new Error(`--parallelism must be a positive integer, got "${next}"`);
      }
      opts.parallelism = n;
      i += 1;
    } else if (current === "--sequential-phrases") {
      opts.parallelPhrases = false;
    } else if (current === "--sequential-searching") {
      opts.parallelSearching = false;
    } else if (current === "--json") {
      opts.json = true;
    } else if (current === "--help" || current === "-h") {
      opts.help = true;
    } else {
      throw new Error(`unknown argument "${current ?? ""}"`);
    }
  }

  return opts;
}

/** One phrase per line, kept verbatim; whitespace-only lines are dropped. */
export function parsePhraseList(raw: string): string[] {
  return raw.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

/** Returns the process exit code. */
export async function runCli(argv: string[], io: CliIo): Promise<number> {
  let opts: CliOptions;
  try {
    opts = parseArgs(argv);
  } catch (e) {
    io.err(e instanceof Error ? e.message : String(e));
    io.err(USAGE);
    return 1;
  }

  if (opts.help) {
    io.out(USAGE);
    return 0;
  }
  if (!opts.textFile || !opts.phrasesFile) {
    io.err("both --text and --phrases are required");
    io.err(USAGE);
    return 1;
  }

  const config = loadConfig();
  const text = await readFile(opts.textFile, "utf8");
  const phrases = parsePhraseList(await readFile(opts.phrasesFile, "utf8"));
  if (phrases.length === 0) {
    io.err(`no phrases in ${opts.phrasesFile}`);
    return 1;
  }

  const searcher = new PhraseSearcher({
    scheduler: new ForkJoinPool({ parallelism: opts.parallelism ?? config.search.parallelism }),
    matcher: new KmpPhraseMatcher({ minChunkLength: config.search.minChunkLength }),
  });
  const flags = {
    parallelSearching: opts.parallelSearching ?? config.search.parallelSearching,
    parallelPhrases: opts.parallelPhrases ?? config.search.parallelPhrases,
  };

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

  const started = Date.now();
  const results = await searcher.search(text, phrases, flags, observer);
  const tookMs = Date.now() - started;

  if (opts.json) {
    io.out(JSON.stringify(results, null, 2));
  } else {
    for (const r of results) io.out(formatMatchResult(r));
  }
  io.logger.info("search completed", { phrases: phrases.length, matched: results.length, forks, leaves, ...flags, tookMs });
  return 0;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: true });
  const io: CliIo = {
    out: (line) => process.stdout.write(`${line}\n`),
    err: (line) => process.stderr.write(`${line}\n`),
    logger,
  };

  runCli(process.argv.slice(2), io).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      logger.error("phrase search failed", { error: errorMeta(error) });
      process.exitCode = 1;
    },
  );
}
