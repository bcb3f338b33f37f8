import { describe, expect, it } from "vitest";
import { PreconditionError } from "../../errors.js";
import type { PhraseMatcher } from "../../matcher.js";
import type { PhraseRange } from "../../types.js";
import { ForkJoinPool } from "../forkJoinPool.js";
import { KmpPhraseMatcher } from "../kmpPhraseMatcher.js";
import { search } from "../phraseSearcher.js";
import type { SplitObserver } from "../phraseSplitTask.js";

const TEXT = [
  "The Tempest",
  "the rain falls on the plain and the rain stays",
  "a storm at sea; the storm passes",
  "rain again",
].join("\n");

const PHRASES = ["rain", "storm", "sun", "the", "plain", "sea", "again", "moon"];

function recorder(): { observer: SplitObserver; forks: PhraseRange[]; leaves: PhraseRange[] } {
  const forks: PhraseRange[] = [];
  const leaves: PhraseRange[] = [];
  return {
    forks,
    leaves,
    observer: {
      onFork: (range) => forks.push(range),
      onLeaf: (range) => leaves.push(range),
    },
  };
}

function byStart(ranges: PhraseRange[]): PhraseRange[] {
  return [...ranges].sort((a, b) => a.start - b.start || a.end - b.end);
}

describe("search", () => {
  it("reports body-relative positions and skips the title line", async () => {
    const results = await search("Title line\nThe cat sat. The cat ran.", ["cat"], true, true);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ phrase: "cat", count: 2, title: "Title line", positions: [4, 17] });
  });

  it("counts positions in UTF-16 code units", async () => {
    const results = await search("T\n\u{1F600} cat", ["cat"], false, false);
    expect(results[0]?.positions).toEqual([3]);
  });

  it("ignores a phrase that only occurs in the title", async () => {
    expect(await search("cat here\nno felines below", ["cat"], true, true)).toEqual([]);
  });

  it("returns an empty sequence when nothing matches", async () => {
    expect(await search("Title\nNo matches here.", ["zzz"], false, false)).toEqual([]);
  });

  it("searches nothing in single-line text", async () => {
    expect(await search("cat cat cat", ["cat"], true, true)).toEqual([]);
  });

  it("keeps only matched phrases, in phrase order", async () => {
    const pool = new ForkJoinPool({ parallelism: 4 });
    const results = await search(TEXT, PHRASES, true, true, { scheduler: pool });
    expect(results.map((r) => [r.phrase, r.count])).toEqual([
      ["rain", 3],
      ["storm", 2],
      ["the", 4],
      ["plain", 1],
      ["sea", 1],
      ["again", 1],
    ]);
    expect(results.every((r) => r.title === "The Tempest")).toBe(true);
    expect(results.every((r) => r.workerId >= 0 && r.workerId < 4)).toBe(true);
  });

  it("yields the same phrases and counts for every flag combination", async () => {
    const scheduler = new ForkJoinPool({ parallelism: 3 });
    const matcher = new KmpPhraseMatcher({ minChunkLength: 8 });
    const run = async (searching: boolean, phrases: boolean) =>
      (await search(TEXT, PHRASES, searching, phrases, { scheduler, matcher })).map((r) => [r.phrase, r.count, r.positions]);

    const expected = await run(false, false);
    expect(expected).toHaveLength(6);
    expect(await run(true, false)).toEqual(expected);
    expect(await run(false, true)).toEqual(expected);
    expect(await run(true, true)).toEqual(expected);
  });

  it("evaluates every phrase exactly once", async () => {
    const seen: string[] = [];
    const kmp = new KmpPhraseMatcher();
    const matcher: PhraseMatcher = {
      findMatches(span, phrase, parallel, ctx) {
        seen.push(phrase);
        return kmp.findMatches(span, phrase, parallel, ctx);
      },
    };
    await search(TEXT, PHRASES, false, true, { matcher });
    expect([...seen].sort()).toEqual([...PHRASES].sort());
  });

  it("passes parallelSearching through to the matcher", async () => {
    const flags: boolean[] = [];
    const matcher: PhraseMatcher = {
      async findMatches(_span, _phrase, parallel) {
        flags.push(parallel);
        return [];
      },
    };
    await search(TEXT, ["a", "b", "c"], true, false, { matcher });
    expect(flags).toEqual([true, true, true]);
  });
});

describe("search preconditions", () => {
  it("rejects an empty phrase list", async () => {
    await expect(search("Title\nbody", [], true, true)).rejects.toBeInstanceOf(PreconditionError);
  });

  it("rejects a non-string phrase", async () => {
    const phrases: unknown = ["ok", 7];
    const outcome = search("Title\nbody", phrases as string[], true, true);
    await expect(outcome).rejects.toThrow("phrases[1] must be a string");
  });

  it("rejects missing text", async () => {
    const text: unknown = undefined;
    await expect(search(text as string, ["a"], true, true)).rejects.toMatchObject({ field: "text" });
  });
});

describe("phrase splitting", () => {
  it("never forks for a single phrase", async () => {
    const { observer, forks, leaves } = recorder();
    await search(TEXT, ["rain"], true, true, { observer });
    expect(forks).toEqual([]);
    expect(leaves).toEqual([{ start: 0, end: 1 }]);
  });

  it("scans the whole list in one leaf when parallelPhrases is off", async () => {
    const { observer, forks, leaves } = recorder();
    await search(TEXT, PHRASES, true, false, { observer });
    expect(forks).toEqual([]);
    expect(leaves).toEqual([{ start: 0, end: 8 }]);
  });

  it("splits two phrases into single-phrase leaves", async () => {
    const { observer, forks, leaves } = recorder();
    await search(TEXT, ["rain", "sun"], false, true, { observer });
    expect(forks).toEqual([{ start: 0, end: 1 }]);
    expect(byStart(leaves)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
    ]);
  });

  it("splits four phrases down to single phrases against the fixed threshold of 2", async () => {
    const { observer, forks, leaves } = recorder();
    await search(TEXT, PHRASES.slice(0, 4), false, true, { observer });
    expect(forks).toHaveLength(3);
    expect(byStart(leaves)).toEqual([
      { start: 0, end: 1 },
      { start: 1, end: 2 },
      { start: 2, end: 3 },
      { start: 3, end: 4 },
    ]);
  });

  it("stops eight phrases at pairs because the threshold stays at 4", async () => {
    const { observer, forks, leaves } = recorder();
    await search(TEXT, PHRASES, false, true, { observer });
    expect(byStart(forks)).toEqual([
      { start: 0, end: 2 },
      { start: 0, end: 4 },
      { start: 4, end: 6 },
    ]);
    expect(byStart(leaves)).toEqual([
      { start: 0, end: 2 },
      { start: 2, end: 4 },
      { start: 4, end: 6 },
      { start: 6, end: 8 },
    ]);
  });
});

describe("failure propagation", () => {
  const failing = (bad: string): PhraseMatcher => {
    const kmp = new KmpPhraseMatcher();
    return {
      findMatches(span, phrase, parallel, ctx) {
        if (phrase === bad) return Promise.reject(new Error(`matcher failed on ${phrase}`));
        return kmp.findMatches(span, phrase, parallel, ctx);
      },
    };
  };

  it("surfaces a failure from a forked left half", async () => {
    await expect(search(TEXT, PHRASES, false, true, { matcher: failing("rain") })).rejects.toThrow("matcher failed on rain");
  });

  it("surfaces a failure from the right half", async () => {
    await expect(search(TEXT, PHRASES, false, true, { matcher: failing("moon") })).rejects.toThrow("matcher failed on moon");
  });

  it("surfaces a failure when scanning sequentially", async () => {
    await expect(search(TEXT, PHRASES, false, false, { matcher: failing("sea") })).rejects.toThrow("matcher failed on sea");
  });
});
