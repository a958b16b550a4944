import { filterConfig } from "./config";
import { MalformedInputError } from "./errors";
import { WHITESPACE_SENTINEL } from "./matcher";
import { createWordFilterFromEnv, newWordFilter, WordFilter } from "./wordFilter";

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("WordFilter.check", () => {
  test("should return nothing when no words are banned", () => {
    const filter = new WordFilter();
    expect(filter.check("h3ll0 anything")).toEqual([]);
    expect(filter.check("\ud800")).toEqual([]);
  });

  test("should ignore the case of the message", () => {
    const filter = newWordFilter(false, "hello", "farty");
    const lower = filter.check("h3ll0 pharty").sort();
    const upper = filter.check("H3LL0 PHARTY").sort();
    expect(lower).toEqual(["farty", "hello"]);
    expect(upper).toEqual(lower);
  });

  test("should see through leet speak", () => {
    expect(newWordFilter(false, "hello").check("h3ll0")).toEqual(["hello"]);
    expect(newWordFilter(false, "farty").check("pharty")).toEqual(["farty"]);
    expect(newWordFilter(false, "hello").check("h3||o")).toEqual(["hello"]);
  });

  test("should not resolve leet speak when disabled", () => {
    const filter = newWordFilter(false, "hello");
    filter.disableLeetSpeak = true;
    expect(filter.check("h3ll0")).toEqual([]);
  });

  test("should fold diacritics unless disabled", () => {
    const filter = newWordFilter(false, "cafe");
    expect(filter.check("cafè")).toEqual(["cafe"]);
    filter.disableNormalize = true;
    expect(filter.check("cafè")).toEqual([]);
  });

  test("should catch spaced out words only with spaced bypass", () => {
    expect(newWordFilter(true, "hello").check("h e l l o")).toEqual(["hello"]);
    expect(newWordFilter(false, "hello").check("h e l l o")).toEqual([]);
  });

  // Deleting whitespace runs fuses the neighbouring words; this is the intended policy.
  test("should fuse words separated by a whitespace run", () => {
    const filter = newWordFilter(false, "badword");
    expect(filter.check("bad   word")).toEqual(["badword"]);
    expect(filter.check("bad word")).toEqual([]);
  });

  test("should trip the whitespace sentinel for messages that normalize to nothing", () => {
    const filter = newWordFilter(false, WHITESPACE_SENTINEL);
    expect(filter.check(" \t\u200b ")).toEqual([WHITESPACE_SENTINEL]);
    expect(filter.check("")).toEqual([WHITESPACE_SENTINEL]);
    expect(filter.check("hi")).toEqual([]);
    expect(filter.check("\ufeff")).toEqual([]);
  });

  test("should compare banned words exactly as stored", () => {
    expect(newWordFilter(false, "Hello").check("Hello")).toEqual([]);
  });

  test("should throw on malformed input while folding is enabled", () => {
    const filter = newWordFilter(false, "hello");
    expect(() => filter.check("hello \ud800")).toThrow(MalformedInputError);
    filter.disableNormalize = true;
    expect(filter.check("hello \ud800")).toEqual(["hello"]);
  });
});

describe("WordFilter word list", () => {
  test("should keep added words until they are deleted", () => {
    const filter = newWordFilter(false);
    filter.add("a", "b", "a");
    filter.delete("a", "missing");
    expect(filter.words()).toEqual(["b"]);
  });

  test("should stay consistent under interleaved callers", async () => {
    const filter = newWordFilter(false, "base");
    const checks: string[][] = [];

    const writers = Array.from({ length: 50 }, async (_, i) => {
      await tick();
      filter.add(`word${i}`);
      await tick();
      if (i % 2 === 0) filter.delete(`word${i}`);
    });
    const readers = Array.from({ length: 50 }, async (_, i) => {
      await tick();
      checks.push(filter.check(`word${i} base`));
    });
    await Promise.all([...writers, ...readers]);

    for (const result of checks) {
      expect(result).toContain("base");
      expect(new Set(result).size).toBe(result.length);
    }
    const expected = ["base", ...Array.from({ length: 25 }, (_, i) => `word${i * 2 + 1}`)];
    expect(filter.words().sort()).toEqual(expected.sort());
  });
});

describe("WordFilter.normalize", () => {
  test("should expose the canonical form used for matching", () => {
    expect(new WordFilter().normalize("Ph00  B4R")).toBe("foobar");
  });
});

describe("createWordFilterFromEnv", () => {
  test("should build a filter from environment values", () => {
    const filter = createWordFilterFromEnv({ FILTER_WORDS: "hello", FILTER_SPACED_BYPASS: "true" });
    expect(filter.enableSpacedBypass).toBe(true);
    expect(filter.check("h e l l o")).toEqual(["hello"]);
  });

  test("should default to the configuration resolved at load time", () => {
    const filter = createWordFilterFromEnv();
    expect(filter.enableSpacedBypass).toBe(filterConfig.options.enableSpacedBypass);
    expect(filter.words().sort()).toEqual([...new Set(filterConfig.words)].sort());
  });
});
