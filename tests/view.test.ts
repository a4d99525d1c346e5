import { describe, expect, test } from "vitest";
import {
  buildCumulativeRows,
  buildReport,
  buildWordItems,
  rankWords,
  totalWords,
} from "@catfreq/core";

function counts(entries: Record<string, number>): Map<string, number> {
  return new Map(Object.entries(entries));
}

describe("rankWords", () => {
  test("orders by count desc, ties by word asc", () => {
    const rows = rankWords(counts({ the: 0, dog: 5, ant: 3, cat: 5 }), { minCount: 1 });
    expect(rows).toEqual([
      ["cat", 5],
      ["dog", 5],
      ["ant", 3],
    ]);
  });

  test("applies min count before top N", () => {
    const rows = rankWords(counts({ a: 5, b: 4, c: 4, d: 1 }), { minCount: 4, topN: 1 });
    expect(rows).toEqual([["a", 5]]);
  });

  test("top N of zero keeps every row", () => {
    const rows = rankWords(counts({ a: 1, b: 2, c: 3 }), { topN: 0 });
    expect(rows.map(([word]) => word)).toEqual(["c", "b", "a"]);
  });

  test("min count drops everything below the threshold", () => {
    expect(rankWords(counts({ a: 1, b: 2 }), { minCount: 3 })).toEqual([]);
  });
});

describe("buildWordItems", () => {
  test("count metric uses raw counts", () => {
    const rows = rankWords(counts({ cat: 5, dog: 5, ant: 3 }));
    expect(buildWordItems(rows, "count", 13).map(item => item.value)).toEqual([5, 5, 3]);
  });

  test("frequency metric divides by the whole mapping's total", () => {
    const mapping = counts({ a: 3, b: 1 });
    const items = buildWordItems(rankWords(mapping), "frequency", totalWords(mapping));
    expect(items).toEqual([
      { text: "a", value: 0.75 },
      { text: "b", value: 0.25 },
    ]);
  });

  test("frequency is relative to the total, not the truncated rows", () => {
    const mapping = counts({ a: 3, b: 1 });
    const items = buildWordItems(rankWords(mapping, { topN: 1 }), "frequency", totalWords(mapping));
    expect(items).toEqual([{ text: "a", value: 0.75 }]);
  });

  test("a zero total divides by one", () => {
    expect(buildWordItems([["a", 0]], "frequency", 0)).toEqual([{ text: "a", value: 0 }]);
  });
});

describe("buildCumulativeRows", () => {
  test("tracks running count and percent of the grand total", () => {
    const mapping = counts({ a: 5, b: 3, c: 2 });
    const rows = buildCumulativeRows(rankWords(mapping, { topN: 2 }), totalWords(mapping));
    expect(rows).toEqual([
      { rank: 1, word: "a", count: 5, cumulativeCount: 5, cumulativePercent: 50 },
      { rank: 2, word: "b", count: 3, cumulativeCount: 8, cumulativePercent: 80 },
    ]);
  });

  test("percent is zero when the total is zero", () => {
    expect(buildCumulativeRows([["a", 0]], 0)[0].cumulativePercent).toBe(0);
  });
});

describe("buildReport", () => {
  test("ranks, filters and annotates in one step", () => {
    const report = buildReport("Foo", counts({ a: 6, b: 2, c: 2 }), {
      metric: "frequency",
      minCount: 2,
      topN: 2,
    });
    expect(report).toEqual({
      category: "Foo",
      metric: "frequency",
      total_words: 10,
      items: [
        { text: "a", value: 0.6 },
        { text: "b", value: 0.2 },
      ],
    });
  });
});
