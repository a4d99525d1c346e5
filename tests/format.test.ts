import { describe, expect, test } from "vitest";
import { buildCumulativeRows, rankWords, totalWords } from "@catfreq/core";
import { formatCumulativeTable, TABLE_HEADER } from "../packages/cli/src/utils/format.js";

describe("formatCumulativeTable", () => {
  test("prints a tab-separated cumulative table", () => {
    const counts = new Map([["model", 3], ["data", 3], ["token", 2]]);
    const rows = buildCumulativeRows(rankWords(counts, { topN: 2 }), totalWords(counts));

    expect(formatCumulativeTable(rows).split("\n")).toEqual([
      "rank\tword\tcount\tcum_count\tcum_pct",
      "1\tdata\t3\t3\t37.5000",
      "2\tmodel\t3\t6\t75.0000",
    ]);
  });

  test("prints only the header when there are no rows", () => {
    expect(formatCumulativeTable([])).toBe(TABLE_HEADER);
  });

  test("rounds percentages to four decimals", () => {
    const rows = buildCumulativeRows([["alpha", 1]], 3);
    expect(formatCumulativeTable(rows).split("\n")[1]).toBe("1\talpha\t1\t1\t33.3333");
  });
});
