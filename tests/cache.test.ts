import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdtempSync, readdirSync, readFileSync, rmSync, writeFileSync, mkdirSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FileFrequencyCache } from "@catfreq/core";

let cacheDir = "";
let cache: FileFrequencyCache;

beforeEach(() => {
  cacheDir = join(mkdtempSync(join(tmpdir(), "catfreq-cache-")), "cache");
  cache = new FileFrequencyCache(cacheDir);
});

afterEach(() => {
  rmSync(join(cacheDir, ".."), { recursive: true, force: true });
});

function writeRaw(category: string, content: string): void {
  mkdirSync(cacheDir, { recursive: true });
  writeFileSync(cache.pathFor(category), content, "utf8");
}

describe("FileFrequencyCache", () => {
  test("returns null when nothing is cached", () => {
    expect(cache.load("Foo")).toBeNull();
  });

  test("round-trips counts", () => {
    const counts = new Map([["cat", 5], ["dog", 2]]);
    cache.save("Foo", counts);
    expect(cache.load("Foo")).toEqual(counts);
  });

  test("prefixed and bare names share a record", () => {
    cache.save("Category:Foo", new Map([["cat", 1]]));
    expect(cache.load("Foo")).toEqual(new Map([["cat", 1]]));
  });

  test("writes the record layout and leaves no temp file", () => {
    cache.save("Category:Machine learning", new Map([["model", 3], ["data", 4]]));

    const filepath = join(cacheDir, "category_Machine_learning.json");
    expect(cache.pathFor("Machine learning")).toBe(filepath);

    const record = JSON.parse(readFileSync(filepath, "utf8"));
    expect(record.category).toBe("Machine learning");
    expect(record.total_words).toBe(7);
    expect(record.counts).toEqual({ model: 3, data: 4 });
    expect(typeof record.created_at).toBe("number");

    expect(readdirSync(cacheDir)).toEqual(["category_Machine_learning.json"]);
  });

  test("a temp path left by another writer does not block saving", () => {
    mkdirSync(join(cacheDir, "category_Foo.json.tmp"), { recursive: true });

    cache.save("Foo", new Map([["cat", 1]]));

    expect(cache.load("Foo")).toEqual(new Map([["cat", 1]]));
    expect(readdirSync(cacheDir).sort()).toEqual(["category_Foo.json", "category_Foo.json.tmp"]);
  });

  test("back-to-back writers each land a complete record", () => {
    const other = new FileFrequencyCache(cacheDir);
    cache.save("Race", new Map([["first", 1]]));
    other.save("Race", new Map([["second", 2]]));

    expect(cache.load("Race")).toEqual(new Map([["second", 2]]));
    expect(readdirSync(cacheDir)).toEqual(["category_Race.json"]);
  });

  test("a failed write leaves no temp file behind", () => {
    mkdirSync(join(cacheDir, "category_Foo.json"), { recursive: true });

    expect(() => cache.save("Foo", new Map([["cat", 1]]))).toThrow();
    expect(readdirSync(cacheDir)).toEqual(["category_Foo.json"]);
  });

  test("overwrites the record wholesale", () => {
    cache.save("Foo", new Map([["old", 1]]));
    cache.save("Foo", new Map([["new", 2]]));
    expect(cache.load("Foo")).toEqual(new Map([["new", 2]]));
  });

  test("treats invalid JSON as a miss", () => {
    writeRaw("Foo", "{not json");
    expect(cache.load("Foo")).toBeNull();
  });

  test("treats a record without counts as a miss", () => {
    writeRaw("Foo", JSON.stringify({ category: "Foo", counts: [1, 2] }));
    expect(cache.load("Foo")).toBeNull();
  });

  test("skips entries that are not integer counts", () => {
    writeRaw("Foo", JSON.stringify({ counts: { cat: 2, dog: "3", eel: 1.5 } }));
    expect(cache.load("Foo")).toEqual(new Map([["cat", 2]]));
  });

  test("remove deletes the record", () => {
    cache.save("Foo", new Map([["cat", 1]]));
    expect(cache.remove("Foo")).toBe(true);
    expect(existsSync(cache.pathFor("Foo"))).toBe(false);
    expect(cache.remove("Foo")).toBe(false);
  });
});
