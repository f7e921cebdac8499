import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import {
  aggregateBatches,
  flattenValue,
  mergeTables,
  orderColumns,
  parseBatch,
} from "../lib/aggregator";
import { FatalError, InputError } from "../lib/errors";
import { readCsv, tableFromRows } from "../lib/table";
import type { FlatRow } from "../lib/types";
import { makeTempDir } from "./helpers";

describe("flattenValue", () => {
  it("joins scalar lists and serializes nested values", () => {
    expect(flattenValue(["a", "b", null])).toBe("a; b");
    expect(flattenValue([])).toBeNull();
    expect(flattenValue([{ x: 1 }])).toBe('[{"x":1}]');
    expect(flattenValue({ a: 1 })).toBe('{"a":1}');
    expect(flattenValue(3)).toBe(3);
    expect(flattenValue(Number.POSITIVE_INFINITY)).toBeNull();
    expect(flattenValue(undefined)).toBeNull();
  });
});

describe("orderColumns", () => {
  it("puts canonical columns first, in canonical order, then the rest sorted", () => {
    expect(orderColumns(["zeta", "country", "name", "alpha", "source_batch"])).toEqual([
      "name",
      "country",
      "source_batch",
      "alpha",
      "zeta",
    ]);
  });
});

describe("parseBatch", () => {
  it("accepts a bare array or a providers/partners wrapper", () => {
    expect(parseBatch('[{"name":"A"}]', "a.json")).toEqual([{ name: "A" }]);
    expect(parseBatch('{"metadata":{},"providers":[{"name":"B"}]}', "b.json")).toEqual([{ name: "B" }]);
    expect(parseBatch('{"partners":[{"name":"C"}, 5]}', "c.json")).toEqual([{ name: "C" }]);
  });

  it("rejects invalid JSON and unexpected shapes with an input error", () => {
    expect(() => parseBatch("{broken", "bad.json")).toThrow(InputError);
    expect(() => parseBatch('{"rows":[]}', "shape.json")).toThrow(/shape\.json: expected an array/);
  });
});

describe("mergeTables", () => {
  const a = tableFromRows([{ name: "A", country: "US" }]);
  const b = tableFromRows([{ name: "B", rating: 4 }]);
  const c = tableFromRows([{ name: "C", extra: "x" }]);

  it("unions columns and fills gaps with null", () => {
    const merged = mergeTables(a, b);
    expect(merged.columns).toEqual(["name", "country", "rating"]);
    expect(merged.rows).toEqual([
      { name: "A", country: "US", rating: null },
      { name: "B", country: null, rating: 4 },
    ]);
  });

  it("is associative and independent of order up to row order", () => {
    expect(mergeTables(mergeTables(a, b), c)).toEqual(mergeTables(a, mergeTables(b, c)));
    const ab = mergeTables(a, b);
    const ba = mergeTables(b, a);
    expect(ba.columns).toEqual(ab.columns);
    const byName = (x: FlatRow, y: FlatRow) => String(x.name).localeCompare(String(y.name));
    expect([...ba.rows].sort(byName)).toEqual([...ab.rows].sort(byName));
  });
});

describe("aggregateBatches", () => {
  let dir: string;

  beforeEach(() => {
    dir = makeTempDir();
    fs.mkdirSync(path.join(dir, "raw"));
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeBatch(name: string, content: string): string {
    const file = path.join(dir, "raw", name);
    fs.writeFileSync(file, content, "utf-8");
    return file;
  }

  it("merges valid batches, skips a malformed one and writes the CSV", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    writeBatch("fiverr_page_1.json", JSON.stringify([{ name: "One", tags: ["x", "y"] }]));
    writeBatch(
      "fiverr_page_2.json",
      JSON.stringify({ providers: [{ name: "Two", extra: { k: "v" } }, { name: "Three", rating: 4.5 }, "not-an-object"] })
    );
    const broken = writeBatch("fiverr_page_3.json", "not json");

    const result = aggregateBatches({
      pattern: path.join(dir, "raw", "fiverr_page_*.json"),
      keyword: "fiverr",
      outDir: path.join(dir, "processed"),
    });

    expect(result.table.columns).toEqual(["name", "rating", "source_batch", "extra", "tags"]);
    expect(result.table.rows).toEqual([
      { name: "One", rating: null, source_batch: "fiverr_page_1.json", extra: null, tags: "x; y" },
      { name: "Two", rating: null, source_batch: "fiverr_page_2.json", extra: '{"k":"v"}', tags: null },
      { name: "Three", rating: 4.5, source_batch: "fiverr_page_2.json", extra: null, tags: null },
    ]);

    expect(result.skipped).toHaveLength(1);
    expect(result.skipped[0].file).toBe(broken);
    expect(result.skipped[0].reason).toMatch(/^invalid JSON/);
    expect(warn).toHaveBeenCalledWith(expect.stringContaining(`Skipping ${broken}`));
    expect(warn.mock.calls.filter(([message]) => String(message).includes(broken))).toHaveLength(1);

    expect(result.outputPath).toBe(path.join(dir, "processed", "fiverr_providers.csv"));
    const written = readCsv(path.join(dir, "processed", "fiverr_providers.csv"));
    expect(written.columns).toEqual(result.table.columns);
    expect(written.rows).toHaveLength(3);
    expect(written.rows[2].rating).toBe("4.5");
  });

  it("fails when no file matches", () => {
    expect(() => aggregateBatches({ pattern: path.join(dir, "raw", "*.json"), keyword: "none" })).toThrow(FatalError);
  });

  it("fails when no file yields a record", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    writeBatch("empty_page_1.json", "[]");
    writeBatch("empty_page_2.json", "{oops");
    expect(() => aggregateBatches({ pattern: path.join(dir, "raw", "empty_page_*.json"), keyword: "empty" })).toThrow(
      /No valid records/
    );
  });
});
