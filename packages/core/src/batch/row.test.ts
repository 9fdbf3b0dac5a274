import { describe, expect, it } from "vitest";
import { BatchRow } from "./row.js";

describe("BatchRow", () => {
  it("keeps keys in insertion order, integer-like keys included", () => {
    const row = BatchRow.fromEntries([
      ["b", 1],
      ["2", "two"],
      ["1", "one"],
    ]);
    expect(row.keys()).toEqual(["b", "2", "1"]);
    expect(row.toLine()).toBe('{"b":1,"2":"two","1":"one"}');
  });

  it("keeps the position of a key that is set again", () => {
    const row = BatchRow.fromEntries([
      ["a", 1],
      ["b", 2],
    ]);
    row.set("a", "changed");
    expect(row.toLine()).toBe('{"a":"changed","b":2}');
  });

  it("writes raw values verbatim", () => {
    const row = new BatchRow();
    row.setRaw("big", "12345678901234567890");
    row.setRaw("list", "[1, 2]");
    expect(row.getRaw("big")).toBe("12345678901234567890");
    expect(row.toLine()).toBe('{"big":12345678901234567890,"list":[1, 2]}');
  });

  it("decodes values and reports absent keys", () => {
    const row = BatchRow.fromEntries([["info", { status_code: 500 }]]);
    expect(row.get("info")).toEqual({ status_code: 500 });
    expect(row.get("missing")).toBeUndefined();
    expect(row.getRaw("missing")).toBeUndefined();
    expect(row.has("info")).toBe(true);
    expect(row.has("missing")).toBe(false);
  });

  it("escapes keys on output", () => {
    const row = BatchRow.fromEntries([['say "hi"', "x"]]);
    expect(row.toLine()).toBe('{"say \\"hi\\"":"x"}');
  });

  it("clones independently", () => {
    const row = BatchRow.fromEntries([["a", 1]]);
    const copy = row.clone();
    copy.set("b", 2);
    expect(row.toLine()).toBe('{"a":1}');
    expect(copy.toLine()).toBe('{"a":1,"b":2}');
  });
});
