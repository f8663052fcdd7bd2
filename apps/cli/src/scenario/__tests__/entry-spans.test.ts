import { describe, expect, it } from "vitest";
import { labelEntries, locateEntries } from "../entry-spans.js";

describe("locateEntries", () => {
  it("finds the object entries of each top-level array", () => {
    const source = `{"calls": [{"name": "a"}, {"name": "b", "scopes": [{"label": "x"}]}], "types": [{"name": "Int"}]}`;

    const spans = locateEntries(source, "scenario.json");

    expect(
      spans.get("calls")?.map((span) => source.slice(span.start, span.end))
    ).toEqual(['{"name": "a"}', '{"name": "b", "scopes": [{"label": "x"}]}']);
    expect(spans.get("calls")?.[0]).toEqual({ file: "scenario.json", start: 11, end: 24 });
    expect(spans.get("types")?.map((span) => source.slice(span.start, span.end))).toEqual([
      '{"name": "Int"}',
    ]);
  });

  it("ignores braces and quotes inside strings", () => {
    const source = `{"calls": [{"name": "a{\\"}"}, {"name": "b"}]}`;

    const spans = locateEntries(source, "scenario.json");

    expect(
      spans.get("calls")?.map((span) => source.slice(span.start, span.end))
    ).toEqual(['{"name": "a{\\"}"}', '{"name": "b"}']);
  });

  it("skips arrays of non-objects", () => {
    const spans = locateEntries(`{"globals": ["x", 1]}`, "scenario.json");
    expect(spans.get("globals")).toBeUndefined();
  });

  it("names the entry a span covers", () => {
    const source = `{"types": [{"name": "Int"}], "calls": [{"name": "a"}, {"name": "b"}]}`;
    const label = labelEntries(locateEntries(source, "scenario.json"));
    const start = source.indexOf('{"name": "b"}');

    expect(label({ file: "scenario.json", start, end: start + 13 })).toBe("calls[1]");
    expect(label({ file: "scenario.json", start, end: start + 12 })).toBeUndefined();
    expect(label({ file: "other.json", start, end: start + 13 })).toBeUndefined();
  });
});
