import { describe, expect, it } from "vitest";
import { formatCallReport, formatSummary, stringifyOutput } from "../output.js";
import type { CallReport } from "../scenario/run-scenario.js";

const resolved: CallReport = {
  index: 0,
  name: "render",
  verdict: "resolved",
  declaration: "(Widget, Session).render",
  invocation: "render(outer, inner)",
  this: "inner",
  qualifiedThis: new Map([
    ["Widget", "outer"],
    ["Canvas", null],
  ]),
};

const ambiguous: CallReport = {
  index: 1,
  name: "f",
  verdict: "ambiguous",
  qualifiedThis: new Map(),
  diagnostic: "RS0002",
};

describe("cli output", () => {
  it("serializes maps and sets", () => {
    const parsed: unknown = JSON.parse(
      stringifyOutput({ table: new Map([["entry", new Set([1, 2])]]) })
    );
    expect(parsed).toEqual({ table: { entry: [1, 2] } });
  });

  it("serializes circular references", () => {
    const value: { self?: unknown } = {};
    value.self = value;

    expect(stringifyOutput(value)).toContain('"self": "[Circular]"');
  });

  it("serializes shared references without marking them as circular", () => {
    const shared = { count: 2 };

    const parsed: unknown = JSON.parse(stringifyOutput({ first: shared, second: shared }));

    expect(parsed).toEqual({ first: { count: 2 }, second: { count: 2 } });
  });

  it("formats a call with its qualified receivers", () => {
    expect(formatCallReport(resolved)).toEqual([
      "#0 render: resolved to (Widget, Session).render as render(outer, inner), this = inner",
      "  this@Widget = outer",
      "  this@Canvas: no such receiver",
    ]);
    expect(formatCallReport(ambiguous)).toEqual(["#1 f: ambiguous (RS0002)"]);
  });

  it("summarizes verdicts and errors", () => {
    expect(
      formatSummary({
        file: "scenario.json",
        calls: [resolved, ambiguous],
        diagnostics: [
          {
            code: "RS0002",
            message: "ambiguous call to f; candidates: (A).f, (B).f",
            severity: "error",
            span: { file: "scenario.json", start: 0, end: 1 },
          },
        ],
      })
    ).toBe("2 call(s): 1 resolved, 0 not applicable, 1 ambiguous; 1 error(s)");
  });
});
