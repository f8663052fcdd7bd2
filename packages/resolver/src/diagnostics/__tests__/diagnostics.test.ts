import { describe, expect, it } from "vitest";
import {
  createDiagnostic,
  DiagnosticEmitter,
  DiagnosticError,
  diagnosticCodes,
  diagnosticFromCode,
  formatDiagnostic,
  normalizeSpan,
  raiseInvariant,
  reportDiagnostic,
  ResolverInvariantError,
} from "../index.js";

const span = { file: "decls.mr", start: 3, end: 9 };

describe("diagnostics", () => {
  it("builds registered diagnostics with their severity and phase", () => {
    const diagnostic = diagnosticFromCode({
      code: "DC0003",
      params: { kind: "empty-receiver-list", declaration: "().noop" },
      span,
    });

    expect(diagnostic).toEqual({
      code: "DC0003",
      message: "declaration ().noop must declare at least one receiver",
      span,
      related: undefined,
      severity: "error",
      phase: "declaration",
      hints: undefined,
    });
    expect(formatDiagnostic(diagnostic)).toBe(
      "decls.mr:3-9 ERROR [declaration] DC0003: declaration ().noop must declare at least one receiver"
    );
  });

  it("lists every registered code", () => {
    expect(diagnosticCodes()).toEqual([
      "DC0001",
      "DC0002",
      "DC0003",
      "DC0004",
      "RS0001",
      "RS0002",
      "RS0003",
      "RS0004",
      "IN0001",
      "IN0002",
    ]);
  });

  it("infers the phase of ad hoc diagnostics from the code prefix", () => {
    expect(
      createDiagnostic({ code: "RS9000", message: "custom", span }).phase
    ).toBe("resolution");
    expect(createDiagnostic({ code: "XX0001", message: "custom", span }).phase).toBe(
      undefined
    );
  });

  it("collects reported diagnostics without throwing", () => {
    const emitter = new DiagnosticEmitter();

    const diagnostic = reportDiagnostic({
      ctx: { diagnostics: emitter },
      code: "RS0003",
      params: { kind: "unknown-callable", name: "draw" },
      span,
    });

    expect(emitter.diagnostics).toEqual([diagnostic]);
    expect(emitter.hasErrors()).toBe(true);
  });

  it("does not count notes as errors", () => {
    const emitter = new DiagnosticEmitter();
    emitter.report({ code: "RS0002", message: "note", span, severity: "note" });
    expect(emitter.hasErrors()).toBe(false);
  });

  it("throws invariant violations as errors", () => {
    const attempt = () =>
      raiseInvariant({
        code: "IN0002",
        params: { kind: "stack-discipline-violation", reason: "unbalanced scope" },
        span,
      });

    expect(attempt).toThrow(ResolverInvariantError);
    expect(attempt).toThrow(DiagnosticError);
    expect(attempt).toThrow(
      "decls.mr:3-9 ERROR [internal] IN0002: receiver stack discipline violated: unbalanced scope"
    );
  });

  it("falls back to the first available span", () => {
    expect(normalizeSpan(undefined, span)).toBe(span);
    expect(normalizeSpan()).toEqual({ file: "<unknown>", start: 0, end: 0 });
  });
});
