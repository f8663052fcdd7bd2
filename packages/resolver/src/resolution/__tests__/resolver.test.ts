import { describe, expect, it } from "vitest";
import type { ResolverOptions } from "../../config.js";
import { createReceiverResolver } from "../resolver.js";
import { createWorld, stackOf } from "./helpers/world.js";

const setup = (options: Partial<ResolverOptions> = {}) => {
  const world = createWorld();
  const a = world.type("A");
  const b = world.type("B");
  const c = world.type("C");
  const widget = world.type("Widget");
  const button = world.type("Button", [widget]);
  const session = world.type("Session");
  const resolver = createReceiverResolver<string>({
    predicate: world.hierarchy,
    declarations: world.declarations,
    diagnostics: world.diagnostics,
    options,
  });
  return { ...world, a, b, c, widget, button, session, resolver };
};

describe("overload resolution", () => {
  it("reports symmetric declarations as ambiguous", () => {
    const world = setup();
    world.declare({ name: "f", receivers: [world.a, world.b], mode: "unordered" });
    world.declare({ name: "f", receivers: [world.b, world.a], mode: "unordered" });
    const stack = stackOf([
      { label: "x", type: world.a },
      { label: "y", type: world.b },
    ]);

    const verdict = world.resolver.resolveCall({ name: "f", stack });

    expect(verdict.kind).toBe("ambiguous");
    if (verdict.kind !== "ambiguous") return;
    expect(verdict.bindings).toHaveLength(2);
    expect(verdict.diagnostic.code).toBe("RS0002");
    expect(verdict.diagnostic.message).toBe(
      "ambiguous call to f; candidates: {A, B}.f, {B, A}.f"
    );
    expect(verdict.diagnostic.related?.map((note) => note.message)).toEqual([
      "competing declaration {A, B}.f",
      "competing declaration {B, A}.f",
    ]);
    expect(world.diagnostics.diagnostics).toEqual([verdict.diagnostic]);
  });

  it("picks the declaration with the more specific receivers", () => {
    const world = setup();
    world.declare({ name: "paint", receivers: [world.widget] });
    const narrow = world.declare({ name: "paint", receivers: [world.button] });
    const stack = stackOf([{ label: "ok", type: world.button }]);

    const verdict = world.resolver.resolveCall({ name: "paint", stack });

    expect(verdict.kind).toBe("resolved");
    if (verdict.kind !== "resolved") return;
    expect(verdict.binding.declaration).toBe(narrow);
    expect(world.diagnostics.diagnostics).toEqual([]);
  });

  it("treats declarations of different arity as incomparable", () => {
    const world = setup();
    world.declare({ name: "h", receivers: [world.a] });
    world.declare({ name: "h", receivers: [world.a, world.b] });
    const stack = stackOf([
      { label: "x", type: world.a },
      { label: "y", type: world.b },
    ]);

    expect(world.resolver.resolveCall({ name: "h", stack }).kind).toBe("ambiguous");
  });

  it("reports a known name with no applicable declaration", () => {
    const world = setup();
    world.declare({ name: "render", receivers: [world.widget, world.session] });
    const span = { file: "main.mr", start: 4, end: 10 };
    const stack = stackOf([
      { label: "user", type: world.session },
      { label: "panel", type: world.widget },
    ]);

    const verdict = world.resolver.resolveCall({ name: "render", stack, span });

    expect(verdict.kind).toBe("not-applicable");
    if (verdict.kind !== "not-applicable") return;
    expect(verdict.diagnostic).toMatchObject({
      code: "RS0001",
      severity: "error",
      phase: "resolution",
      span,
      message:
        "no applicable declaration of render for the receivers in scope (tried: (Widget, Session).render)",
    });
  });

  it("reports an unknown name", () => {
    const world = setup();

    const verdict = world.resolver.resolveCall({ name: "missing", stack: [] });

    expect(verdict.kind).toBe("not-applicable");
    if (verdict.kind !== "not-applicable") return;
    expect(verdict.diagnostic.code).toBe("RS0003");
    expect(verdict.diagnostic.message).toBe("no declaration named missing");
  });

  it("still knows names whose declarations were all rejected", () => {
    const world = setup();
    expect(world.declarations.declare({ name: "dup", receivers: [world.a, world.a] })).toBe(
      undefined
    );

    world.resolver.resolveCall({ name: "dup", stack: [] });

    expect(world.diagnostics.diagnostics.map((diagnostic) => diagnostic.code)).toEqual([
      "DC0001",
      "RS0001",
    ]);
    expect(world.diagnostics.diagnostics[1]?.message).toBe(
      "no applicable declaration of dup for the receivers in scope (tried: none)"
    );
  });

  it("caps the candidates listed in a diagnostic", () => {
    const world = setup({ maxDiagnosticCandidates: 1 });
    [world.a, world.b, world.c].forEach((type) =>
      world.declare({ name: "g", receivers: [type] })
    );

    const verdict = world.resolver.resolveCall({ name: "g", stack: [] });

    expect(verdict.kind).toBe("not-applicable");
    if (verdict.kind !== "not-applicable") return;
    expect(verdict.diagnostic.message).toBe(
      "no applicable declaration of g for the receivers in scope (tried: (A).g, and 2 more)"
    );
  });

  it("keeps resolving after an error", () => {
    const world = setup();
    world.declare({ name: "render", receivers: [world.widget, world.session] });
    const stack = stackOf([
      { label: "panel", type: world.widget },
      { label: "user", type: world.session },
    ]);

    const failed = world.resolver.resolveCall({ name: "missing", stack });
    const resolved = world.resolver.resolveCall({ name: "render", stack });

    expect(failed.kind).toBe("not-applicable");
    expect(resolved.kind).toBe("resolved");
    expect(world.diagnostics.hasErrors()).toBe(true);
    expect(world.diagnostics.diagnostics).toHaveLength(1);
  });

  it("traces candidates and verdicts when enabled", () => {
    const lines: string[] = [];
    const world = setup({ trace: true, traceSink: (line) => lines.push(line) });
    world.declare({ name: "render", receivers: [world.widget, world.session] });
    const stack = stackOf([
      { label: "outer", type: world.widget },
      { label: "inner", type: world.session },
    ]);

    world.resolver.resolveCall({ name: "render", stack });

    expect(lines).toEqual([
      "[resolve] call render with 2 frame(s)",
      "  [resolve] candidate (Widget, Session).render",
      "    [resolve] receiver 1 <- inner: Session",
      "    [resolve] receiver 0 <- outer: Widget",
      "  [resolve] verdict resolved to (Widget, Session).render",
    ]);
  });
});
