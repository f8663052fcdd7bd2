import { describe, expect, it } from "vitest";
import type { ExplicitReceiver, SyntheticCall } from "../types.js";
import { describeArgument, formatSyntheticCall, resolveThis } from "../call-construction.js";
import { createReceiverResolver } from "../resolver.js";
import { createWorld, stackOf, type Entry } from "./helpers/world.js";

const setup = () => {
  const world = createWorld();
  const widget = world.type("Widget");
  const session = world.type("Session");
  const workspace = world.type("Workspace", [widget, session]);
  world.declare({ name: "render", receivers: [widget, session] });
  world.declare({ name: "mount", receivers: [widget, session], mode: "unordered" });
  const resolver = createReceiverResolver<string>({
    predicate: world.hierarchy,
    declarations: world.declarations,
    diagnostics: world.diagnostics,
  });

  const callOf = (
    name: string,
    entries: readonly Entry[],
    receiver?: ExplicitReceiver<string>
  ): SyntheticCall<string> => {
    const stack = stackOf(entries);
    const verdict = resolver.resolveCall(
      receiver ? { name, stack, receiver } : { name, stack }
    );
    if (verdict.kind !== "resolved") {
      throw new Error(`expected ${name} to resolve, got ${verdict.kind}`);
    }
    return verdict.call;
  };

  return { ...world, widget, session, workspace, resolver, callOf };
};

describe("call construction", () => {
  it("passes one argument per receiver in declared order", () => {
    const world = setup();

    const call = world.callOf("render", [
      { label: "outer", type: world.widget },
      { label: "inner", type: world.session },
    ]);

    expect(call.callee).toBe("render");
    expect(call.arguments.map((arg) => [arg.index, arg.value])).toEqual([
      [0, "outer"],
      [1, "inner"],
    ]);
    expect(formatSyntheticCall(call)).toBe("render(outer, inner)");
  });

  it("uses the last receiver as `this` for ordered declarations", () => {
    const world = setup();

    const call = world.callOf("render", [
      { label: "outer", type: world.widget },
      { label: "inner", type: world.session },
    ]);

    expect(resolveThis(call)?.value).toBe("inner");
    expect(resolveThis(call, "Widget")?.value).toBe("outer");
    expect(resolveThis(call, "Session")?.value).toBe("inner");
  });

  it("describes an unlabelled explicit receiver", () => {
    const world = setup();

    const call = world.callOf("render", [{ label: "outer", type: world.widget }], {
      type: world.session,
      value: "s",
    });

    expect(call.arguments.map(describeArgument)).toEqual(["outer", "<explicit>"]);
  });

  it("uses the innermost bound context as `this` for unordered declarations", () => {
    const world = setup();

    const call = world.callOf("mount", [
      { label: "user", type: world.session },
      { label: "panel", type: world.widget },
    ]);

    expect(formatSyntheticCall(call)).toBe("mount(panel, user)");
    expect(call.defaultReceiver.index).toBe(0);
    expect(call.defaultReceiver.value).toBe("panel");
  });

  it("breaks depth ties toward the later receiver", () => {
    const world = setup();

    const call = world.callOf("mount", [{ label: "desk", type: world.workspace }]);

    expect(formatSyntheticCall(call)).toBe("mount(desk, desk)");
    expect(call.defaultReceiver.index).toBe(1);
  });

  it("prefers an explicit receiver as `this` for unordered declarations", () => {
    const world = setup();

    const call = world.callOf(
      "mount",
      [
        { label: "panel", type: world.widget },
        { label: "user", type: world.session },
      ],
      { type: world.workspace, value: "desk", label: "desk" }
    );

    expect(formatSyntheticCall(call)).toBe("mount(desk, desk)");
    expect(call.defaultReceiver.source.kind).toBe("explicit");
  });

  it("keys qualified receivers by simple type name", () => {
    const world = setup();
    const { arena, hierarchy } = world;
    const int = world.type("Int");
    hierarchy.declareType({ name: "Box", parameters: [arena.freshTypeParam("T")] });
    const u = arena.freshTypeParam("U");
    const uRef = arena.internTypeParamRef(u);
    world.declare({
      name: "put",
      receivers: [hierarchy.instantiate("Box", [uRef]), uRef],
      typeParameters: [u],
    });

    const call = world.callOf(
      "put",
      [{ label: "box", type: hierarchy.instantiate("Box", [int]) }],
      { type: int, value: "n", label: "n" }
    );

    expect([...call.qualifiedReceivers.keys()]).toEqual(["Box", "U"]);
    expect(call.qualifiedReceivers.get("U")?.declared).toBe(int);
  });

  it("reports a qualified `this` that names no receiver", () => {
    const world = setup();
    const call = world.callOf("render", [
      { label: "outer", type: world.widget },
      { label: "inner", type: world.session },
    ]);
    const span = { file: "main.mr", start: 12, end: 23 };

    expect(world.resolver.qualifiedThis(call, "Session")?.value).toBe("inner");
    expect(world.resolver.qualifiedThis(call)?.value).toBe("inner");
    expect(world.resolver.qualifiedThis(call, "Canvas", span)).toBeUndefined();
    expect(world.diagnostics.diagnostics).toEqual([
      expect.objectContaining({
        code: "RS0004",
        span,
        message:
          "this@Canvas does not name a receiver of this call (available: Widget, Session)",
      }),
    ]);
  });
});
