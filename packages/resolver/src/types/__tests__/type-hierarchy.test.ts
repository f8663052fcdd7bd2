import { describe, expect, it } from "vitest";
import { createTypeArena } from "../type-arena.js";
import { createTypeHierarchy } from "../type-hierarchy.js";

const setup = () => {
  const arena = createTypeArena();
  const hierarchy = createTypeHierarchy(arena);
  const top = hierarchy.declareType({ name: "Any" });
  const widget = hierarchy.declareType({ name: "Widget", supertypes: [top] });
  const button = hierarchy.declareType({ name: "Button", supertypes: [widget] });
  const int = hierarchy.declareType({ name: "Int", supertypes: [top] });
  const str = hierarchy.declareType({ name: "Str", supertypes: [top] });
  const c = arena.freshTypeParam("T");
  hierarchy.declareType({ name: "Collection", parameters: [c] });
  const l = arena.freshTypeParam("T");
  hierarchy.declareType({
    name: "List",
    parameters: [l],
    supertypes: [hierarchy.instantiate("Collection", [arena.internTypeParamRef(l)])],
  });
  return { arena, hierarchy, top, widget, button, int, str };
};

describe("type arena", () => {
  it("interns structurally equal types", () => {
    const { arena, hierarchy, int } = setup();
    expect(hierarchy.instantiate("List", [int])).toBe(
      arena.internNominal("List", [int])
    );
  });

  it("formats and names types", () => {
    const { arena, hierarchy, int } = setup();
    const nested = hierarchy.instantiate("List", [hierarchy.instantiate("List", [int])]);
    expect(arena.format(nested)).toBe("List<List<Int>>");
    expect(arena.simpleName(nested)).toBe("List");
  });

  it("substitutes type parameters", () => {
    const { arena, hierarchy, int } = setup();
    const e = arena.freshTypeParam("E");
    const listE = hierarchy.instantiate("List", [arena.internTypeParamRef(e)]);

    expect(arena.freeTypeParams(listE)).toEqual(new Set([e]));
    expect(arena.substitute(listE, new Map([[e, int]]))).toBe(
      hierarchy.instantiate("List", [int])
    );
  });

  it("throws for unknown ids", () => {
    const { arena } = setup();
    expect(() => arena.get(999)).toThrow("unknown TypeId 999");
    expect(() => arena.typeParamName(999)).toThrow("unknown TypeParamId 999");
  });
});

describe("type hierarchy", () => {
  it("orders ancestors closest first", () => {
    const { arena, hierarchy, button } = setup();
    expect(hierarchy.ancestors(button).map(arena.format)).toEqual([
      "Button",
      "Widget",
      "Any",
    ]);
  });

  it("checks nominal subtyping", () => {
    const { hierarchy, top, widget, button, int } = setup();
    expect(hierarchy.isSubtype(button, widget)).toBe(true);
    expect(hierarchy.isSubtype(button, top)).toBe(true);
    expect(hierarchy.isSubtype(widget, button)).toBe(false);
    expect(hierarchy.isSubtype(int, widget)).toBe(false);
  });

  it("keeps type arguments invariant", () => {
    const { hierarchy, int, str } = setup();
    const listInt = hierarchy.instantiate("List", [int]);
    expect(hierarchy.isSubtype(listInt, hierarchy.instantiate("Collection", [int]))).toBe(
      true
    );
    expect(hierarchy.isSubtype(listInt, hierarchy.instantiate("Collection", [str]))).toBe(
      false
    );
  });

  it("unifies open receivers through supertypes", () => {
    const { arena, hierarchy, int } = setup();
    const e = arena.freshTypeParam("E");
    const collectionE = hierarchy.instantiate("Collection", [arena.internTypeParamRef(e)]);

    const result = hierarchy.unify(hierarchy.instantiate("List", [int]), collectionE, {
      params: new Set([e]),
      substitution: new Map(),
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.substitution.get(e)).toBe(int);
  });

  it("respects bindings already in the substitution", () => {
    const { arena, hierarchy, int, str } = setup();
    const e = arena.freshTypeParam("E");
    const collectionE = hierarchy.instantiate("Collection", [arena.internTypeParamRef(e)]);

    const result = hierarchy.unify(hierarchy.instantiate("List", [int]), collectionE, {
      params: new Set([e]),
      substitution: new Map([[e, str]]),
    });

    expect(result).toEqual({
      ok: false,
      conflict: {
        actual: hierarchy.instantiate("List", [int]),
        declared: collectionE,
        message: "List<Int> is not a subtype of Collection<Str>",
      },
    });
  });

  it("rejects redeclarations and wrong arity", () => {
    const { hierarchy, int } = setup();
    expect(() => hierarchy.declareType({ name: "Int" })).toThrow(
      "type Int is already declared"
    );
    expect(() => hierarchy.instantiate("List")).toThrow(
      "type List expects 1 type argument(s), received 0"
    );
    expect(() => hierarchy.instantiate("Map", [int])).toThrow("type Map is not declared");
  });

  it("rejects supertypes that use undeclared parameters", () => {
    const { arena, hierarchy } = setup();
    const stray = arena.freshTypeParam("X");
    expect(() =>
      hierarchy.declareType({
        name: "Bag",
        supertypes: [hierarchy.instantiate("Collection", [arena.internTypeParamRef(stray)])],
      })
    ).toThrow("supertype Collection<X> of Bag uses undeclared parameter X");
  });
});
