import type { TypeId, TypeParamId } from "../ids.js";
import type { Substitution, TypeArena } from "./type-arena.js";
import type {
  TypePredicate,
  UnificationContext,
  UnificationResult,
} from "./predicate.js";

export interface TypeConstructor {
  name: string;
  parameters: readonly TypeParamId[];
  /** Direct supertypes, written against `parameters`. */
  supertypes: readonly TypeId[];
}

export interface TypeConstructorInit {
  name: string;
  parameters?: readonly TypeParamId[];
  supertypes?: readonly TypeId[];
}

export interface TypeHierarchy extends TypePredicate {
  /** Registers a nominal type constructor and returns its self type. */
  declareType(init: TypeConstructorInit): TypeId;
  instantiate(name: string, typeArgs?: readonly TypeId[]): TypeId;
  constructorOf(name: string): TypeConstructor | undefined;
  supertypesOf(type: TypeId): readonly TypeId[];
  /** `type` itself followed by every supertype, closest first. */
  ancestors(type: TypeId): readonly TypeId[];
}

/**
 * Nominal subtyping with invariant type arguments. A constructor's supertypes
 * may mention its own parameters (`List<T> <: Collection<T>`), which are
 * replaced by the instance's arguments when walking upwards.
 */
export const createTypeHierarchy = (arena: TypeArena): TypeHierarchy => {
  const constructors = new Map<string, TypeConstructor>();

  const declareType = ({
    name,
    parameters = [],
    supertypes = [],
  }: TypeConstructorInit): TypeId => {
    if (constructors.has(name)) {
      throw new Error(`type ${name} is already declared`);
    }

    const allowed = new Set(parameters);
    supertypes.forEach((supertype) => {
      arena.freeTypeParams(supertype).forEach((param) => {
        if (!allowed.has(param)) {
          throw new Error(
            `supertype ${arena.format(supertype)} of ${name} uses undeclared parameter ${arena.typeParamName(param)}`
          );
        }
      });
    });

    constructors.set(name, {
      name,
      parameters: [...parameters],
      supertypes: [...supertypes],
    });
    return arena.internNominal(name, parameters.map(arena.internTypeParamRef));
  };

  const instantiate = (
    name: string,
    typeArgs: readonly TypeId[] = []
  ): TypeId => {
    const ctor = constructors.get(name);
    if (!ctor) {
      throw new Error(`type ${name} is not declared`);
    }
    if (ctor.parameters.length !== typeArgs.length) {
      throw new Error(
        `type ${name} expects ${ctor.parameters.length} type argument(s), received ${typeArgs.length}`
      );
    }
    return arena.internNominal(name, typeArgs);
  };

  const supertypesOf = (type: TypeId): readonly TypeId[] => {
    const desc = arena.get(type);
    if (desc.kind !== "nominal") {
      return [];
    }

    const ctor = constructors.get(desc.name);
    if (!ctor) {
      return [];
    }

    const subst = new Map<TypeParamId, TypeId>();
    ctor.parameters.forEach((param, index) => {
      const arg = desc.typeArgs[index];
      if (arg !== undefined) subst.set(param, arg);
    });
    return ctor.supertypes.map((supertype) => arena.substitute(supertype, subst));
  };

  const ancestors = (type: TypeId): readonly TypeId[] => {
    const seen = new Set<TypeId>([type]);
    const ordered: TypeId[] = [type];
    for (let index = 0; index < ordered.length; index += 1) {
      const current = ordered[index];
      if (current === undefined) break;
      supertypesOf(current).forEach((supertype) => {
        if (seen.has(supertype)) return;
        seen.add(supertype);
        ordered.push(supertype);
      });
    }
    return ordered;
  };

  const isSubtype = (sub: TypeId, sup: TypeId): boolean =>
    sub === sup || ancestors(sub).includes(sup);

  const unifyExact = (
    actual: TypeId,
    declared: TypeId,
    params: ReadonlySet<TypeParamId>,
    subst: Substitution
  ): Substitution | undefined => {
    const declaredDesc = arena.get(declared);
    if (declaredDesc.kind === "type-param-ref" && params.has(declaredDesc.param)) {
      const bound = subst.get(declaredDesc.param);
      if (bound !== undefined) {
        return bound === actual ? subst : undefined;
      }
      return new Map(subst).set(declaredDesc.param, actual);
    }

    const actualDesc = arena.get(actual);
    if (
      declaredDesc.kind === "nominal" &&
      actualDesc.kind === "nominal" &&
      declaredDesc.name === actualDesc.name &&
      declaredDesc.typeArgs.length === actualDesc.typeArgs.length
    ) {
      let working: Substitution | undefined = subst;
      for (let index = 0; index < declaredDesc.typeArgs.length; index += 1) {
        const actualArg = actualDesc.typeArgs[index];
        const declaredArg = declaredDesc.typeArgs[index];
        if (!working || actualArg === undefined || declaredArg === undefined) {
          return undefined;
        }
        working = unifyExact(actualArg, declaredArg, params, working);
      }
      return working;
    }

    return actual === declared ? subst : undefined;
  };

  const unify = (
    actual: TypeId,
    declared: TypeId,
    ctx: UnificationContext
  ): UnificationResult => {
    const target = arena.substitute(declared, ctx.substitution);
    const open = [...arena.freeTypeParams(target)].some((param) =>
      ctx.params.has(param)
    );

    if (!open) {
      return isSubtype(actual, target)
        ? { ok: true, substitution: ctx.substitution }
        : conflict(actual, declared, target);
    }

    for (const candidate of ancestors(actual)) {
      const substitution = unifyExact(candidate, target, ctx.params, ctx.substitution);
      if (substitution) {
        return { ok: true, substitution };
      }
    }

    return conflict(actual, declared, target);
  };

  const conflict = (
    actual: TypeId,
    declared: TypeId,
    target: TypeId
  ): UnificationResult => ({
    ok: false,
    conflict: {
      actual,
      declared,
      message: `${arena.format(actual)} is not a subtype of ${arena.format(target)}`,
    },
  });

  return {
    arena,
    declareType,
    instantiate,
    constructorOf: (name) => constructors.get(name),
    supertypesOf,
    ancestors,
    isSubtype,
    unify,
  };
};
