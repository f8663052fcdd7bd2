import type { TypeId, TypeParamId } from "../ids.js";
import type { Substitution, TypeArena } from "./type-arena.js";

export interface UnificationContext {
  /** Parameters that may be bound by this unification. */
  params: ReadonlySet<TypeParamId>;
  /** Bindings already fixed by earlier receivers of the same declaration. */
  substitution: Substitution;
}

export type UnificationResult =
  | { ok: true; substitution: Substitution }
  | { ok: false; conflict: UnificationConflict };

export interface UnificationConflict {
  actual: TypeId;
  declared: TypeId;
  message: string;
}

/**
 * The subtyping oracle the resolver consumes. Implementations are expected to
 * be total and free of side effects so resolution stays a pure function of
 * its inputs.
 */
export interface TypePredicate {
  readonly arena: TypeArena;
  isSubtype(sub: TypeId, sup: TypeId): boolean;
  /**
   * Extends `ctx.substitution` so that `actual` is a subtype of `declared`
   * after substitution.
   */
  unify(
    actual: TypeId,
    declared: TypeId,
    ctx: UnificationContext
  ): UnificationResult;
}
