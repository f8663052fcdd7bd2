import type { TypePredicate } from "../types/predicate.js";
import type { Binding } from "./types.js";

/**
 * `a` is more specific than `b` when both bind the same number of receivers
 * and every declared type of `a` is a subtype of (or equal to) the one at the
 * same position of `b`, strictly at least once.
 */
export const isMoreSpecific = <V>(
  predicate: TypePredicate,
  a: Binding<V>,
  b: Binding<V>
): boolean => {
  if (a.receivers.length !== b.receivers.length) {
    return false;
  }

  let strict = false;
  for (let index = 0; index < a.receivers.length; index += 1) {
    const left = a.receivers[index]?.declared;
    const right = b.receivers[index]?.declared;
    if (left === undefined || right === undefined) return false;
    if (left === right) continue;
    if (!predicate.isSubtype(left, right)) return false;
    strict = true;
  }
  return strict;
};

/**
 * The maximal elements of `bindings` under `isMoreSpecific`. A single maximal
 * element is the winner; anything else is an ambiguity.
 */
export const mostSpecificBindings = <V>(
  predicate: TypePredicate,
  bindings: readonly Binding<V>[]
): readonly Binding<V>[] => {
  const maximal = bindings.filter(
    (candidate) =>
      !bindings.some(
        (other) => other !== candidate && isMoreSpecific(predicate, other, candidate)
      )
  );
  // A cyclic hierarchy can make every candidate dominated.
  return maximal.length > 0 ? maximal : bindings;
};
