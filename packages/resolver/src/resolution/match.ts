import type { TypeId } from "../ids.js";
import type { ReceiverDeclaration } from "../declarations/types.js";
import type { TypePredicate } from "../types/predicate.js";
import type { Substitution } from "../types/type-arena.js";
import { silentTracer, type ResolutionTracer } from "../trace.js";
import type { BoundReceiver, CallSite, ReceiverSource } from "./types.js";

export interface ResolutionInput<V> {
  predicate: TypePredicate;
  declaration: ReceiverDeclaration;
  site: CallSite<V>;
  tracer?: ResolutionTracer;
}

/**
 * Whether a context of type `actual` may fill the declared receiver at
 * `index`. Returns the substitution extended by the match, or `undefined`.
 */
export const matchReceiver = (
  predicate: TypePredicate,
  declaration: ReceiverDeclaration,
  actual: TypeId,
  index: number,
  substitution: Substitution
): Substitution | undefined => {
  const declared = declaration.receivers[index];
  if (declared === undefined) {
    return undefined;
  }

  if (declaration.typeParameters.length === 0) {
    return predicate.isSubtype(actual, declared) ? substitution : undefined;
  }

  const result = predicate.unify(actual, declared, {
    params: new Set(declaration.typeParameters),
    substitution,
  });
  return result.ok ? result.substitution : undefined;
};

/** Fills in `declared` once the final substitution is known. */
export const finalizeReceivers = <V>(
  input: ResolutionInput<V>,
  partial: readonly { index: number; actual: TypeId; source: ReceiverSource<V> }[],
  substitution: Substitution
): BoundReceiver<V>[] =>
  [...partial]
    .sort((a, b) => a.index - b.index)
    .map((entry) => ({
      index: entry.index,
      declared: input.predicate.arena.substitute(
        input.declaration.receivers[entry.index] ?? entry.actual,
        substitution
      ),
      actual: entry.actual,
      source: entry.source,
    }));

export const describeSource = <V>(
  input: ResolutionInput<V>,
  source: ReceiverSource<V>
): string => {
  const arena = input.predicate.arena;
  if (source.kind === "explicit") {
    const label = source.receiver.label ?? "explicit";
    return `${label}: ${arena.format(source.receiver.type)}`;
  }
  const label = source.frame.label ?? `#${source.position}`;
  return `${label}: ${arena.format(source.frame.type)}`;
};

export const tracerOf = <V>(input: ResolutionInput<V>): ResolutionTracer =>
  input.tracer ?? silentTracer;
