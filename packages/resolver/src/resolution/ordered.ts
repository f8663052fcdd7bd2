import type { TypeId } from "../ids.js";
import { emptySubstitution, type Substitution } from "../types/type-arena.js";
import {
  describeSource,
  finalizeReceivers,
  matchReceiver,
  tracerOf,
  type ResolutionInput,
} from "./match.js";
import {
  notApplicable,
  type ReceiverSource,
  type ResolutionVerdict,
} from "./types.js";

type PartialReceiver<V> = { index: number; actual: TypeId; source: ReceiverSource<V> };

interface PartialBinding<V> {
  bound: readonly PartialReceiver<V>[];
  substitution: Substitution;
}

/**
 * Monotonic matcher for positional receiver lists.
 *
 * Receivers are bound from the last declared one backwards. Each takes the
 * innermost frame below the frame chosen for its successor, so without type
 * parameters the result is the pointwise-innermost (and therefore
 * lexicographically last) monotonic assignment, found in O(n·m).
 *
 * A generic receiver whose match fixes a type parameter that leaves an
 * earlier receiver unmatched is retried at its next-innermost frame. Later
 * receivers keep priority for inner frames.
 *
 * With a syntactic explicit receiver the last declared receiver must accept
 * it; otherwise the last declared receiver is the implicit `this` and is
 * found in the stack like the others. Never mutates the stack.
 */
export const resolveOrdered = <V>(
  input: ResolutionInput<V>
): ResolutionVerdict<V> => {
  const { predicate, declaration, site } = input;
  const tracer = tracerOf(input);
  const arena = predicate.arena;
  const last = declaration.receivers.length - 1;

  const bound: PartialReceiver<V>[] = [];
  let substitution: Substitution = emptySubstitution;
  let next = last;

  if (site.receiver) {
    const matched = matchReceiver(
      predicate,
      declaration,
      site.receiver.type,
      last,
      substitution
    );
    if (!matched) {
      tracer.log(
        `explicit ${arena.format(site.receiver.type)} does not satisfy receiver ${last}`
      );
      return notApplicable;
    }
    substitution = matched;
    const source: ReceiverSource<V> = { kind: "explicit", receiver: site.receiver };
    bound.push({ index: last, actual: site.receiver.type, source });
    tracer.log(`receiver ${last} <- ${describeSource(input, source)}`);
    next = last - 1;
  }

  const found = bindBelow(input, next, site.stack.length, { bound, substitution });
  if (!found) {
    return notApplicable;
  }

  return {
    kind: "resolved",
    binding: {
      declaration,
      mode: "ordered",
      receivers: finalizeReceivers(input, found.bound, found.substitution),
      substitution: found.substitution,
    },
  };
};

const bindBelow = <V>(
  input: ResolutionInput<V>,
  index: number,
  upper: number,
  partial: PartialBinding<V>
): PartialBinding<V> | undefined => {
  if (index < 0) {
    return partial;
  }

  const { predicate, declaration, site } = input;
  const tracer = tracerOf(input);
  const retry = declaration.typeParameters.length > 0;
  let matchedAny = false;

  for (let position = upper - 1; position >= 0; position -= 1) {
    const frame = site.stack[position];
    if (!frame) continue;
    const matched = matchReceiver(
      predicate,
      declaration,
      frame.type,
      index,
      partial.substitution
    );
    if (!matched) continue;

    matchedAny = true;
    const source: ReceiverSource<V> = { kind: "frame", position, frame };
    tracer.log(`receiver ${index} <- ${describeSource(input, source)}`);
    const found = bindBelow(input, index - 1, position, {
      bound: [...partial.bound, { index, actual: frame.type, source }],
      substitution: matched,
    });
    if (found || !retry) {
      return found;
    }
    tracer.log(`receiver ${index} retries below position ${position}`);
  }

  if (!matchedAny) {
    tracer.log(`receiver ${index} has no match below position ${upper}`);
  }
  return undefined;
};
