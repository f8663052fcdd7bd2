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

const sourceType = <V>(source: ReceiverSource<V>): TypeId =>
  source.kind === "explicit" ? source.receiver.type : source.frame.type;

type PartialReceiver<V> = { index: number; actual: TypeId; source: ReceiverSource<V> };

interface PartialBinding<V> {
  bound: readonly PartialReceiver<V>[];
  substitution: Substitution;
}

/**
 * Closest-match binder for set-style receiver lists.
 *
 * The context list is the stack (globals first) followed by the explicit
 * receiver, if any. Declared receivers are taken in textual order and each
 * binds to the innermost matching context independently, so one context may
 * satisfy several receivers.
 *
 * For generic declarations a receiver whose match fixes a type parameter
 * that no later receiver can agree with is retried at its next-innermost
 * context.
 */
export const resolveUnordered = <V>(
  input: ResolutionInput<V>
): ResolutionVerdict<V> => {
  const { declaration, site } = input;

  const contexts: ReceiverSource<V>[] = site.stack.map((frame, position) => ({
    kind: "frame",
    position,
    frame,
  }));
  if (site.receiver) {
    contexts.push({ kind: "explicit", receiver: site.receiver });
  }

  const found = bindFrom(input, contexts, 0, {
    bound: [],
    substitution: emptySubstitution,
  });
  if (!found) {
    return notApplicable;
  }

  return {
    kind: "resolved",
    binding: {
      declaration,
      mode: "unordered",
      receivers: finalizeReceivers(input, found.bound, found.substitution),
      substitution: found.substitution,
    },
  };
};

const bindFrom = <V>(
  input: ResolutionInput<V>,
  contexts: readonly ReceiverSource<V>[],
  index: number,
  partial: PartialBinding<V>
): PartialBinding<V> | undefined => {
  const { predicate, declaration, site } = input;
  const tracer = tracerOf(input);

  if (index === declaration.receivers.length) {
    if (site.receiver && !partial.bound.some((entry) => entry.source.kind === "explicit")) {
      tracer.log("explicit receiver satisfies none of the declared receivers");
      return undefined;
    }
    return partial;
  }

  const retry = declaration.typeParameters.length > 0;
  let matchedAny = false;

  for (let position = contexts.length - 1; position >= 0; position -= 1) {
    const source = contexts[position];
    if (!source) continue;
    const matched = matchReceiver(
      predicate,
      declaration,
      sourceType(source),
      index,
      partial.substitution
    );
    if (!matched) continue;

    matchedAny = true;
    tracer.log(`receiver ${index} <- ${describeSource(input, source)}`);
    const found = bindFrom(input, contexts, index + 1, {
      bound: [...partial.bound, { index, actual: sourceType(source), source }],
      substitution: matched,
    });
    if (found || !retry) {
      return found;
    }
    tracer.log(`receiver ${index} retries below ${describeSource(input, source)}`);
  }

  if (!matchedAny) {
    tracer.log(`receiver ${index} has no matching context`);
  }
  return undefined;
};
