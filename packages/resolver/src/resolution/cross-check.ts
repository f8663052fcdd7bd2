import { raiseInvariant, normalizeSpan } from "../diagnostics/index.js";
import { formatDeclarationSignature } from "../declarations/declaration-table.js";
import { emptySubstitution, type Substitution } from "../types/type-arena.js";
import { matchReceiver, type ResolutionInput } from "./match.js";
import type { Binding, ResolutionVerdict } from "./types.js";

/**
 * Every strictly increasing assignment of the declaration's implicit
 * receivers to stack positions. Exponential in the receiver count.
 *
 * Type parameters are threaded in the order the ordered binder uses: the
 * explicit receiver first, then from the last implicit receiver backwards.
 */
export function* enumerateOrderedAssignments<V>(
  input: ResolutionInput<V>
): Generator<readonly number[]> {
  const { predicate, declaration, site } = input;
  const last = declaration.receivers.length - 1;
  let initial: Substitution = emptySubstitution;

  if (site.receiver) {
    const explicit = matchReceiver(
      predicate,
      declaration,
      site.receiver.type,
      last,
      emptySubstitution
    );
    if (!explicit) return;
    initial = explicit;
  }

  const implicitCount = site.receiver ? last : last + 1;

  function* extend(
    index: number,
    upper: number,
    chosen: readonly number[],
    substitution: Substitution
  ): Generator<readonly number[]> {
    if (index < 0) {
      yield chosen;
      return;
    }
    for (let position = 0; position < upper; position += 1) {
      const frame = site.stack[position];
      if (!frame) continue;
      const matched = matchReceiver(predicate, declaration, frame.type, index, substitution);
      if (matched) {
        yield* extend(index - 1, position, [position, ...chosen], matched);
      }
    }
  }

  yield* extend(implicitCount - 1, site.stack.length, [], initial);
}

// Later receivers weigh most: they sit closest to the call.
const compareAssignments = (a: readonly number[], b: readonly number[]): number => {
  if (a.length !== b.length) return a.length - b.length;
  for (let index = a.length - 1; index >= 0; index -= 1) {
    const diff = (a[index] ?? 0) - (b[index] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
};

/**
 * The valid assignment whose last receiver is innermost, ties broken by the
 * receiver before it. Without type parameters this is also the
 * pointwise-innermost, lexicographically last assignment.
 */
export const lastOrderedAssignment = <V>(
  input: ResolutionInput<V>
): readonly number[] | undefined => {
  let best: readonly number[] | undefined;
  for (const assignment of enumerateOrderedAssignments(input)) {
    if (!best || compareAssignments(assignment, best) > 0) {
      best = assignment;
    }
  }
  return best;
};

/** Stack positions of the frame-bound receivers, in declared order. */
export const framePositions = <V>(binding: Binding<V>): readonly number[] =>
  binding.receivers.flatMap((receiver) =>
    receiver.source.kind === "frame" ? [receiver.source.position] : []
  );

const describeAssignment = (assignment: readonly number[] | undefined): string =>
  assignment ? `[${assignment.join(", ")}]` : "not-applicable";

/**
 * Throws IN0001 when the greedy verdict differs from the preferred
 * assignment found by exhaustive search.
 */
export const crossCheckOrdered = <V>(
  input: ResolutionInput<V>,
  verdict: ResolutionVerdict<V>
): void => {
  const greedy =
    verdict.kind === "resolved" ? framePositions(verdict.binding) : undefined;
  const expected = lastOrderedAssignment(input);
  const agree =
    greedy === undefined || expected === undefined
      ? greedy === expected
      : compareAssignments(greedy, expected) === 0;
  if (agree) {
    return;
  }

  raiseInvariant({
    code: "IN0001",
    params: {
      kind: "ambiguous-binding",
      declaration: formatDeclarationSignature(input.predicate.arena, input.declaration),
      greedy: describeAssignment(greedy),
      expected: describeAssignment(expected),
    },
    span: normalizeSpan(input.site.span, input.declaration.span),
  });
};
