import type { TypeArena } from "../types/type-arena.js";
import type {
  Binding,
  ReceiverSource,
  SyntheticArgument,
  SyntheticCall,
} from "./types.js";

const valueOf = <V>(source: ReceiverSource<V>): V =>
  source.kind === "explicit" ? source.receiver.value : source.frame.value;

// The explicit receiver sits above every frame.
const depthOf = <V>(source: ReceiverSource<V>): number =>
  source.kind === "explicit" ? Number.POSITIVE_INFINITY : source.position;

/**
 * Lowers a binding to a positional invocation: one argument per declared
 * receiver, in declared order.
 */
export const constructCall = <V>(
  arena: TypeArena,
  binding: Binding<V>
): SyntheticCall<V> => {
  const { declaration } = binding;
  const args: SyntheticArgument<V>[] = binding.receivers.map((receiver) => ({
    index: receiver.index,
    declared: receiver.declared,
    value: valueOf(receiver.source),
    source: receiver.source,
  }));

  const qualifiedReceivers = new Map<string, SyntheticArgument<V>>();
  args.forEach((arg) => {
    const declared = declaration.receivers[arg.index];
    if (declared !== undefined) {
      qualifiedReceivers.set(arena.simpleName(declared), arg);
    }
  });

  const defaultReceiver =
    binding.mode === "ordered"
      ? args.at(-1)
      : args.reduce<SyntheticArgument<V> | undefined>(
          (best, arg) =>
            !best || depthOf(arg.source) >= depthOf(best.source) ? arg : best,
          undefined
        );
  if (!defaultReceiver) {
    throw new Error(`binding for ${declaration.name} has no receivers`);
  }

  return {
    callee: declaration.name,
    declaration,
    arguments: args,
    qualifiedReceivers,
    defaultReceiver,
  };
};

/** `this` when `label` is omitted, `this@label` otherwise. */
export const resolveThis = <V>(
  call: SyntheticCall<V>,
  label?: string
): SyntheticArgument<V> | undefined =>
  label === undefined ? call.defaultReceiver : call.qualifiedReceivers.get(label);

export const describeArgument = <V>(arg: SyntheticArgument<V>): string => {
  if (arg.source.kind === "explicit") {
    return arg.source.receiver.label ?? "<explicit>";
  }
  return arg.source.frame.label ?? `#${arg.source.position}`;
};

export const formatSyntheticCall = <V>(
  call: SyntheticCall<V>,
  describe: (arg: SyntheticArgument<V>) => string = describeArgument
): string => `${call.callee}(${call.arguments.map(describe).join(", ")})`;
