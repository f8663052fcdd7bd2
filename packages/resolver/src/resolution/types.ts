import type { TypeId } from "../ids.js";
import type { Diagnostic, SourceSpan } from "../diagnostics/index.js";
import type { ReceiverDeclaration, ResolutionMode } from "../declarations/types.js";
import type { ContextFrame } from "../receivers/receiver-stack.js";
import type { Substitution } from "../types/type-arena.js";

/** The receiver written syntactically at the call, e.g. `session` in `session.render()`. */
export interface ExplicitReceiver<V = unknown> {
  type: TypeId;
  value: V;
  label?: string;
}

export interface CallSite<V = unknown> {
  name: string;
  /** Ambient receivers at the call, outermost first, globals included. */
  stack: readonly ContextFrame<V>[];
  receiver?: ExplicitReceiver<V>;
  span?: SourceSpan;
}

export type ReceiverSource<V = unknown> =
  | { kind: "frame"; position: number; frame: ContextFrame<V> }
  | { kind: "explicit"; receiver: ExplicitReceiver<V> };

export interface BoundReceiver<V = unknown> {
  /** Index into the declaration's receiver list. */
  index: number;
  /** The declared receiver type after the binding's substitution. */
  declared: TypeId;
  /** The type of the context that satisfied it. */
  actual: TypeId;
  source: ReceiverSource<V>;
}

export interface Binding<V = unknown> {
  declaration: ReceiverDeclaration;
  mode: ResolutionMode;
  /** One entry per declared receiver, in declared order. */
  receivers: readonly BoundReceiver<V>[];
  substitution: Substitution;
}

export type ResolutionVerdict<V = unknown> =
  | { kind: "resolved"; binding: Binding<V> }
  | { kind: "not-applicable" }
  | { kind: "ambiguous"; bindings: readonly Binding<V>[] };

export const notApplicable = { kind: "not-applicable" } as const;

export interface SyntheticArgument<V = unknown> {
  index: number;
  declared: TypeId;
  value: V;
  source: ReceiverSource<V>;
}

/** The positional invocation a resolved call lowers to. */
export interface SyntheticCall<V = unknown> {
  callee: string;
  declaration: ReceiverDeclaration;
  arguments: readonly SyntheticArgument<V>[];
  /** `this@Name` lookup table keyed by the receiver type's simple name. */
  qualifiedReceivers: ReadonlyMap<string, SyntheticArgument<V>>;
  /** What unqualified `this` means inside the callee. */
  defaultReceiver: SyntheticArgument<V>;
}

export type CallVerdict<V = unknown> =
  | { kind: "resolved"; binding: Binding<V>; call: SyntheticCall<V> }
  | { kind: "not-applicable"; diagnostic: Diagnostic }
  | { kind: "ambiguous"; bindings: readonly Binding<V>[]; diagnostic: Diagnostic };
