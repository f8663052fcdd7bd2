import type { FrameId, TypeId } from "../ids.js";
import { raiseInvariant, normalizeSpan, type SourceSpan } from "../diagnostics/index.js";

export interface ContextFrame<V = unknown> {
  readonly id: FrameId;
  readonly type: TypeId;
  readonly value: V;
  readonly label?: string;
  /** File or global contexts sit below every scoped frame and are never popped. */
  readonly global: boolean;
}

export interface ReceiverInit<V = unknown> {
  type: TypeId;
  value: V;
  label?: string;
}

export interface FrameHandle {
  readonly frame: FrameId;
  readonly depth: number;
}

export interface ReceiverStackInit<V> {
  globals?: readonly ReceiverInit<V>[];
  /** Where violations are reported, usually the traversal root. */
  span?: SourceSpan;
}

/**
 * The tower of ambient receivers visible at the current point of a traversal,
 * outermost first. Mutation is single-writer and strictly LIFO.
 */
export class ReceiverStack<V = unknown> {
  private readonly frames: ContextFrame<V>[] = [];
  private readonly issued = new WeakSet<FrameHandle>();
  private readonly globalDepth: number;
  private readonly span: SourceSpan;
  private nextFrame: FrameId = 0;

  constructor({ globals = [], span }: ReceiverStackInit<V> = {}) {
    this.span = normalizeSpan(span);
    globals.forEach((init) => this.frames.push(this.createFrame(init, true)));
    this.globalDepth = this.frames.length;
  }

  depth() {
    return this.frames.length;
  }

  push(type: TypeId, value: V, options: { label?: string } = {}): FrameHandle {
    const frame = this.createFrame({ type, value, label: options.label }, false);
    this.frames.push(frame);
    const handle: FrameHandle = Object.freeze({ frame: frame.id, depth: this.frames.length });
    this.issued.add(handle);
    return handle;
  }

  /** `handle` must come from this stack's innermost `push`. */
  pop(handle: FrameHandle): void {
    if (!this.issued.has(handle)) {
      return this.violation(`pop of frame ${handle.frame} that was not pushed on this stack`);
    }
    const top = this.frames.at(-1);
    if (!top || this.frames.length <= this.globalDepth) {
      return this.violation(`pop of frame ${handle.frame} with no scoped frame on the stack`);
    }
    if (top.id !== handle.frame || this.frames.length !== handle.depth) {
      return this.violation(
        `pop of frame ${handle.frame} at depth ${handle.depth} while frame ${top.id} at depth ${this.frames.length} is innermost`
      );
    }
    this.frames.pop();
  }

  /** Pushes `init` for the dynamic extent of `runInScope`, popping on every exit path. */
  withReceiver<T>(init: ReceiverInit<V>, runInScope: () => T): T {
    const handle = this.push(init.type, init.value, { label: init.label });
    try {
      return runInScope();
    } finally {
      this.pop(handle);
    }
  }

  /** An immutable snapshot; later pushes and pops do not affect it. */
  current(): readonly ContextFrame<V>[] {
    return Object.freeze([...this.frames]);
  }

  private createFrame(init: ReceiverInit<V>, global: boolean): ContextFrame<V> {
    return Object.freeze({
      id: this.nextFrame++,
      type: init.type,
      value: init.value,
      label: init.label,
      global,
    });
  }

  private violation(reason: string): never {
    return raiseInvariant({
      code: "IN0002",
      params: { kind: "stack-discipline-violation", reason },
      span: this.span,
    });
  }
}
