import type { DeclarationId, TypeId, TypeParamId } from "../ids.js";
import type { SourceSpan } from "../diagnostics/index.js";
import type { Substitution } from "../types/type-arena.js";

export type ResolutionMode = "ordered" | "unordered";

export interface ReceiverDeclarationInit {
  /** The call-site name the declaration is reachable under. */
  name: string;
  /** Declared receivers; the last one is the explicit (dot-target) receiver. */
  receivers: readonly TypeId[];
  mode?: ResolutionMode;
  typeParameters?: readonly TypeParamId[];
  /** Applied before validation, e.g. when instantiating a declaration template. */
  substitution?: Substitution;
  span?: SourceSpan;
}

export interface ReceiverDeclaration {
  id: DeclarationId;
  name: string;
  receivers: readonly TypeId[];
  mode: ResolutionMode;
  typeParameters: readonly TypeParamId[];
  span: SourceSpan;
}

export interface OverloadSet {
  name: string;
  declarations: readonly ReceiverDeclaration[];
}
