import type { DeclarationId, TypeId, TypeParamId } from "../ids.js";
import {
  diagnosticFromCode,
  normalizeSpan,
  reportDiagnostic,
  type DiagnosticEmitter,
  type SourceSpan,
} from "../diagnostics/index.js";
import { emptySubstitution, type TypeArena } from "../types/type-arena.js";
import type {
  OverloadSet,
  ReceiverDeclaration,
  ReceiverDeclarationInit,
  ResolutionMode,
} from "./types.js";

export interface DeclarationTable {
  /** Validates and records a declaration; erroneous ones are reported and return `undefined`. */
  declare(init: ReceiverDeclarationInit): ReceiverDeclaration | undefined;
  get(id: DeclarationId): ReceiverDeclaration;
  overloadSet(name: string): OverloadSet;
  names(): readonly string[];
  /** Names that were declared, including ones whose every declaration was rejected. */
  isKnownName(name: string): boolean;
}

export const formatDeclarationSignature = (
  arena: TypeArena,
  decl: {
    name: string;
    receivers: readonly TypeId[];
    mode: ResolutionMode;
    typeParameters: readonly TypeParamId[];
  }
): string => {
  const generics =
    decl.typeParameters.length > 0
      ? `<${decl.typeParameters.map(arena.typeParamName).join(", ")}> `
      : "";
  const receivers = decl.receivers.map(arena.format).join(", ");
  const [open, close] = decl.mode === "ordered" ? ["(", ")"] : ["{", "}"];
  return `${generics}${open}${receivers}${close}.${decl.name}`;
};

export const createDeclarationTable = ({
  arena,
  diagnostics,
}: {
  arena: TypeArena;
  diagnostics: DiagnosticEmitter;
}): DeclarationTable => {
  let nextDeclaration: DeclarationId = 0;
  const records: ReceiverDeclaration[] = [];
  const byName = new Map<string, DeclarationId[]>();
  const knownNames = new Set<string>();

  const declare = (
    init: ReceiverDeclarationInit
  ): ReceiverDeclaration | undefined => {
    const substitution = init.substitution ?? emptySubstitution;
    const candidate = {
      name: init.name,
      mode: init.mode ?? "ordered",
      receivers: init.receivers.map((receiver) =>
        arena.substitute(receiver, substitution)
      ),
      typeParameters: (init.typeParameters ?? []).filter(
        (param) => !substitution.has(param)
      ),
      span: normalizeSpan(init.span),
    };
    knownNames.add(init.name);

    const signature = formatDeclarationSignature(arena, candidate);
    const valid = [
      checkNotEmpty(candidate.receivers, signature, candidate.span),
      checkDuplicates(candidate.receivers, signature, candidate.span),
      checkNameClashes(candidate.receivers, signature, candidate.span),
      checkTypeParameters(candidate, signature),
    ].every(Boolean);
    if (!valid) {
      return undefined;
    }

    const record: ReceiverDeclaration = { ...candidate, id: nextDeclaration++ };
    records[record.id] = record;
    const ids = byName.get(record.name);
    if (ids) {
      ids.push(record.id);
    } else {
      byName.set(record.name, [record.id]);
    }
    return record;
  };

  const checkNotEmpty = (
    receivers: readonly TypeId[],
    signature: string,
    span: SourceSpan
  ): boolean => {
    if (receivers.length > 0) return true;
    reportDiagnostic({
      ctx: diagnostics,
      code: "DC0003",
      params: { kind: "empty-receiver-list", declaration: signature },
      span,
    });
    return false;
  };

  const checkDuplicates = (
    receivers: readonly TypeId[],
    signature: string,
    span: SourceSpan
  ): boolean => {
    const firstIndex = new Map<TypeId, number>();
    const reported = new Set<TypeId>();
    receivers.forEach((receiver, index) => {
      const previous = firstIndex.get(receiver);
      if (previous === undefined) {
        firstIndex.set(receiver, index);
        return;
      }
      if (reported.has(receiver)) return;
      reported.add(receiver);
      const type = arena.format(receiver);
      reportDiagnostic({
        ctx: diagnostics,
        code: "DC0001",
        params: { kind: "duplicate-receiver-type", declaration: signature, type },
        span,
        related: [
          diagnosticFromCode({
            code: "DC0001",
            params: { kind: "previous-receiver", type, index: previous },
            span,
            severity: "note",
          }),
        ],
      });
    });
    return reported.size === 0;
  };

  // Runs on distinct types only; exact duplicates are DC0001's concern.
  const checkNameClashes = (
    receivers: readonly TypeId[],
    signature: string,
    span: SourceSpan
  ): boolean => {
    const bySimpleName = new Map<string, TypeId[]>();
    new Set(receivers).forEach((receiver) => {
      const name = arena.simpleName(receiver);
      const group = bySimpleName.get(name);
      if (group) {
        group.push(receiver);
      } else {
        bySimpleName.set(name, [receiver]);
      }
    });

    let ok = true;
    bySimpleName.forEach((group, name) => {
      if (group.length < 2) return;
      ok = false;
      reportDiagnostic({
        ctx: diagnostics,
        code: "DC0002",
        params: {
          kind: "receiver-name-clash",
          declaration: signature,
          name,
          types: group.map(arena.format),
        },
        span,
      });
    });
    return ok;
  };

  const checkTypeParameters = (
    decl: { receivers: readonly TypeId[]; typeParameters: readonly TypeParamId[]; span: SourceSpan },
    signature: string
  ): boolean => {
    const declared = new Set(decl.typeParameters);
    const undeclared = new Set<TypeParamId>();
    decl.receivers.forEach((receiver) => {
      arena.freeTypeParams(receiver).forEach((param) => {
        if (!declared.has(param)) undeclared.add(param);
      });
    });
    undeclared.forEach((param) => {
      reportDiagnostic({
        ctx: diagnostics,
        code: "DC0004",
        params: {
          kind: "undeclared-type-parameter",
          declaration: signature,
          parameter: arena.typeParamName(param),
        },
        span: decl.span,
      });
    });
    return undeclared.size === 0;
  };

  const get = (id: DeclarationId): ReceiverDeclaration => {
    const record = records[id];
    if (!record) {
      throw new Error(`declaration ${id} does not exist`);
    }
    return record;
  };

  const overloadSet = (name: string): OverloadSet => ({
    name,
    declarations: (byName.get(name) ?? []).map(get),
  });

  return {
    declare,
    get,
    overloadSet,
    names: () => [...byName.keys()],
    isKnownName: (name) => knownNames.has(name),
  };
};
