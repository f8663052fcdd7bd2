import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const qualifiedThisHint: DiagnosticHint = {
  message:
    "Receivers are addressed as this@TypeName, so each receiver needs a distinct simple type name.",
};

type DiagnosticParamsMap = {
  DC0001:
    | { kind: "duplicate-receiver-type"; declaration: string; type: string }
    | { kind: "previous-receiver"; type: string; index: number };
  DC0002: {
    kind: "receiver-name-clash";
    declaration: string;
    name: string;
    types: readonly string[];
  };
  DC0003: { kind: "empty-receiver-list"; declaration: string };
  DC0004: {
    kind: "undeclared-type-parameter";
    declaration: string;
    parameter: string;
  };
  RS0001: {
    kind: "no-applicable-declaration";
    name: string;
    candidates: readonly string[];
  };
  RS0002:
    | { kind: "ambiguous-overload"; name: string; candidates: readonly string[] }
    | { kind: "competing-declaration"; signature: string };
  RS0003: { kind: "unknown-callable"; name: string };
  RS0004: {
    kind: "unknown-receiver-label";
    label: string;
    available: readonly string[];
  };
  IN0001: {
    kind: "ambiguous-binding";
    declaration: string;
    greedy: string;
    expected: string;
  };
  IN0002: { kind: "stack-discipline-violation"; reason: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;

export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const listOrNone = (items: readonly string[]): string =>
  items.length > 0 ? items.join(", ") : "none";

export const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  DC0001: {
    code: "DC0001",
    message: (params) => {
      switch (params.kind) {
        case "duplicate-receiver-type":
          return `declaration ${params.declaration} lists receiver type ${params.type} more than once`;
        case "previous-receiver":
          return `${params.type} first listed as receiver ${params.index + 1}`;
      }
      return exhaustive(params);
    },
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0001"]>,
  DC0002: {
    code: "DC0002",
    message: (params) =>
      `declaration ${params.declaration} has receivers ${params.types.join(
        " and "
      )} that share the name ${params.name}`,
    severity: "error",
    phase: "declaration",
    hints: [qualifiedThisHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0002"]>,
  DC0003: {
    code: "DC0003",
    message: (params) =>
      `declaration ${params.declaration} must declare at least one receiver`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0003"]>,
  DC0004: {
    code: "DC0004",
    message: (params) =>
      `declaration ${params.declaration} uses type parameter ${params.parameter} without declaring it`,
    severity: "error",
    phase: "declaration",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["DC0004"]>,
  RS0001: {
    code: "RS0001",
    message: (params) =>
      `no applicable declaration of ${params.name} for the receivers in scope (tried: ${listOrNone(
        params.candidates
      )})`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0001"]>,
  RS0002: {
    code: "RS0002",
    message: (params) =>
      params.kind === "ambiguous-overload"
        ? `ambiguous call to ${params.name}; candidates: ${params.candidates.join(
            ", "
          )}`
        : `competing declaration ${params.signature}`,
    severity: "error",
    phase: "resolution",
    hints: [
      {
        message:
          "Pass the intended receiver explicitly, or narrow one declaration's receiver types so it is more specific.",
      },
    ],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0002"]>,
  RS0003: {
    code: "RS0003",
    message: (params) => `no declaration named ${params.name}`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0003"]>,
  RS0004: {
    code: "RS0004",
    message: (params) =>
      `this@${params.label} does not name a receiver of this call (available: ${listOrNone(
        params.available
      )})`,
    severity: "error",
    phase: "resolution",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["RS0004"]>,
  IN0001: {
    code: "IN0001",
    message: (params) =>
      `greedy binding ${params.greedy} for ${params.declaration} disagrees with exhaustive search (${params.expected})`,
    severity: "error",
    phase: "internal",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0001"]>,
  IN0002: {
    code: "IN0002",
    message: (params) => `receiver stack discipline violated: ${params.reason}`,
    severity: "error",
    phase: "internal",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["IN0002"]>,
} as const;

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>
): string => diagnosticsRegistry[code].message(params);

export const getDiagnosticDefinition = <K extends DiagnosticCode>(code: K) =>
  diagnosticsRegistry[code];

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);

const isDiagnosticCode = (code: string): code is DiagnosticCode =>
  code in diagnosticsRegistry;

const exhaustive = (_value: never): never => _value;
