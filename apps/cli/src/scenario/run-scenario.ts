import {
  createDeclarationTable,
  createReceiverResolver,
  createTypeArena,
  createTypeHierarchy,
  describeArgument,
  DiagnosticEmitter,
  formatDeclarationSignature,
  formatSyntheticCall,
  ReceiverStack,
  type CallVerdict,
  type Diagnostic,
  type ReceiverInit,
  type ResolverOptions,
  type SourceSpan,
  type TypeHierarchy,
  type TypeParamId,
} from "@multireceiver/resolver";
import { parseScenario, type ContextEntry, type ScenarioDocument } from "./document.js";
import { locateEntries } from "./entry-spans.js";
import { ScenarioError } from "./errors.js";
import { resolveTypeText, type TypeParameterScope } from "./type-expression.js";

export interface CallReport {
  index: number;
  name: string;
  verdict: CallVerdict["kind"];
  /** Signature of the chosen declaration. */
  declaration?: string;
  /** The positional call the resolved call lowers to, e.g. `render(outer, inner)`. */
  invocation?: string;
  this?: string;
  /** Requested `this@Label` lookups; `null` when the label names no receiver. */
  qualifiedThis: ReadonlyMap<string, string | null>;
  diagnostic?: string;
}

export interface ScenarioReport {
  file: string;
  calls: readonly CallReport[];
  diagnostics: readonly Diagnostic[];
}

type Scope = Map<string, TypeParamId>;

const noTypeParameters: TypeParameterScope = new Map<string, TypeParamId>();

const declareTypeParameters = (
  hierarchy: TypeHierarchy,
  names: readonly string[],
  path: string
): Scope => {
  const scope: Scope = new Map();
  names.forEach((name, index) => {
    if (scope.has(name)) {
      throw new ScenarioError(`${path}[${index}]`, `type parameter ${name} is declared twice`);
    }
    scope.set(name, hierarchy.arena.freshTypeParam(name));
  });
  return scope;
};

const declareTypes = (hierarchy: TypeHierarchy, document: ScenarioDocument) => {
  document.types.forEach((entry, index) => {
    const path = `types[${index}]`;
    const scope = declareTypeParameters(hierarchy, entry.parameters, `${path}.parameters`);
    const supertypes = entry.supertypes.map((text, position) =>
      resolveTypeText({ hierarchy, text, scope, path: `${path}.supertypes[${position}]` })
    );
    try {
      hierarchy.declareType({ name: entry.name, parameters: [...scope.values()], supertypes });
    } catch (error) {
      throw new ScenarioError(path, error instanceof Error ? error.message : String(error));
    }
  });
};

const contextInit = (
  hierarchy: TypeHierarchy,
  entry: ContextEntry,
  path: string
): ReceiverInit<string> => ({
  type: resolveTypeText({
    hierarchy,
    text: entry.type,
    scope: noTypeParameters,
    path: `${path}.type`,
  }),
  value: entry.label,
  label: entry.label,
});

const withScopes = <T>(
  stack: ReceiverStack<string>,
  scopes: readonly ReceiverInit<string>[],
  run: () => T
): T => {
  const [outermost, ...rest] = scopes;
  return outermost
    ? stack.withReceiver(outermost, () => withScopes(stack, rest, run))
    : run();
};

/**
 * Loads a scenario, records its declarations and resolves each call inside
 * the scopes it lists. User errors become diagnostics in the report; a
 * malformed scenario throws `ScenarioError`.
 */
export const runScenario = ({
  source,
  file,
  options = {},
}: {
  source: string;
  file: string;
  options?: Partial<ResolverOptions>;
}): ScenarioReport => {
  const document = parseScenario(source);
  const spans = locateEntries(source, file);
  const spanOf = (key: string, index: number): SourceSpan | undefined =>
    spans.get(key)?.[index];

  const arena = createTypeArena();
  const hierarchy = createTypeHierarchy(arena);
  const diagnostics = new DiagnosticEmitter();
  const declarations = createDeclarationTable({ arena, diagnostics });

  declareTypes(hierarchy, document);

  document.declarations.forEach((entry, index) => {
    const path = `declarations[${index}]`;
    const scope: TypeParameterScope = declareTypeParameters(
      hierarchy,
      entry.typeParameters,
      `${path}.typeParameters`
    );
    const substitution = new Map(
      Object.entries(entry.substitution).map(([name, text]) => {
        const param = scope.get(name);
        if (param === undefined) {
          throw new ScenarioError(
            `${path}.substitution.${name}`,
            `${name} is not a type parameter of ${entry.name}`
          );
        }
        const type = resolveTypeText({
          hierarchy,
          text,
          scope: noTypeParameters,
          path: `${path}.substitution.${name}`,
        });
        return [param, type] as const;
      })
    );
    declarations.declare({
      name: entry.name,
      receivers: entry.receivers.map((text, position) =>
        resolveTypeText({ hierarchy, text, scope, path: `${path}.receivers[${position}]` })
      ),
      mode: entry.mode,
      typeParameters: [...scope.values()],
      substitution,
      span: spanOf("declarations", index),
    });
  });

  const resolver = createReceiverResolver<string>({
    predicate: hierarchy,
    declarations,
    diagnostics,
    options,
  });
  const stack = new ReceiverStack<string>({
    globals: document.globals.map((entry, index) =>
      contextInit(hierarchy, entry, `globals[${index}]`)
    ),
    span: { file, start: 0, end: source.length },
  });

  const calls = document.calls.map((entry, index): CallReport => {
    const path = `calls[${index}]`;
    const span = spanOf("calls", index);
    const scopes = entry.scopes.map((scope, position) =>
      contextInit(hierarchy, scope, `${path}.scopes[${position}]`)
    );
    const receiver = entry.receiver
      ? contextInit(hierarchy, entry.receiver, `${path}.receiver`)
      : undefined;

    const verdict = withScopes(stack, scopes, () =>
      resolver.resolveCall({
        name: entry.name,
        stack: stack.current(),
        ...(receiver ? { receiver } : {}),
        ...(span ? { span } : {}),
      })
    );

    if (verdict.kind !== "resolved") {
      return {
        index,
        name: entry.name,
        verdict: verdict.kind,
        qualifiedThis: new Map<string, string | null>(),
        diagnostic: verdict.diagnostic.code,
      };
    }

    const { call } = verdict;
    const qualifiedThis = new Map(
      entry.qualifiedThis.map((label) => {
        const arg = resolver.qualifiedThis(call, label, span);
        return [label, arg ? describeArgument(arg) : null] as const;
      })
    );
    return {
      index,
      name: entry.name,
      verdict: verdict.kind,
      declaration: formatDeclarationSignature(arena, verdict.binding.declaration),
      invocation: formatSyntheticCall(call),
      this: describeArgument(call.defaultReceiver),
      qualifiedThis,
    };
  });

  return { file, calls, diagnostics: diagnostics.diagnostics };
};
