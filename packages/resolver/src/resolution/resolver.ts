import {
  DiagnosticEmitter,
  diagnosticFromCode,
  normalizeSpan,
  reportDiagnostic,
  type SourceSpan,
} from "../diagnostics/index.js";
import {
  formatDeclarationSignature,
  type DeclarationTable,
} from "../declarations/declaration-table.js";
import type { ReceiverDeclaration } from "../declarations/types.js";
import type { TypePredicate } from "../types/predicate.js";
import { resolveOptions, type ResolverOptions } from "../config.js";
import { createTracer, type ResolutionTracer } from "../trace.js";
import { constructCall, resolveThis } from "./call-construction.js";
import { crossCheckOrdered } from "./cross-check.js";
import type { ResolutionInput } from "./match.js";
import { resolveOrdered } from "./ordered.js";
import { mostSpecificBindings } from "./specificity.js";
import { resolveUnordered } from "./unordered.js";
import type {
  Binding,
  CallSite,
  CallVerdict,
  ResolutionVerdict,
  SyntheticArgument,
  SyntheticCall,
} from "./types.js";

export interface ReceiverResolver<V = unknown> {
  readonly diagnostics: DiagnosticEmitter;
  readonly options: ResolverOptions;
  /** Runs the algorithm for the declaration's mode; never reports diagnostics. */
  resolveDeclaration(
    declaration: ReceiverDeclaration,
    site: CallSite<V>
  ): ResolutionVerdict<V>;
  /** Resolves the overload set named by `site` and reports user errors. */
  resolveCall(site: CallSite<V>): CallVerdict<V>;
  /** `this` or `this@label` inside a resolved call; unknown labels report RS0004. */
  qualifiedThis(
    call: SyntheticCall<V>,
    label?: string,
    span?: SourceSpan
  ): SyntheticArgument<V> | undefined;
}

export interface ReceiverResolverInit {
  predicate: TypePredicate;
  declarations: DeclarationTable;
  diagnostics?: DiagnosticEmitter;
  options?: Partial<ResolverOptions>;
}

const capCandidates = (signatures: readonly string[], max: number): string[] =>
  signatures.length <= max
    ? [...signatures]
    : [
        ...signatures.slice(0, max),
        `and ${signatures.length - max} more`,
      ];

export const createReceiverResolver = <V = unknown>({
  predicate,
  declarations,
  diagnostics = new DiagnosticEmitter(),
  options: overrides,
}: ReceiverResolverInit): ReceiverResolver<V> => {
  const options = resolveOptions(overrides);
  const tracer: ResolutionTracer = createTracer({
    enabled: options.trace,
    sink: options.traceSink,
  });
  const arena = predicate.arena;
  const signatureOf = (declaration: ReceiverDeclaration) =>
    formatDeclarationSignature(arena, declaration);

  const resolveDeclaration = (
    declaration: ReceiverDeclaration,
    site: CallSite<V>
  ): ResolutionVerdict<V> => {
    const input: ResolutionInput<V> = { predicate, declaration, site, tracer };
    tracer.push(`candidate ${signatureOf(declaration)}`);
    try {
      if (declaration.mode === "unordered") {
        return resolveUnordered(input);
      }
      const verdict = resolveOrdered(input);
      if (options.crossCheck) {
        crossCheckOrdered(input, verdict);
      }
      return verdict;
    } finally {
      tracer.pop();
    }
  };

  const noApplicable = (
    site: CallSite<V>,
    candidates: readonly ReceiverDeclaration[]
  ): CallVerdict<V> => {
    const span = normalizeSpan(site.span);
    const diagnostic = declarations.isKnownName(site.name)
      ? reportDiagnostic({
          ctx: diagnostics,
          code: "RS0001",
          params: {
            kind: "no-applicable-declaration",
            name: site.name,
            candidates: capCandidates(
              candidates.map(signatureOf),
              options.maxDiagnosticCandidates
            ),
          },
          span,
        })
      : reportDiagnostic({
          ctx: diagnostics,
          code: "RS0003",
          params: { kind: "unknown-callable", name: site.name },
          span,
        });
    tracer.log(`verdict not-applicable (${diagnostic.code})`);
    return { kind: "not-applicable", diagnostic };
  };

  const ambiguous = (
    site: CallSite<V>,
    bindings: readonly Binding<V>[]
  ): CallVerdict<V> => {
    const signatures = bindings.map((binding) => signatureOf(binding.declaration));
    const diagnostic = reportDiagnostic({
      ctx: diagnostics,
      code: "RS0002",
      params: {
        kind: "ambiguous-overload",
        name: site.name,
        candidates: capCandidates(signatures, options.maxDiagnosticCandidates),
      },
      span: normalizeSpan(site.span),
      related: bindings.map((binding, index) =>
        diagnosticFromCode({
          code: "RS0002",
          params: {
            kind: "competing-declaration",
            signature: signatures[index] ?? binding.declaration.name,
          },
          span: binding.declaration.span,
          severity: "note",
        })
      ),
    });
    tracer.log(`verdict ambiguous between ${signatures.join(" | ")}`);
    return { kind: "ambiguous", bindings, diagnostic };
  };

  const resolveCall = (site: CallSite<V>): CallVerdict<V> => {
    const overloads = declarations.overloadSet(site.name);
    tracer.push(`call ${site.name} with ${site.stack.length} frame(s)`);
    try {
      const resolved = overloads.declarations.flatMap((declaration) => {
        const verdict = resolveDeclaration(declaration, site);
        return verdict.kind === "resolved" ? [verdict.binding] : [];
      });

      if (resolved.length === 0) {
        return noApplicable(site, overloads.declarations);
      }

      const maximal = mostSpecificBindings(predicate, resolved);
      const [winner] = maximal;
      if (maximal.length > 1 || !winner) {
        return ambiguous(site, maximal);
      }

      tracer.log(`verdict resolved to ${signatureOf(winner.declaration)}`);
      return { kind: "resolved", binding: winner, call: constructCall(arena, winner) };
    } finally {
      tracer.pop();
    }
  };

  const qualifiedThis = (
    call: SyntheticCall<V>,
    label?: string,
    span?: SourceSpan
  ): SyntheticArgument<V> | undefined => {
    const found = resolveThis(call, label);
    if (found || label === undefined) {
      return found;
    }
    reportDiagnostic({
      ctx: diagnostics,
      code: "RS0004",
      params: {
        kind: "unknown-receiver-label",
        label,
        available: [...call.qualifiedReceivers.keys()],
      },
      span: normalizeSpan(span, call.declaration.span),
    });
    return undefined;
  };

  return {
    diagnostics,
    options,
    resolveDeclaration,
    resolveCall,
    qualifiedThis,
  };
};
