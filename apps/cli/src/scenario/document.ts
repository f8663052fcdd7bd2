import type { ResolutionMode } from "@multireceiver/resolver";
import { ScenarioError } from "./errors.js";

export interface TypeEntry {
  name: string;
  parameters: readonly string[];
  supertypes: readonly string[];
}

export interface ContextEntry {
  label: string;
  type: string;
}

export interface DeclarationEntry {
  name: string;
  receivers: readonly string[];
  mode: ResolutionMode;
  typeParameters: readonly string[];
  /** Instantiates the declaration before it is recorded, e.g. `{ "T": "Int" }`. */
  substitution: Readonly<Record<string, string>>;
}

export interface CallEntry {
  name: string;
  /** Receivers entered around the call, outermost first. */
  scopes: readonly ContextEntry[];
  receiver?: ContextEntry;
  /** `this@Label` lookups to perform inside the resolved call. */
  qualifiedThis: readonly string[];
}

export interface ScenarioDocument {
  types: readonly TypeEntry[];
  globals: readonly ContextEntry[];
  declarations: readonly DeclarationEntry[];
  calls: readonly CallEntry[];
}

type JsonRecord = Record<string, unknown>;

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const describe = (value: unknown): string => {
  if (value === undefined) return "nothing";
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return typeof value === "object" ? "an object" : `a ${typeof value}`;
};

const expectRecord = (value: unknown, path: string): JsonRecord => {
  if (!isRecord(value)) {
    throw new ScenarioError(path, `expected an object, found ${describe(value)}`);
  }
  return value;
};

const expectString = (value: unknown, path: string): string => {
  if (typeof value !== "string" || value.length === 0) {
    throw new ScenarioError(path, `expected a non-empty string, found ${describe(value)}`);
  }
  return value;
};

const listOf = <T>(
  value: unknown,
  path: string,
  read: (item: unknown, path: string) => T
): T[] => {
  if (value === undefined) return [];
  if (!Array.isArray(value)) {
    throw new ScenarioError(path, `expected an array, found ${describe(value)}`);
  }
  return value.map((item, index) => read(item, `${path}[${index}]`));
};

const readMode = (value: unknown, path: string): ResolutionMode => {
  if (value === undefined) return "ordered";
  if (value === "ordered" || value === "unordered") return value;
  throw new ScenarioError(path, `expected "ordered" or "unordered", found ${JSON.stringify(value)}`);
};

const readTypeEntry = (value: unknown, path: string): TypeEntry => {
  const record = expectRecord(value, path);
  return {
    name: expectString(record.name, `${path}.name`),
    parameters: listOf(record.parameters, `${path}.parameters`, expectString),
    supertypes: listOf(record.supertypes, `${path}.supertypes`, expectString),
  };
};

const readContext = (value: unknown, path: string): ContextEntry => {
  const record = expectRecord(value, path);
  return {
    label: expectString(record.label, `${path}.label`),
    type: expectString(record.type, `${path}.type`),
  };
};

const readSubstitution = (value: unknown, path: string): Record<string, string> => {
  if (value === undefined) return {};
  const record = expectRecord(value, path);
  return Object.fromEntries(
    Object.entries(record).map(([param, type]) => [
      param,
      expectString(type, `${path}.${param}`),
    ])
  );
};

const readDeclaration = (value: unknown, path: string): DeclarationEntry => {
  const record = expectRecord(value, path);
  return {
    name: expectString(record.name, `${path}.name`),
    receivers: listOf(record.receivers, `${path}.receivers`, expectString),
    mode: readMode(record.mode, `${path}.mode`),
    typeParameters: listOf(record.typeParameters, `${path}.typeParameters`, expectString),
    substitution: readSubstitution(record.substitution, `${path}.substitution`),
  };
};

const readCall = (value: unknown, path: string): CallEntry => {
  const record = expectRecord(value, path);
  const call: CallEntry = {
    name: expectString(record.name, `${path}.name`),
    scopes: listOf(record.scopes, `${path}.scopes`, readContext),
    qualifiedThis: listOf(record.this, `${path}.this`, expectString),
  };
  return record.receiver === undefined
    ? call
    : { ...call, receiver: readContext(record.receiver, `${path}.receiver`) };
};

/** Parses and validates a scenario file's contents. */
export const parseScenario = (source: string): ScenarioDocument => {
  let json: unknown;
  try {
    json = JSON.parse(source);
  } catch (error) {
    throw new ScenarioError("", `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }

  const root = expectRecord(json, "scenario");
  return {
    types: listOf(root.types, "types", readTypeEntry),
    globals: listOf(root.globals, "globals", readContext),
    declarations: listOf(root.declarations, "declarations", readDeclaration),
    calls: listOf(root.calls, "calls", readCall),
  };
};
