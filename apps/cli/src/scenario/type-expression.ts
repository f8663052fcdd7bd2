import type { TypeArena, TypeHierarchy, TypeId, TypeParamId } from "@multireceiver/resolver";
import { ScenarioError } from "./errors.js";

export interface TypeExpression {
  name: string;
  args: readonly TypeExpression[];
}

const IDENTIFIER = /[A-Za-z_][A-Za-z0-9_]*/y;

/** Parses `Name` or `Name<Arg, ...>`, e.g. `Map<K, List<Int>>`. */
export const parseTypeExpression = (text: string, path = ""): TypeExpression => {
  let index = 0;

  const fail = (reason: string): never => {
    throw new ScenarioError(path, `invalid type "${text}": ${reason} at ${index}`);
  };

  const skipSpaces = () => {
    while (text[index] === " ") index += 1;
  };

  const parseType = (): TypeExpression => {
    skipSpaces();
    IDENTIFIER.lastIndex = index;
    const match = IDENTIFIER.exec(text);
    if (!match) {
      return fail("expected a type name");
    }
    const name = match[0];
    index += name.length;
    skipSpaces();

    const args: TypeExpression[] = [];
    if (text[index] === "<") {
      index += 1;
      args.push(parseType());
      skipSpaces();
      while (text[index] === ",") {
        index += 1;
        args.push(parseType());
        skipSpaces();
      }
      if (text[index] !== ">") {
        return fail("expected `>`");
      }
      index += 1;
      skipSpaces();
    }
    return { name, args };
  };

  const parsed = parseType();
  if (index !== text.length) {
    fail("unexpected trailing input");
  }
  return parsed;
};

export type TypeParameterScope = ReadonlyMap<string, TypeParamId>;

/**
 * Interns a parsed type. Names in `scope` are type parameters; every other
 * name must already be declared in the hierarchy.
 */
export const internTypeExpression = ({
  hierarchy,
  expression,
  scope,
  path,
}: {
  hierarchy: TypeHierarchy;
  expression: TypeExpression;
  scope: TypeParameterScope;
  path: string;
}): TypeId => {
  const arena: TypeArena = hierarchy.arena;
  const param = scope.get(expression.name);
  if (param !== undefined) {
    if (expression.args.length > 0) {
      throw new ScenarioError(
        path,
        `type parameter ${expression.name} cannot take type arguments`
      );
    }
    return arena.internTypeParamRef(param);
  }

  const args = expression.args.map((arg) =>
    internTypeExpression({ hierarchy, expression: arg, scope, path })
  );
  try {
    return hierarchy.instantiate(expression.name, args);
  } catch (error) {
    throw new ScenarioError(path, error instanceof Error ? error.message : String(error));
  }
};

export const resolveTypeText = (options: {
  hierarchy: TypeHierarchy;
  text: string;
  scope: TypeParameterScope;
  path: string;
}): TypeId =>
  internTypeExpression({
    ...options,
    expression: parseTypeExpression(options.text, options.path),
  });
