import type { TypeId, TypeParamId } from "../ids.js";

export type Substitution = ReadonlyMap<TypeParamId, TypeId>;

export const emptySubstitution: Substitution = new Map();

export type TypeDescriptor = NominalType | TypeParamRef;

export interface NominalType {
  kind: "nominal";
  name: string;
  typeArgs: readonly TypeId[];
}

export interface TypeParamRef {
  kind: "type-param-ref";
  param: TypeParamId;
}

export interface TypeArena {
  get(id: TypeId): Readonly<TypeDescriptor>;
  internNominal(name: string, typeArgs?: readonly TypeId[]): TypeId;
  internTypeParamRef(param: TypeParamId): TypeId;
  freshTypeParam(name: string): TypeParamId;
  typeParamName(param: TypeParamId): string;
  substitute(type: TypeId, subst: Substitution): TypeId;
  freeTypeParams(type: TypeId): ReadonlySet<TypeParamId>;
  /** Full display form, e.g. `Map<K, List<Int>>`. */
  format(type: TypeId): string;
  /** The name `this@Name` refers to: type arguments are erased. */
  simpleName(type: TypeId): string;
}

export const createTypeArena = (): TypeArena => {
  let nextTypeId: TypeId = 0;
  let nextTypeParamId: TypeParamId = 0;

  const descriptors: TypeDescriptor[] = [];
  const descriptorCache = new Map<string, TypeId>();
  const typeParamNames: string[] = [];

  const keyFor = (desc: TypeDescriptor): string => JSON.stringify(desc);

  const storeDescriptor = (desc: TypeDescriptor): TypeId => {
    const key = keyFor(desc);
    const cached = descriptorCache.get(key);
    if (typeof cached === "number") {
      return cached;
    }

    const id = nextTypeId++;
    descriptors[id] = desc;
    descriptorCache.set(key, id);
    return id;
  };

  const getDescriptor = (id: TypeId): TypeDescriptor => {
    const desc = descriptors[id];
    if (!desc) {
      throw new Error(`unknown TypeId ${id}`);
    }

    return desc;
  };

  const internNominal = (
    name: string,
    typeArgs: readonly TypeId[] = []
  ): TypeId => {
    typeArgs.forEach(getDescriptor);
    return storeDescriptor({ kind: "nominal", name, typeArgs: [...typeArgs] });
  };

  const freshTypeParam = (name: string): TypeParamId => {
    const id = nextTypeParamId++;
    typeParamNames[id] = name;
    return id;
  };

  const typeParamName = (param: TypeParamId): string => {
    const name = typeParamNames[param];
    if (name === undefined) {
      throw new Error(`unknown TypeParamId ${param}`);
    }
    return name;
  };

  const internTypeParamRef = (param: TypeParamId): TypeId => {
    typeParamName(param);
    return storeDescriptor({ kind: "type-param-ref", param });
  };

  const substitute = (type: TypeId, subst: Substitution): TypeId => {
    if (subst.size === 0) {
      return type;
    }

    const desc = getDescriptor(type);
    switch (desc.kind) {
      case "nominal": {
        const mapped = desc.typeArgs.map((arg) => substitute(arg, subst));
        return mapped.every((arg, idx) => arg === desc.typeArgs[idx])
          ? type
          : internNominal(desc.name, mapped);
      }
      case "type-param-ref":
        return subst.get(desc.param) ?? type;
    }
  };

  const freeTypeParams = (type: TypeId): ReadonlySet<TypeParamId> => {
    const found = new Set<TypeParamId>();
    const visit = (id: TypeId): void => {
      const desc = getDescriptor(id);
      if (desc.kind === "type-param-ref") {
        found.add(desc.param);
        return;
      }
      desc.typeArgs.forEach(visit);
    };
    visit(type);
    return found;
  };

  const format = (type: TypeId): string => {
    const desc = getDescriptor(type);
    if (desc.kind === "type-param-ref") {
      return typeParamName(desc.param);
    }
    if (desc.typeArgs.length === 0) {
      return desc.name;
    }
    return `${desc.name}<${desc.typeArgs.map(format).join(", ")}>`;
  };

  const simpleName = (type: TypeId): string => {
    const desc = getDescriptor(type);
    return desc.kind === "nominal" ? desc.name : typeParamName(desc.param);
  };

  return {
    get: getDescriptor,
    internNominal,
    internTypeParamRef,
    freshTypeParam,
    typeParamName,
    substitute,
    freeTypeParams,
    format,
    simpleName,
  };
};
