/**
 * Context Store - the read-only type context every check consults
 *
 * Built once per program, extended once per function with that function's
 * generic parameters and where-clause postulates, and never mutated.
 */

import type {
  IrFunctionSignature,
  IrImplFact,
  IrLifetime,
  IrPrimitiveOperation,
  IrProgram,
  IrTraitBound,
  IrType,
  IrTypeDeclaration,
  IrTypeParameterDeclaration,
  IrWhereClause,
} from "@typestate/frontend";
import {
  createDiagnostic,
  error,
  formatType,
  ok,
  typeLifetimes,
  unify,
} from "@typestate/frontend";
import type { Check, VerifierOptions } from "./types.js";

export const COPY_TRAIT = "Copy";

export type ContextStore = {
  readonly types: ReadonlyMap<string, IrTypeDeclaration>;
  readonly typeParameters: ReadonlyMap<string, IrTypeParameterDeclaration>;
  readonly lifetimeParameters: ReadonlySet<string>;
  /** Where-clause trait bounds assumed while checking a generic body */
  readonly postulates: readonly IrTraitBound[];
  readonly impls: readonly IrImplFact[];
  readonly primitives: ReadonlyMap<string, IrPrimitiveOperation>;
  readonly signatures: ReadonlyMap<string, IrFunctionSignature>;
  readonly statics: ReadonlyMap<string, IrType>;
  readonly boolType: string;
};

/**
 * Byte size of a type. `"any"` for the absurd type, which fits every slot.
 */
export type Size = number | "any";

const malformed = (message: string): Check<never> =>
  error(createDiagnostic("MalformedContext", message));

const indexByName = <T extends { readonly name: string }>(
  items: readonly T[],
  what: string
): Check<ReadonlyMap<string, T>> => {
  const map = new Map<string, T>();
  for (const item of items) {
    if (map.has(item.name)) {
      return malformed(`${what} '${item.name}' is declared twice`);
    }
    map.set(item.name, item);
  }
  return ok(map);
};

/**
 * Check that a type only names declared types, in-scope parameters and
 * declared variants, with the declared arities
 */
export const checkTypeWellFormed = (
  store: ContextStore,
  type: IrType
): Check<void> => {
  switch (type.kind) {
    case "uninitType":
      return Number.isInteger(type.size) && type.size >= 0
        ? ok(undefined)
        : malformed(`invalid size in ${formatType(type)}`);

    case "absurdType":
      return ok(undefined);

    case "typeParameterType":
      return store.typeParameters.has(type.name)
        ? ok(undefined)
        : malformed(`type parameter '${type.name}' is not in scope`);

    case "userType": {
      const declaration = store.types.get(type.name);
      if (declaration === undefined) {
        return malformed(`unknown type '${type.name}'`);
      }
      if (
        declaration.typeParameters.length !== type.typeArguments.length ||
        declaration.lifetimeParameters.length !== type.lifetimeArguments.length
      ) {
        return malformed(`wrong number of arguments in ${formatType(type)}`);
      }
      if (type.variants !== undefined) {
        const declared = new Set(declaration.variants ?? []);
        const unknown = type.variants.find((v) => !declared.has(v));
        if (unknown !== undefined) {
          return malformed(`'${type.name}' has no variant '${unknown}'`);
        }
      }
      for (const arg of type.typeArguments) {
        const checked = checkTypeWellFormed(store, arg);
        if (!checked.ok) return checked;
      }
      return ok(undefined);
    }
  }
};

/**
 * Build the program-wide store
 */
export const createContextStore = (
  program: IrProgram,
  options: VerifierOptions = {}
): Check<ContextStore> => {
  const types = indexByName(program.types, "type");
  if (!types.ok) return types;
  const primitives = indexByName(program.primitives, "primitive operation");
  if (!primitives.ok) return primitives;
  const signatures = indexByName<IrFunctionSignature>(
    [...program.externs, ...program.functions],
    "function"
  );
  if (!signatures.ok) return signatures;
  const staticDeclarations = indexByName(program.statics, "static");
  if (!staticDeclarations.ok) return staticDeclarations;

  const store: ContextStore = {
    types: types.value,
    typeParameters: new Map(),
    lifetimeParameters: new Set(),
    postulates: [],
    impls: program.impls,
    primitives: primitives.value,
    signatures: signatures.value,
    statics: new Map(
      program.statics.map((s): [string, IrType] => [s.name, s.type])
    ),
    boolType: options.boolType ?? "Bool",
  };

  for (const s of program.statics) {
    const checked = checkTypeWellFormed(store, s.type);
    if (!checked.ok) return checked;
    if (s.type.kind === "uninitType" || s.type.kind === "typeParameterType") {
      return malformed(`static '${s.name}' must have an initialized type`);
    }
    if (typeLifetimes(s.type).some((l) => l.kind !== "staticLifetime")) {
      return malformed(`static '${s.name}' may only mention 'static`);
    }
  }

  // Externs have no body to check, so their signatures are scoped here.
  for (const extern of program.externs) {
    const scoped = extendContextStore(store, extern);
    if (!scoped.ok) return scoped;
  }

  return ok(store);
};

const whereClauseLifetimes = (clause: IrWhereClause): readonly IrLifetime[] => {
  switch (clause.kind) {
    case "traitBound":
      return typeLifetimes(clause.type);
    case "lifetimeOutlives":
      return [clause.longer, clause.shorter];
    case "typeOutlives":
      return [clause.shorter, ...typeLifetimes(clause.type)];
  }
};

const checkLifetimeInScope = (
  store: ContextStore,
  lifetime: IrLifetime,
  where: string
): Check<void> =>
  lifetime.kind === "staticLifetime" ||
  store.lifetimeParameters.has(lifetime.name)
    ? ok(undefined)
    : malformed(`lifetime '${lifetime.name}' in ${where} is not a parameter`);

/**
 * Extend the store with a signature's generic parameters and where-clause
 * trait postulates, for the duration of checking its body.
 *
 * Parameters are declared before any bound that mentions them; a bound
 * naming an undeclared parameter is malformed.
 */
export const extendContextStore = (
  store: ContextStore,
  signature: IrFunctionSignature
): Check<ContextStore> => {
  const typeParameters = new Map(store.typeParameters);
  for (const param of signature.typeParameters) {
    if (typeParameters.has(param.name) || store.types.has(param.name)) {
      return malformed(
        `type parameter '${param.name}' of '${signature.name}' shadows another declaration`
      );
    }
    typeParameters.set(param.name, param);
  }

  const lifetimeParameters = new Set(store.lifetimeParameters);
  for (const name of signature.lifetimeParameters) {
    if (lifetimeParameters.has(name)) {
      return malformed(
        `lifetime parameter '${name}' of '${signature.name}' is declared twice`
      );
    }
    lifetimeParameters.add(name);
  }

  const extended: ContextStore = {
    ...store,
    typeParameters,
    lifetimeParameters,
    postulates: [
      ...store.postulates,
      ...signature.whereClause.filter(
        (clause): clause is IrTraitBound => clause.kind === "traitBound"
      ),
    ],
  };

  const where = `the where-clause of '${signature.name}'`;
  for (const clause of signature.whereClause) {
    if (clause.kind !== "lifetimeOutlives") {
      const checked = checkTypeWellFormed(extended, clause.type);
      if (!checked.ok) return checked;
    }
    for (const l of whereClauseLifetimes(clause)) {
      const inScope = checkLifetimeInScope(extended, l, where);
      if (!inScope.ok) return inScope;
    }
  }

  const signatureTypes = [
    ...signature.parameters.map((p) => p.type),
    signature.returnType,
  ];
  for (const type of signatureTypes) {
    const checked = checkTypeWellFormed(extended, type);
    if (!checked.ok) return checked;
    for (const l of typeLifetimes(type)) {
      const inScope = checkLifetimeInScope(
        extended,
        l,
        `the signature of '${signature.name}'`
      );
      if (!inScope.ok) return inScope;
    }
  }

  return ok(extended);
};

/**
 * Whether `type` implements `trait`.
 *
 * True only when a matching impl fact or where-clause postulate is present.
 * Nothing is derived by search.
 */
export const holds = (
  store: ContextStore,
  type: IrType,
  trait: string
): boolean =>
  store.postulates.some(
    (p) => p.trait === trait && unify(p.type, type, [], []) !== undefined
  ) ||
  store.impls.some(
    (impl) =>
      impl.trait === trait &&
      unify(impl.type, type, impl.typeParameters, impl.lifetimeParameters) !==
        undefined
  );

export const requireBound = (
  store: ContextStore,
  type: IrType,
  trait: string
): Check<void> =>
  holds(store, type, trait)
    ? ok(undefined)
    : error(
        createDiagnostic(
          "UnresolvedTraitBound",
          `no impl or where-clause establishes ${formatType(type)}: ${trait}`
        )
      );

/**
 * Copy capability. The absurd type has no values, so duplicating one is
 * trivially allowed.
 */
export const isCopy = (store: ContextStore, type: IrType): boolean =>
  type.kind === "absurdType" || holds(store, type, COPY_TRAIT);

export const sizeOf = (store: ContextStore, type: IrType): Check<Size> => {
  switch (type.kind) {
    case "uninitType":
      return ok(type.size);
    case "absurdType":
      return ok("any");
    case "typeParameterType": {
      const param = store.typeParameters.get(type.name);
      return param
        ? ok(param.size)
        : malformed(`type parameter '${type.name}' is not in scope`);
    }
    case "userType": {
      const declaration = store.types.get(type.name);
      return declaration
        ? ok(declaration.size)
        : malformed(`unknown type '${type.name}'`);
    }
  }
};

export const sizesMatch = (a: Size, b: Size): boolean =>
  a === "any" || b === "any" || a === b;

/**
 * Every variant a type may currently hold. Non-enum types have none.
 */
export const variantsOf = (
  store: ContextStore,
  type: IrType
): readonly string[] => {
  if (type.kind !== "userType") return [];
  return type.variants ?? store.types.get(type.name)?.variants ?? [];
};

export const lookupSignature = (
  store: ContextStore,
  name: string
): Check<IrFunctionSignature> => {
  const signature = store.signatures.get(name);
  return signature
    ? ok(signature)
    : error(
        createDiagnostic(
          "UnresolvedTraitBound",
          `no signature is available for callee '${name}'`
        )
      );
};

export const lookupPrimitive = (
  store: ContextStore,
  name: string,
  arity: number
): Check<IrPrimitiveOperation> => {
  const primitive = store.primitives.get(name);
  if (primitive === undefined) {
    return error(
      createDiagnostic(
        "UnresolvedTraitBound",
        `no primitive operation named '${name}'`
      )
    );
  }
  if (primitive.parameters.length !== arity) {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `primitive '${name}' takes ${primitive.parameters.length} operands, got ${arity}`
      )
    );
  }
  return ok(primitive);
};
