/**
 * Program document loader
 *
 * Reads a lowered program (YAML, or JSON which YAML accepts) and resolves it
 * into IR: types are parsed from their compact notation, location names are
 * resolved against the enclosing function, and every shape problem becomes
 * an InvalidProgram diagnostic naming the key path.
 */

import YAML from "yaml";
import type {
  IrFunction,
  IrFunctionSignature,
  IrImplFact,
  IrLabeledNode,
  IrLifetime,
  IrLocation,
  IrLocationBinding,
  IrNode,
  IrNodeType,
  IrOperand,
  IrOutlives,
  IrPrimitiveOperation,
  IrProgram,
  IrRvalue,
  IrStaticDeclaration,
  IrType,
  IrTypeDeclaration,
  IrTypeParameterDeclaration,
  IrWhereClause,
} from "../ir/types/index.js";
import { EXIT_LABEL, RETURN_LOCATION } from "../ir/types/index.js";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";
import type { TypeScope } from "./type-parser.js";
import {
  parseLifetime,
  parseType,
  parseWhereClause,
} from "./type-parser.js";

class LoadError extends Error {
  constructor(
    readonly path: string,
    message: string
  ) {
    super(message);
    this.name = "LoadError";
  }
}

type Fields = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is Fields =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const asRecord = (value: unknown, path: string): Fields => {
  if (!isRecord(value)) {
    throw new LoadError(path, "expected a mapping");
  }
  return value;
};

const checkKeys = (
  record: Fields,
  allowed: readonly string[],
  path: string
): void => {
  for (const key of Object.keys(record)) {
    if (!allowed.includes(key)) {
      throw new LoadError(`${path}.${key}`, `unknown key '${key}'`);
    }
  }
};

const asArray = (value: unknown, path: string): readonly unknown[] => {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new LoadError(path, "expected a list");
  }
  return value;
};

const asString = (value: unknown, path: string): string => {
  if (typeof value !== "string" || value.length === 0) {
    throw new LoadError(path, "expected a non-empty string");
  }
  return value;
};

const asSize = (value: unknown, path: string): number => {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new LoadError(path, "expected a non-negative integer size");
  }
  return value;
};

const asStringList = (value: unknown, path: string): readonly string[] =>
  asArray(value, path).map((item, i) => asString(item, `${path}[${i}]`));

const unwrap = <T>(result: Result<T, string>, path: string): T => {
  if (!result.ok) {
    throw new LoadError(path, result.error);
  }
  return result.value;
};

const checkUnique = (names: readonly string[], path: string): void => {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new LoadError(path, `'${name}' is declared twice`);
    }
    seen.add(name);
  }
};

/**
 * Lifetime names are accepted with or without the leading quote
 */
const readLifetime = (value: unknown, path: string): IrLifetime => {
  const text = asString(value, path);
  return unwrap(parseLifetime(text.startsWith("'") ? text : `'${text}`), path);
};

const readLifetimeParameters = (
  value: unknown,
  path: string
): readonly string[] => {
  const names = asArray(value, path).map((item, i) => {
    const lifetime = readLifetime(item, `${path}[${i}]`);
    if (lifetime.kind === "staticLifetime") {
      throw new LoadError(`${path}[${i}]`, "'static is not a parameter");
    }
    return lifetime.name;
  });
  checkUnique(names, path);
  return names;
};

const withTypeParameters = (
  scope: TypeScope,
  names: readonly string[]
): TypeScope => ({
  ...scope,
  typeParameters: new Set([...scope.typeParameters, ...names]),
});

const readType = (value: unknown, scope: TypeScope, path: string): IrType =>
  unwrap(parseType(asString(value, path), scope), path);

const readOutlives = (
  value: unknown,
  scope: TypeScope,
  path: string
): IrOutlives => {
  const clause = unwrap(parseWhereClause(asString(value, path), scope), path);
  if (clause.kind === "traitBound") {
    throw new LoadError(path, "expected an outlives fact, found a trait bound");
  }
  return clause;
};

const readTypeDeclaration = (
  value: unknown,
  path: string
): IrTypeDeclaration => {
  const record = asRecord(value, path);
  checkKeys(
    record,
    ["name", "typeParameters", "lifetimeParameters", "size", "variants"],
    path
  );
  const typeParameters = asStringList(
    record.typeParameters,
    `${path}.typeParameters`
  );
  checkUnique(typeParameters, `${path}.typeParameters`);
  const declaration: IrTypeDeclaration = {
    name: asString(record.name, `${path}.name`),
    typeParameters,
    lifetimeParameters: readLifetimeParameters(
      record.lifetimeParameters,
      `${path}.lifetimeParameters`
    ),
    size: asSize(record.size, `${path}.size`),
  };
  if (record.variants === undefined) {
    return declaration;
  }
  const variants = asStringList(record.variants, `${path}.variants`);
  checkUnique(variants, `${path}.variants`);
  return { ...declaration, variants };
};

const readTypeParameters = (
  value: unknown,
  path: string
): readonly IrTypeParameterDeclaration[] => {
  const params = asArray(value, path).map((item, i) => {
    const itemPath = `${path}[${i}]`;
    const record = asRecord(item, itemPath);
    checkKeys(record, ["name", "size"], itemPath);
    return {
      name: asString(record.name, `${itemPath}.name`),
      size: asSize(record.size, `${itemPath}.size`),
    };
  });
  checkUnique(
    params.map((p) => p.name),
    path
  );
  return params;
};

const readSignature = (
  record: Fields,
  scope: TypeScope,
  path: string
): IrFunctionSignature => {
  const typeParameters = readTypeParameters(
    record.typeParameters,
    `${path}.typeParameters`
  );
  const inner = withTypeParameters(
    scope,
    typeParameters.map((p) => p.name)
  );
  const parameters = asArray(record.parameters, `${path}.parameters`).map(
    (item, i) => {
      const itemPath = `${path}.parameters[${i}]`;
      const param = asRecord(item, itemPath);
      checkKeys(param, ["name", "type"], itemPath);
      return {
        name: asString(param.name, `${itemPath}.name`),
        type: readType(param.type, inner, `${itemPath}.type`),
      };
    }
  );
  checkUnique(
    parameters.map((p) => p.name),
    `${path}.parameters`
  );
  const whereClause: IrWhereClause[] = asArray(
    record.where,
    `${path}.where`
  ).map((item, i) =>
    unwrap(
      parseWhereClause(asString(item, `${path}.where[${i}]`), inner),
      `${path}.where[${i}]`
    )
  );

  return {
    name: asString(record.name, `${path}.name`),
    typeParameters,
    lifetimeParameters: readLifetimeParameters(
      record.lifetimeParameters,
      `${path}.lifetimeParameters`
    ),
    parameters,
    returnType: readType(record.returnType, inner, `${path}.returnType`),
    whereClause,
  };
};

const SIGNATURE_KEYS = [
  "name",
  "typeParameters",
  "lifetimeParameters",
  "parameters",
  "returnType",
  "where",
];

type LocationScope = ReadonlyMap<string, IrLocation>;

const readLocation = (
  value: unknown,
  locations: LocationScope,
  path: string
): IrLocation => {
  const name = asString(value, path);
  const location = locations.get(name);
  if (location === undefined) {
    throw new LoadError(path, `unknown location '${name}'`);
  }
  return location;
};

/**
 * A bare string names a location; `{ const: Type }` is a constant
 */
const readOperand = (
  value: unknown,
  scope: TypeScope,
  locations: LocationScope,
  path: string
): IrOperand => {
  if (typeof value === "string") {
    return { kind: "place", location: readLocation(value, locations, path) };
  }
  const record = asRecord(value, path);
  checkKeys(record, ["const"], path);
  return {
    kind: "constant",
    type: readType(record.const, scope, `${path}.const`),
  };
};

const readRvalue = (
  value: unknown,
  scope: TypeScope,
  locations: LocationScope,
  path: string
): IrRvalue => {
  const record = asRecord(value, path);
  if ("use" in record) {
    checkKeys(record, ["use"], path);
    return {
      kind: "use",
      operand: readOperand(record.use, scope, locations, `${path}.use`),
    };
  }
  if ("unary" in record) {
    checkKeys(record, ["unary", "operand"], path);
    return {
      kind: "unary",
      operator: asString(record.unary, `${path}.unary`),
      operand: readOperand(record.operand, scope, locations, `${path}.operand`),
    };
  }
  if ("binary" in record) {
    checkKeys(record, ["binary", "left", "right"], path);
    return {
      kind: "binary",
      operator: asString(record.binary, `${path}.binary`),
      left: readOperand(record.left, scope, locations, `${path}.left`),
      right: readOperand(record.right, scope, locations, `${path}.right`),
    };
  }
  throw new LoadError(path, "expected one of 'use', 'unary' or 'binary'");
};

const readNode = (
  value: unknown,
  scope: TypeScope,
  locations: LocationScope,
  path: string
): IrNode => {
  const record = asRecord(value, path);
  const kind = asString(record.kind, `${path}.kind`);
  const label = (key: string): string => asString(record[key], `${path}.${key}`);

  switch (kind) {
    case "assign":
      checkKeys(record, ["kind", "destination", "value", "next"], path);
      return {
        kind: "assign",
        destination: readLocation(
          record.destination,
          locations,
          `${path}.destination`
        ),
        value: readRvalue(record.value, scope, locations, `${path}.value`),
        next: label("next"),
      };

    case "call":
      checkKeys(
        record,
        [
          "kind",
          "destination",
          "callee",
          "typeArguments",
          "lifetimeArguments",
          "arguments",
          "next",
        ],
        path
      );
      return {
        kind: "call",
        destination: readLocation(
          record.destination,
          locations,
          `${path}.destination`
        ),
        callee: label("callee"),
        typeArguments: asArray(
          record.typeArguments,
          `${path}.typeArguments`
        ).map((item, i) => readType(item, scope, `${path}.typeArguments[${i}]`)),
        lifetimeArguments: asArray(
          record.lifetimeArguments,
          `${path}.lifetimeArguments`
        ).map((item, i) =>
          readLifetime(item, `${path}.lifetimeArguments[${i}]`)
        ),
        arguments: asArray(record.arguments, `${path}.arguments`).map(
          (item, i) =>
            readOperand(item, scope, locations, `${path}.arguments[${i}]`)
        ),
        next: label("next"),
      };

    case "if":
      checkKeys(record, ["kind", "condition", "then", "else"], path);
      return {
        kind: "if",
        condition: readOperand(
          record.condition,
          scope,
          locations,
          `${path}.condition`
        ),
        then: label("then"),
        else: label("else"),
      };

    case "switch":
      checkKeys(record, ["kind", "location", "staticType", "branches"], path);
      return {
        kind: "switch",
        location: readLocation(record.location, locations, `${path}.location`),
        staticType: readType(record.staticType, scope, `${path}.staticType`),
        branches: asArray(record.branches, `${path}.branches`).map(
          (item, i) => {
            const branchPath = `${path}.branches[${i}]`;
            const branch = asRecord(item, branchPath);
            checkKeys(branch, ["label", "type"], branchPath);
            return {
              label: asString(branch.label, `${branchPath}.label`),
              type: readType(branch.type, scope, `${branchPath}.type`),
            };
          }
        ),
      };

    case "drop":
      checkKeys(record, ["kind", "location", "next"], path);
      return {
        kind: "drop",
        location: readLocation(record.location, locations, `${path}.location`),
        next: label("next"),
      };

    case "lifetimeBegin":
      checkKeys(record, ["kind", "lifetime", "next"], path);
      return {
        kind: "lifetimeBegin",
        lifetime: readLifetime(record.lifetime, `${path}.lifetime`),
        next: label("next"),
      };

    case "lifetimeEnd":
      checkKeys(record, ["kind", "lifetime", "next"], path);
      return {
        kind: "lifetimeEnd",
        lifetime: readLifetime(record.lifetime, `${path}.lifetime`),
        next: label("next"),
      };

    case "deadCode":
      checkKeys(record, ["kind"], path);
      return { kind: "deadCode" };

    default:
      throw new LoadError(`${path}.kind`, `unknown node kind '${kind}'`);
  }
};

const readNodeType = (
  record: Fields,
  scope: TypeScope,
  locations: LocationScope,
  path: string
): IrNodeType => {
  const context = asRecord(record.context ?? {}, `${path}.context`);
  const bindings: IrLocationBinding[] = Object.entries(context).map(
    ([name, type]) => ({
      location: readLocation(name, locations, `${path}.context.${name}`),
      type: readType(type, scope, `${path}.context.${name}`),
    })
  );
  return {
    locations: bindings,
    lifetimes: asArray(record.lifetimes, `${path}.lifetimes`).map((item, i) =>
      readLifetime(item, `${path}.lifetimes[${i}]`)
    ),
    obligations: asArray(record.obligations, `${path}.obligations`).map(
      (item, i) => readOutlives(item, scope, `${path}.obligations[${i}]`)
    ),
  };
};

const readFunction = (
  value: unknown,
  scope: TypeScope,
  statics: readonly IrStaticDeclaration[],
  path: string
): IrFunction => {
  const record = asRecord(value, path);
  checkKeys(record, [...SIGNATURE_KEYS, "locals", "labels"], path);
  const signature = readSignature(record, scope, path);
  const locals = asStringList(record.locals, `${path}.locals`);

  const names = [
    ...signature.parameters.map((p) => p.name),
    ...locals,
    ...statics.map((s) => s.name),
  ];
  checkUnique(names, `${path}.locals`);
  if (names.includes("ret")) {
    throw new LoadError(path, "'ret' names the return slot");
  }

  const locations = new Map<string, IrLocation>([["ret", RETURN_LOCATION]]);
  for (const s of statics) {
    locations.set(s.name, { kind: "staticLocation", name: s.name });
  }
  for (const p of signature.parameters) {
    locations.set(p.name, { kind: "parameterLocation", name: p.name });
  }
  for (const l of locals) {
    locations.set(l, { kind: "localLocation", name: l });
  }

  const inner = withTypeParameters(
    scope,
    signature.typeParameters.map((p) => p.name)
  );
  const labelRecords = asRecord(record.labels ?? {}, `${path}.labels`);
  const labels = new Map<string, IrLabeledNode>();
  for (const [label, entry] of Object.entries(labelRecords)) {
    const labelPath = `${path}.labels.${label}`;
    if (label === EXIT_LABEL) {
      throw new LoadError(labelPath, "'exit' cannot be defined");
    }
    const labelRecord = asRecord(entry, labelPath);
    checkKeys(
      labelRecord,
      ["context", "lifetimes", "obligations", "node"],
      labelPath
    );
    labels.set(label, {
      nodeType: readNodeType(labelRecord, inner, locations, labelPath),
      node: readNode(labelRecord.node, inner, locations, `${labelPath}.node`),
    });
  }

  return { ...signature, locals, labels };
};

const readProgram = (document: unknown): IrProgram => {
  const root = asRecord(document ?? {}, "$");
  checkKeys(
    root,
    ["types", "statics", "impls", "primitives", "externs", "functions"],
    "$"
  );

  const types = asArray(root.types, "$.types").map((item, i) =>
    readTypeDeclaration(item, `$.types[${i}]`)
  );
  checkUnique(
    types.map((t) => t.name),
    "$.types"
  );

  const scope: TypeScope = {
    typeParameters: new Set(),
    userTypes: new Map(
      types.map((t): [string, { lifetimes: number; types: number }] => [
        t.name,
        { lifetimes: t.lifetimeParameters.length, types: t.typeParameters.length },
      ])
    ),
  };

  const statics = asArray(root.statics, "$.statics").map((item, i) => {
    const itemPath = `$.statics[${i}]`;
    const record = asRecord(item, itemPath);
    checkKeys(record, ["name", "type"], itemPath);
    return {
      name: asString(record.name, `${itemPath}.name`),
      type: readType(record.type, scope, `${itemPath}.type`),
    };
  });

  const impls: IrImplFact[] = asArray(root.impls, "$.impls").map((item, i) => {
    const itemPath = `$.impls[${i}]`;
    const record = asRecord(item, itemPath);
    checkKeys(
      record,
      ["trait", "type", "typeParameters", "lifetimeParameters"],
      itemPath
    );
    const typeParameters = asStringList(
      record.typeParameters,
      `${itemPath}.typeParameters`
    );
    return {
      trait: asString(record.trait, `${itemPath}.trait`),
      type: readType(
        record.type,
        withTypeParameters(scope, typeParameters),
        `${itemPath}.type`
      ),
      typeParameters,
      lifetimeParameters: readLifetimeParameters(
        record.lifetimeParameters,
        `${itemPath}.lifetimeParameters`
      ),
    };
  });

  const primitives: IrPrimitiveOperation[] = asArray(
    root.primitives,
    "$.primitives"
  ).map((item, i) => {
    const itemPath = `$.primitives[${i}]`;
    const record = asRecord(item, itemPath);
    checkKeys(record, ["name", "parameters", "result"], itemPath);
    const parameters = asArray(record.parameters, `${itemPath}.parameters`);
    if (parameters.length < 1 || parameters.length > 2) {
      throw new LoadError(
        `${itemPath}.parameters`,
        "primitive operations are unary or binary"
      );
    }
    return {
      name: asString(record.name, `${itemPath}.name`),
      parameters: parameters.map((p, j) =>
        readType(p, scope, `${itemPath}.parameters[${j}]`)
      ),
      result: readType(record.result, scope, `${itemPath}.result`),
    };
  });

  const externs = asArray(root.externs, "$.externs").map((item, i) => {
    const itemPath = `$.externs[${i}]`;
    const record = asRecord(item, itemPath);
    checkKeys(record, SIGNATURE_KEYS, itemPath);
    return readSignature(record, scope, itemPath);
  });

  const functions = asArray(root.functions, "$.functions").map((item, i) =>
    readFunction(item, scope, statics, `$.functions[${i}]`)
  );
  checkUnique(
    [...externs.map((e) => e.name), ...functions.map((f) => f.name)],
    "$.functions"
  );

  return { types, statics, impls, primitives, externs, functions };
};

/**
 * Parse a program document into IR
 */
export const parseProgramDocument = (
  text: string,
  fileName: string
): Result<IrProgram, Diagnostic> => {
  let document: unknown;
  try {
    document = YAML.parse(text);
  } catch (err) {
    return error(
      createDiagnostic(
        "InvalidProgram",
        `Failed to parse ${fileName}: ${err instanceof Error ? err.message : String(err)}`,
        { rule: "load", source: { file: fileName, path: "$" } }
      )
    );
  }

  try {
    return ok(readProgram(document));
  } catch (err) {
    if (err instanceof LoadError) {
      return error(
        createDiagnostic("InvalidProgram", err.message, {
          rule: "load",
          source: { file: fileName, path: err.path },
        })
      );
    }
    throw err;
  }
};
