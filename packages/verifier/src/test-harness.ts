/**
 * Test harness for verifier tests.
 * A small prelude of declarations and helpers to assemble functions from
 * builder values.
 */

import type {
  IrFunction,
  IrLabeledNode,
  IrLocationBinding,
  IrNode,
  IrNodeType,
  IrOutlives,
  IrParameter,
  IrProgram,
  IrType,
  IrTypeParameterDeclaration,
  IrWhereClause,
} from "@typestate/frontend";
import { builders } from "@typestate/frontend";
import type { ContextStore } from "./context-store.js";
import { createContextStore, extendContextStore } from "./context-store.js";
import { createLocationContext } from "./location-context.js";
import { createLifetimeContext } from "./obligations.js";
import type { FlowState } from "./types.js";

const { user, typeParam, lifetime, staticLifetime } = builders;

export const INT = user("Int");
export const BOOL = user("Bool");
export const VEC = user("Vec");
export const refTo = (name: string, target: IrType): IrType =>
  user("Ref", [target], [lifetime(name)]);
export const option = (target: IrType, variants?: readonly string[]): IrType =>
  user("Option", [target], [], variants);

/**
 * Int and Bool are Copy, Vec is linear, Ref is a Copy borrow and Option an
 * enum
 */
export const PRELUDE: IrProgram = {
  types: [
    { name: "Int", typeParameters: [], lifetimeParameters: [], size: 4 },
    {
      name: "Bool",
      typeParameters: [],
      lifetimeParameters: [],
      size: 1,
      variants: ["True", "False"],
    },
    { name: "Vec", typeParameters: [], lifetimeParameters: [], size: 16 },
    { name: "Ref", typeParameters: ["T"], lifetimeParameters: ["a"], size: 8 },
    {
      name: "Option",
      typeParameters: ["T"],
      lifetimeParameters: [],
      size: 24,
      variants: ["Some", "None"],
    },
  ],
  statics: [],
  impls: [
    { trait: "Copy", type: INT, typeParameters: [], lifetimeParameters: [] },
    { trait: "Copy", type: BOOL, typeParameters: [], lifetimeParameters: [] },
    {
      trait: "Copy",
      type: user("Ref", [typeParam("T")], [lifetime("r")]),
      typeParameters: ["T"],
      lifetimeParameters: ["r"],
    },
  ],
  primitives: [
    { name: "add", parameters: [INT, INT], result: INT },
    { name: "lt", parameters: [INT, INT], result: BOOL },
    { name: "not", parameters: [BOOL], result: BOOL },
  ],
  externs: [],
  functions: [],
};

export type FunctionShape = {
  readonly name?: string;
  readonly typeParameters?: readonly IrTypeParameterDeclaration[];
  readonly lifetimeParameters?: readonly string[];
  readonly parameters?: readonly IrParameter[];
  readonly returnType?: IrType;
  readonly whereClause?: readonly IrWhereClause[];
  readonly locals?: readonly string[];
  readonly labels: readonly (readonly [string, IrLabeledNode])[];
};

export const makeFunction = (shape: FunctionShape): IrFunction => ({
  name: shape.name ?? "f",
  typeParameters: shape.typeParameters ?? [],
  lifetimeParameters: shape.lifetimeParameters ?? [],
  parameters: shape.parameters ?? [],
  returnType: shape.returnType ?? INT,
  whereClause: shape.whereClause ?? [],
  locals: shape.locals ?? [],
  labels: new Map(shape.labels),
});

export const at = (
  locations: readonly IrLocationBinding[],
  node: IrNode,
  lifetimes: readonly string[] = [],
  obligations: readonly IrOutlives[] = []
): IrLabeledNode => {
  const nodeType: IrNodeType = {
    locations,
    lifetimes: [staticLifetime, ...lifetimes.map((l) => lifetime(l))],
    obligations,
  };
  return { nodeType, node };
};

export const unwrapOk = <T>(
  result: { readonly ok: true; readonly value: T } | { readonly ok: false }
): T => {
  if (!result.ok) {
    throw new Error("expected an ok result");
  }
  return result.value;
};

export const preludeStore = (
  overrides: Partial<IrProgram> = {}
): ContextStore => unwrapOk(createContextStore({ ...PRELUDE, ...overrides }));

/**
 * Store extended with a function's generic parameters
 */
export const storeFor = (
  fn: IrFunction,
  overrides: Partial<IrProgram> = {}
): ContextStore => unwrapOk(extendContextStore(preludeStore(overrides), fn));

/**
 * FlowState with 'static and the named lifetimes active
 */
export const flow = (
  bindings: readonly IrLocationBinding[],
  lifetimes: readonly string[] = [],
  obligations: readonly IrOutlives[] = []
): FlowState => ({
  locations: unwrapOk(createLocationContext(bindings)),
  lifetimes: unwrapOk(
    createLifetimeContext([staticLifetime, ...lifetimes.map((l) => lifetime(l))])
  ),
  obligations,
});
