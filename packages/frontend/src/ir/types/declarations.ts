/**
 * Declarations that make up the type context of a program
 */

import type { IrType } from "./ir-types.js";
import type { IrOutlives } from "./lifetimes.js";

export type IrTypeDeclaration = {
  readonly name: string;
  readonly typeParameters: readonly string[];
  readonly lifetimeParameters: readonly string[];
  /** Byte size shared by every instance and every variant */
  readonly size: number;
  /** Variant names of an enum-like declaration */
  readonly variants?: readonly string[];
};

/**
 * Type parameters are sized so that `Uninit<size(T)>` is well defined
 */
export type IrTypeParameterDeclaration = {
  readonly name: string;
  readonly size: number;
};

export type IrTraitBound = {
  readonly kind: "traitBound";
  readonly trait: string;
  readonly type: IrType;
};

export type IrWhereClause = IrTraitBound | IrOutlives;

/**
 * A concrete impl fact.
 *
 * The parameters are pattern variables matched against the queried type;
 * an impl fact never carries conditions of its own.
 */
export type IrImplFact = {
  readonly trait: string;
  readonly type: IrType;
  readonly typeParameters: readonly string[];
  readonly lifetimeParameters: readonly string[];
};

export type IrPrimitiveOperation = {
  readonly name: string;
  readonly parameters: readonly IrType[];
  readonly result: IrType;
};

export type IrFunctionSignature = {
  readonly name: string;
  readonly typeParameters: readonly IrTypeParameterDeclaration[];
  readonly lifetimeParameters: readonly string[];
  readonly parameters: readonly IrParameter[];
  readonly returnType: IrType;
  readonly whereClause: readonly IrWhereClause[];
};

export type IrParameter = {
  readonly name: string;
  readonly type: IrType;
};

export type IrStaticDeclaration = {
  readonly name: string;
  readonly type: IrType;
};
