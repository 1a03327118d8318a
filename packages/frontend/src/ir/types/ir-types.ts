/**
 * Type system types for IR (IrType and its variants)
 *
 * A type lives in a context, never on a location: the same location may be
 * `Uninit<8>` at one label and `Pair<Int, Int>` at the next.
 */

import type { IrLifetime } from "./lifetimes.js";

export type IrType =
  | IrUninitType
  | IrAbsurdType
  | IrTypeParameterType
  | IrUserType;

/**
 * Sized placeholder for an uninitialized location, indexed only by byte size
 */
export type IrUninitType = {
  readonly kind: "uninitType";
  readonly size: number;
};

/**
 * The uninhabited type.
 *
 * Valid at any size and at any location. A context holding it is a witness
 * that control cannot reach the point it describes.
 */
export type IrAbsurdType = {
  readonly kind: "absurdType";
};

/**
 * Type parameter reference (e.g., T in Pair<T, T>)
 */
export type IrTypeParameterType = {
  readonly kind: "typeParameterType";
  readonly name: string;
};

/**
 * Instance of a declared user type.
 *
 * `variants` refines an enum-like declaration to a subset of its variant
 * names. Undefined means every declared variant is possible.
 */
export type IrUserType = {
  readonly kind: "userType";
  readonly name: string;
  readonly typeArguments: readonly IrType[];
  readonly lifetimeArguments: readonly IrLifetime[];
  readonly variants?: readonly string[];
};
