/**
 * Small constructors for IR values.
 *
 * The loader produces the same shapes; these exist so that hand-built IR
 * (tests, embedding tools) stays short.
 */

import type {
  IrAbsurdType,
  IrLifetime,
  IrLocalLocation,
  IrLocation,
  IrLocationBinding,
  IrNamedLifetime,
  IrNode,
  IrNodeType,
  IrOperand,
  IrOutlives,
  IrParameterLocation,
  IrStaticLocation,
  IrTraitBound,
  IrType,
  IrTypeParameterType,
  IrUninitType,
  IrUserType,
} from "./types/index.js";
import { RETURN_LOCATION, STATIC_LIFETIME } from "./types/index.js";

export const uninit = (size: number): IrUninitType => ({
  kind: "uninitType",
  size,
});

export const absurd: IrAbsurdType = { kind: "absurdType" };

export const typeParam = (name: string): IrTypeParameterType => ({
  kind: "typeParameterType",
  name,
});

export const user = (
  name: string,
  typeArguments: readonly IrType[] = [],
  lifetimeArguments: readonly IrLifetime[] = [],
  variants?: readonly string[]
): IrUserType =>
  variants === undefined
    ? { kind: "userType", name, typeArguments, lifetimeArguments }
    : { kind: "userType", name, typeArguments, lifetimeArguments, variants };

/**
 * Refine a user type to a subset of its variants
 */
export const refine = (
  type: IrUserType,
  variants: readonly string[]
): IrUserType => ({ ...type, variants });

export const lifetime = (name: string): IrNamedLifetime => ({
  kind: "namedLifetime",
  name,
});

export const staticLifetime = STATIC_LIFETIME;

export const ret = RETURN_LOCATION;

export const local = (name: string): IrLocalLocation => ({
  kind: "localLocation",
  name,
});

export const param = (name: string): IrParameterLocation => ({
  kind: "parameterLocation",
  name,
});

export const staticLocation = (name: string): IrStaticLocation => ({
  kind: "staticLocation",
  name,
});

export const bind = (location: IrLocation, type: IrType): IrLocationBinding => ({
  location,
  type,
});

export const place = (location: IrLocation): IrOperand => ({
  kind: "place",
  location,
});

export const constant = (type: IrType): IrOperand => ({
  kind: "constant",
  type,
});

export const outlives = (
  longer: IrLifetime,
  shorter: IrLifetime
): IrOutlives => ({ kind: "lifetimeOutlives", longer, shorter });

export const typeOutlives = (type: IrType, shorter: IrLifetime): IrOutlives => ({
  kind: "typeOutlives",
  type,
  shorter,
});

export const traitBound = (trait: string, type: IrType): IrTraitBound => ({
  kind: "traitBound",
  trait,
  type,
});

export const nodeType = (
  locations: readonly IrLocationBinding[],
  lifetimes: readonly IrLifetime[] = [STATIC_LIFETIME],
  obligations: readonly IrOutlives[] = []
): IrNodeType => ({ locations, lifetimes, obligations });

export const assignNode = (
  destination: IrLocation,
  operand: IrOperand,
  next: string
): IrNode => ({
  kind: "assign",
  destination,
  value: { kind: "use", operand },
  next,
});
