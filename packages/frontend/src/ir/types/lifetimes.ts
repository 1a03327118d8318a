/**
 * Lifetimes and outlives facts
 */

import type { IrType } from "./ir-types.js";

export type IrLifetime = IrStaticLifetime | IrNamedLifetime;

export type IrStaticLifetime = {
  readonly kind: "staticLifetime";
};

/**
 * A function-local lifetime or a lifetime parameter
 */
export type IrNamedLifetime = {
  readonly kind: "namedLifetime";
  readonly name: string;
};

/**
 * `longer : shorter` - the longer lifetime does not end before the shorter
 */
export type IrLifetimeOutlives = {
  readonly kind: "lifetimeOutlives";
  readonly longer: IrLifetime;
  readonly shorter: IrLifetime;
};

/**
 * `type : shorter` - every lifetime the type mentions outlives `shorter`
 */
export type IrTypeOutlives = {
  readonly kind: "typeOutlives";
  readonly type: IrType;
  readonly shorter: IrLifetime;
};

export type IrOutlives = IrLifetimeOutlives | IrTypeOutlives;

export const STATIC_LIFETIME: IrStaticLifetime = { kind: "staticLifetime" };

export const lifetimeKey = (lifetime: IrLifetime): string =>
  lifetime.kind === "staticLifetime" ? "'static" : `'${lifetime.name}`;

export const lifetimesEqual = (a: IrLifetime, b: IrLifetime): boolean =>
  lifetimeKey(a) === lifetimeKey(b);
