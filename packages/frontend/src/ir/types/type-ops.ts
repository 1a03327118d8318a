import type { IrType } from "./ir-types.js";
import type { IrLifetime, IrOutlives } from "./lifetimes.js";
import { lifetimeKey } from "./lifetimes.js";
import type { IrWhereClause } from "./declarations.js";

const variantsKey = (variants: readonly string[] | undefined): string =>
  variants === undefined ? "*" : [...new Set(variants)].sort().join("|");

/**
 * Structural key of a type. Two types are equal iff their keys are equal;
 * variant refinements compare as sets.
 */
export const stableIrTypeKey = (type: IrType): string => {
  switch (type.kind) {
    case "uninitType":
      return `uninit:${type.size}`;
    case "absurdType":
      return "absurd";
    case "typeParameterType":
      return `tp:${type.name}`;
    case "userType": {
      const lifetimes = type.lifetimeArguments.map(lifetimeKey).join(",");
      const args = type.typeArguments.map(stableIrTypeKey).join(",");
      return `user:${type.name}<${lifetimes};${args}>{${variantsKey(type.variants)}}`;
    }
  }
};

export const typesEqual = (a: IrType, b: IrType): boolean =>
  stableIrTypeKey(a) === stableIrTypeKey(b);

/**
 * Every lifetime a type mentions, arguments of nested types included
 */
export const typeLifetimes = (type: IrType): readonly IrLifetime[] => {
  switch (type.kind) {
    case "uninitType":
    case "absurdType":
    case "typeParameterType":
      return [];
    case "userType":
      return [
        ...type.lifetimeArguments,
        ...type.typeArguments.flatMap((arg) => typeLifetimes(arg)),
      ];
  }
};

export const typeMentionsLifetime = (
  type: IrType,
  lifetime: IrLifetime
): boolean => {
  const key = lifetimeKey(lifetime);
  return typeLifetimes(type).some((l) => lifetimeKey(l) === key);
};

export const isOutlivesBound = (clause: IrWhereClause): clause is IrOutlives =>
  clause.kind === "lifetimeOutlives" || clause.kind === "typeOutlives";
