/**
 * IR Type Substitution Module
 *
 * Instantiates generic signatures and matches impl-fact patterns.
 *
 * Key functions:
 * - createSubstitution: Pair declared parameters with supplied arguments
 * - substituteIrType: Apply type and lifetime parameter substitutions
 * - unify: Match a pattern type against a concrete type (one-way)
 */

import type { IrType } from "./ir-types.js";
import type { IrLifetime, IrOutlives } from "./lifetimes.js";
import { lifetimesEqual } from "./lifetimes.js";
import type { IrWhereClause } from "./declarations.js";
import { typesEqual } from "./type-ops.js";

/**
 * Substitution: type parameter name → IrType, lifetime name → IrLifetime
 */
export type GenericSubstitution = {
  readonly types: ReadonlyMap<string, IrType>;
  readonly lifetimes: ReadonlyMap<string, IrLifetime>;
};

/**
 * Pair declared parameters with arguments positionally.
 * Callers check arity first; extra arguments are ignored here.
 */
export const createSubstitution = (
  typeParameters: readonly string[],
  typeArguments: readonly IrType[],
  lifetimeParameters: readonly string[],
  lifetimeArguments: readonly IrLifetime[]
): GenericSubstitution => {
  const types = new Map<string, IrType>();
  typeParameters.forEach((name, i) => {
    const arg = typeArguments[i];
    if (arg !== undefined) {
      types.set(name, arg);
    }
  });

  const lifetimes = new Map<string, IrLifetime>();
  lifetimeParameters.forEach((name, i) => {
    const arg = lifetimeArguments[i];
    if (arg !== undefined) {
      lifetimes.set(name, arg);
    }
  });

  return { types, lifetimes };
};

export const substituteLifetime = (
  lifetime: IrLifetime,
  substitution: GenericSubstitution
): IrLifetime =>
  lifetime.kind === "namedLifetime"
    ? (substitution.lifetimes.get(lifetime.name) ?? lifetime)
    : lifetime;

/**
 * Apply a substitution to a type.
 * Parameters without a binding are left in place.
 */
export const substituteIrType = (
  type: IrType,
  substitution: GenericSubstitution
): IrType => {
  switch (type.kind) {
    case "uninitType":
    case "absurdType":
      return type;

    case "typeParameterType":
      return substitution.types.get(type.name) ?? type;

    case "userType":
      return {
        ...type,
        typeArguments: type.typeArguments.map((arg) =>
          substituteIrType(arg, substitution)
        ),
        lifetimeArguments: type.lifetimeArguments.map((l) =>
          substituteLifetime(l, substitution)
        ),
      };
  }
};

export const substituteOutlives = (
  fact: IrOutlives,
  substitution: GenericSubstitution
): IrOutlives =>
  fact.kind === "lifetimeOutlives"
    ? {
        kind: "lifetimeOutlives",
        longer: substituteLifetime(fact.longer, substitution),
        shorter: substituteLifetime(fact.shorter, substitution),
      }
    : {
        kind: "typeOutlives",
        type: substituteIrType(fact.type, substitution),
        shorter: substituteLifetime(fact.shorter, substitution),
      };

export const substituteWhereClause = (
  clause: IrWhereClause,
  substitution: GenericSubstitution
): IrWhereClause =>
  clause.kind === "traitBound"
    ? { ...clause, type: substituteIrType(clause.type, substitution) }
    : substituteOutlives(clause, substitution);

/**
 * Unify a pattern type against a concrete type.
 *
 * Only the names in `typeVariables` and `lifetimeVariables` bind; every other
 * part of the pattern must match exactly. Returns the bindings, or undefined
 * when the pattern does not match.
 *
 * Examples:
 * - unify(Ref<'a, T>, Ref<'x, Int>, [T], ['a]) → { T → Int, 'a → 'x }
 * - unify(Pair<T, T>, Pair<Int, Bool>, [T], []) → undefined
 *
 * A pattern without variant refinement matches every refinement of the
 * same type.
 */
export const unify = (
  pattern: IrType,
  actual: IrType,
  typeVariables: readonly string[],
  lifetimeVariables: readonly string[]
): GenericSubstitution | undefined => {
  const types = new Map<string, IrType>();
  const lifetimes = new Map<string, IrLifetime>();

  const unifyLifetime = (p: IrLifetime, a: IrLifetime): boolean => {
    if (p.kind === "namedLifetime" && lifetimeVariables.includes(p.name)) {
      const existing = lifetimes.get(p.name);
      if (existing) {
        return lifetimesEqual(existing, a);
      }
      lifetimes.set(p.name, a);
      return true;
    }
    return lifetimesEqual(p, a);
  };

  const unifyRecursive = (p: IrType, a: IrType): boolean => {
    if (p.kind === "typeParameterType" && typeVariables.includes(p.name)) {
      const existing = types.get(p.name);
      if (existing) {
        // Already bound - check consistency
        return typesEqual(existing, a);
      }
      types.set(p.name, a);
      return true;
    }

    if (p.kind !== "userType" || a.kind !== "userType") {
      return typesEqual(p, a);
    }

    if (p.name !== a.name) return false;
    if (p.typeArguments.length !== a.typeArguments.length) return false;
    if (p.lifetimeArguments.length !== a.lifetimeArguments.length) {
      return false;
    }
    if (p.variants !== undefined) {
      const allowed = new Set(p.variants);
      if (a.variants === undefined || a.variants.some((v) => !allowed.has(v))) {
        return false;
      }
    }

    const lifetimesMatch = p.lifetimeArguments.every((pl, i) => {
      const al = a.lifetimeArguments[i];
      return al !== undefined && unifyLifetime(pl, al);
    });
    if (!lifetimesMatch) return false;

    return p.typeArguments.every((pArg, i) => {
      const aArg = a.typeArguments[i];
      return aArg !== undefined && unifyRecursive(pArg, aArg);
    });
  };

  return unifyRecursive(pattern, actual) ? { types, lifetimes } : undefined;
};
