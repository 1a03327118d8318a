/**
 * Lifetime & Obligation Tracker
 *
 * A BoundContext is the set of outlives facts a CFG point may rely on.
 * Facts enter through the where-clause (at entry) and through lifetime
 * begins; every fact a successor declares must be entailed by the facts
 * the current point holds.
 */

import type {
  Diagnostic,
  IrFunctionSignature,
  IrLifetime,
  IrOutlives,
  IrType,
  IrWhereClause,
} from "@typestate/frontend";
import {
  STATIC_LIFETIME,
  createDiagnostic,
  createSubstitution,
  error,
  formatLifetime,
  formatLifetimes,
  formatLocation,
  formatObligations,
  formatOutlives,
  formatType,
  isOutlivesBound,
  lifetimeKey,
  ok,
  substituteWhereClause,
  typeLifetimes,
  typeMentionsLifetime,
  typesEqual,
} from "@typestate/frontend";
import type { ContextStore } from "./context-store.js";
import { requireBound } from "./context-store.js";
import type { Check, FlowState } from "./types.js";

export type LifetimeContext = ReadonlyMap<string, IrLifetime>;

/**
 * Build a lifetime set; a lifetime listed twice is malformed
 */
export const createLifetimeContext = (
  lifetimes: readonly IrLifetime[]
): Check<LifetimeContext> => {
  const context = new Map<string, IrLifetime>();
  for (const l of lifetimes) {
    const key = lifetimeKey(l);
    if (context.has(key)) {
      return error(
        createDiagnostic(
          "MalformedContext",
          `lifetime ${formatLifetime(l)} is listed twice`
        )
      );
    }
    context.set(key, l);
  }
  return ok(context);
};

export const lifetimeSetsEqual = (
  a: LifetimeContext,
  b: LifetimeContext
): boolean => a.size === b.size && [...a.keys()].every((key) => b.has(key));

/**
 * `longer : shorter` under the facts: reflexive, `'static` outlives
 * everything, and lifetime facts compose transitively. A lifetime that
 * outlives `'static` outlives everything too.
 */
export const lifetimeOutlives = (
  facts: readonly IrOutlives[],
  longer: IrLifetime,
  shorter: IrLifetime
): boolean => {
  const target = lifetimeKey(shorter);
  const staticKey = lifetimeKey(STATIC_LIFETIME);

  const visited = new Set<string>();
  const pending = [lifetimeKey(longer)];
  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined || visited.has(current)) continue;
    if (current === target || current === staticKey) return true;
    visited.add(current);

    for (const fact of facts) {
      if (
        fact.kind === "lifetimeOutlives" &&
        lifetimeKey(fact.longer) === current
      ) {
        pending.push(lifetimeKey(fact.shorter));
      }
    }
  }
  return false;
};

/**
 * `type : shorter`: a recorded fact about the type (extended along lifetime
 * facts), or structurally through every lifetime and type argument.
 * A type parameter only outlives what a recorded fact says it does.
 */
export const typeOutlives = (
  facts: readonly IrOutlives[],
  type: IrType,
  shorter: IrLifetime
): boolean => {
  const recorded = facts.some(
    (fact) =>
      fact.kind === "typeOutlives" &&
      typesEqual(fact.type, type) &&
      lifetimeOutlives(facts, fact.shorter, shorter)
  );
  if (recorded) return true;

  switch (type.kind) {
    case "uninitType":
    case "absurdType":
      return true;
    case "typeParameterType":
      return false;
    case "userType":
      return (
        type.lifetimeArguments.every((l) =>
          lifetimeOutlives(facts, l, shorter)
        ) && type.typeArguments.every((arg) => typeOutlives(facts, arg, shorter))
      );
  }
};

export const entails = (
  facts: readonly IrOutlives[],
  fact: IrOutlives
): boolean =>
  fact.kind === "lifetimeOutlives"
    ? lifetimeOutlives(facts, fact.longer, fact.shorter)
    : typeOutlives(facts, fact.type, fact.shorter);

/**
 * First required fact the given facts do not entail
 */
export const findUnentailed = (
  facts: readonly IrOutlives[],
  required: readonly IrOutlives[]
): IrOutlives | undefined => required.find((fact) => !entails(facts, fact));

export const obligationsEquivalent = (
  a: readonly IrOutlives[],
  b: readonly IrOutlives[]
): boolean =>
  findUnentailed(a, b) === undefined && findUnentailed(b, a) === undefined;

export const unproved = (
  facts: readonly IrOutlives[],
  missing: IrOutlives,
  message: string
): Diagnostic =>
  createDiagnostic("ObligationUnproved", message, {
    expected: formatOutlives(missing),
    actual: formatObligations(facts),
  });

export const outlivesLifetimes = (fact: IrOutlives): readonly IrLifetime[] =>
  fact.kind === "lifetimeOutlives"
    ? [fact.longer, fact.shorter]
    : [fact.shorter, ...typeLifetimes(fact.type)];

/**
 * A type written into a context may only mention active lifetimes
 */
export const mentionsOnlyActive = (
  type: IrType,
  lifetimes: LifetimeContext
): Check<void> => {
  const dangling = typeLifetimes(type).find(
    (l) => !lifetimes.has(lifetimeKey(l))
  );
  return dangling === undefined
    ? ok(undefined)
    : error(
        createDiagnostic(
          "DanglingLifetime",
          `${formatType(type)} mentions ${formatLifetime(dangling)}, which is not active`,
          { actual: formatLifetimes([...lifetimes.values()]) }
        )
      );
};

const isFunctionLocal = (
  store: ContextStore,
  lifetime: IrLifetime
): boolean =>
  lifetime.kind === "namedLifetime" &&
  !store.lifetimeParameters.has(lifetime.name);

/**
 * Flow across `LifetimeBegin(l)`: `l` becomes active and every lifetime
 * already active outlives it.
 */
export const beginLifetime = (
  store: ContextStore,
  lifetime: IrLifetime,
  state: FlowState
): Check<FlowState> => {
  const key = lifetimeKey(lifetime);
  if (!isFunctionLocal(store, lifetime)) {
    return error(
      createDiagnostic(
        "MalformedContext",
        `${formatLifetime(lifetime)} is not a function-local lifetime and cannot begin`
      )
    );
  }
  if (state.lifetimes.has(key)) {
    return error(
      createDiagnostic(
        "MalformedContext",
        `${formatLifetime(lifetime)} begins while already active`,
        { actual: formatLifetimes([...state.lifetimes.values()]) }
      )
    );
  }

  const derived: IrOutlives[] = [...state.lifetimes.values()].map((a) => ({
    kind: "lifetimeOutlives",
    longer: a,
    shorter: lifetime,
  }));

  return ok({
    locations: state.locations,
    lifetimes: new Map(state.lifetimes).set(key, lifetime),
    obligations: [...state.obligations, ...derived],
  });
};

/**
 * Flow across `LifetimeEnd(l)`.
 *
 * `l` must be active and local, no location may still mention it, every
 * lifetime that stays active must outlive it, and nothing still active may
 * be known to live no longer than `l`.
 */
export const endLifetime = (
  store: ContextStore,
  lifetime: IrLifetime,
  state: FlowState
): Check<FlowState> => {
  const key = lifetimeKey(lifetime);
  const name = formatLifetime(lifetime);

  if (!state.lifetimes.has(key)) {
    return error(
      createDiagnostic("DanglingLifetime", `${name} ends while not active`, {
        actual: formatLifetimes([...state.lifetimes.values()]),
      })
    );
  }
  if (!isFunctionLocal(store, lifetime)) {
    return error(
      createDiagnostic(
        "MalformedContext",
        `${name} is not a function-local lifetime and cannot end`
      )
    );
  }

  const holders = [...state.locations.values()].filter((b) =>
    typeMentionsLifetime(b.type, lifetime)
  );
  if (holders.length > 0) {
    return error(
      createDiagnostic(
        "DanglingLifetime",
        `${name} ends while locations still mention it`,
        {
          locations: holders.map((b) => formatLocation(b.location)),
        }
      )
    );
  }

  const remaining = new Map(state.lifetimes);
  remaining.delete(key);

  for (const a of remaining.values()) {
    const required: IrOutlives = {
      kind: "lifetimeOutlives",
      longer: a,
      shorter: lifetime,
    };
    if (!entails(state.obligations, required)) {
      return error(
        unproved(
          state.obligations,
          required,
          `${formatLifetime(a)} stays active but is not known to outlive ${name}`
        )
      );
    }
    if (lifetimeOutlives(state.obligations, lifetime, a)) {
      return error(
        unproved(
          state.obligations,
          { kind: "lifetimeOutlives", longer: lifetime, shorter: a },
          `${name} ends but is required to outlive ${formatLifetime(a)}, which stays active`
        )
      );
    }
  }

  return ok({
    locations: state.locations,
    lifetimes: remaining,
    obligations: state.obligations,
  });
};

/**
 * Where-clause of a callee with its generic parameters replaced by the
 * call's arguments
 */
export const instantiateWhereClause = (
  signature: IrFunctionSignature,
  typeArguments: readonly IrType[],
  lifetimeArguments: readonly IrLifetime[]
): readonly IrWhereClause[] => {
  const substitution = createSubstitution(
    signature.typeParameters.map((p) => p.name),
    typeArguments,
    signature.lifetimeParameters,
    lifetimeArguments
  );
  return signature.whereClause.map((clause) =>
    substituteWhereClause(clause, substitution)
  );
};

/**
 * Discharge a call's instantiated bounds: lifetime arguments active, trait
 * bounds established, outlives bounds entailed at the call site.
 */
export const checkCallObligations = (
  store: ContextStore,
  state: FlowState,
  signature: IrFunctionSignature,
  typeArguments: readonly IrType[],
  lifetimeArguments: readonly IrLifetime[]
): Check<void> => {
  for (const l of lifetimeArguments) {
    if (!state.lifetimes.has(lifetimeKey(l))) {
      return error(
        createDiagnostic(
          "DanglingLifetime",
          `lifetime argument ${formatLifetime(l)} of '${signature.name}' is not active`,
          { actual: formatLifetimes([...state.lifetimes.values()]) }
        )
      );
    }
  }

  const clauses = instantiateWhereClause(
    signature,
    typeArguments,
    lifetimeArguments
  );
  for (const clause of clauses) {
    if (isOutlivesBound(clause)) {
      if (!entails(state.obligations, clause)) {
        return error(
          unproved(
            state.obligations,
            clause,
            `call to '${signature.name}' requires ${formatOutlives(clause)}`
          )
        );
      }
      continue;
    }
    const bound = requireBound(store, clause.type, clause.trait);
    if (!bound.ok) return bound;
  }
  return ok(undefined);
};

export const whereClauseOutlives = (
  signature: IrFunctionSignature
): readonly IrOutlives[] => signature.whereClause.filter(isOutlivesBound);
