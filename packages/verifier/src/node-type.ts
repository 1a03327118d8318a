/**
 * NodeType resolution and the checks at CFG edges
 *
 * A declared NodeType is resolved once into a FlowState: its entry list
 * becomes a keyed context (statics filled in from the program), its
 * lifetimes a set. Edge checks then compare an outgoing FlowState against
 * the successor's resolved NodeType, or against the typing synthesized
 * for `exit`.
 */

import type {
  IrFunction,
  IrFunctionSignature,
  IrLifetime,
  IrLocation,
  IrNodeType,
  IrOutlives,
} from "@typestate/frontend";
import {
  RETURN_LOCATION,
  STATIC_LIFETIME,
  createDiagnostic,
  error,
  formatLifetime,
  formatLifetimes,
  formatLocation,
  formatOutlives,
  formatType,
  lifetimeKey,
  locationKey,
  ok,
  typesEqual,
} from "@typestate/frontend";
import type { ContextStore } from "./context-store.js";
import { checkTypeWellFormed } from "./context-store.js";
import type { LocationContext } from "./location-context.js";
import {
  containsAbsurd,
  createLocationContext,
  equalsRequired,
  isContextSubtype,
  isSubtype,
} from "./location-context.js";
import type { LifetimeContext } from "./obligations.js";
import {
  createLifetimeContext,
  findUnentailed,
  lifetimeSetsEqual,
  mentionsOnlyActive,
  outlivesLifetimes,
  unproved,
  whereClauseOutlives,
} from "./obligations.js";
import type { Check, FlowState } from "./types.js";

const malformed = (
  message: string,
  locations: readonly string[] = []
): Check<never> =>
  error(createDiagnostic("MalformedContext", message, { locations }));

/**
 * Locations a function's contexts must mention: every parameter, every
 * local and the return slot
 */
const requiredLocations = (fn: IrFunction): readonly IrLocation[] => [
  ...fn.parameters.map(
    (p): IrLocation => ({ kind: "parameterLocation", name: p.name })
  ),
  ...fn.locals.map((name): IrLocation => ({ kind: "localLocation", name })),
  RETURN_LOCATION,
];

/**
 * Every parameter, local and the return slot is mentioned; anything else
 * mentioned is a declared static at its static type.
 */
export const checkTotality = (
  store: ContextStore,
  fn: IrFunction,
  context: LocationContext
): Check<void> => {
  const required = requiredLocations(fn);
  const missing = required.filter((loc) => !context.has(locationKey(loc)));
  if (missing.length > 0) {
    return malformed(
      "the context does not mention every parameter, local and the return slot",
      missing.map(formatLocation)
    );
  }

  const known = new Set(required.map(locationKey));
  for (const [key, binding] of context) {
    if (known.has(key)) continue;
    const location = binding.location;
    if (location.kind !== "staticLocation") {
      return malformed(
        `${formatLocation(location)} is not declared by '${fn.name}'`,
        [formatLocation(location)]
      );
    }
    const staticType = store.statics.get(location.name);
    if (staticType === undefined) {
      return malformed(`no static named '${location.name}'`, [location.name]);
    }
    if (!typesEqual(staticType, binding.type)) {
      return error(
        createDiagnostic(
          "TypeMismatch",
          `static ${location.name} always has type ${formatType(staticType)}`,
          {
            expected: formatType(staticType),
            actual: formatType(binding.type),
            locations: [location.name],
          }
        )
      );
    }
  }
  return ok(undefined);
};

/**
 * Add every static the context leaves unmentioned, at its static type
 */
export const withStatics = (
  store: ContextStore,
  context: LocationContext
): LocationContext => {
  const merged = new Map(context);
  for (const [name, type] of store.statics) {
    const location: IrLocation = { kind: "staticLocation", name };
    const key = locationKey(location);
    if (!merged.has(key)) {
      merged.set(key, { location, type });
    }
  }
  return merged;
};

/**
 * Resolve a declared NodeType into the FlowState it describes
 */
export const resolveNodeType = (
  store: ContextStore,
  fn: IrFunction,
  nodeType: IrNodeType
): Check<FlowState> => {
  const lifetimes = createLifetimeContext(nodeType.lifetimes);
  if (!lifetimes.ok) return lifetimes;
  if (!lifetimes.value.has(lifetimeKey(STATIC_LIFETIME))) {
    return malformed("'static is missing from the active lifetimes");
  }

  const context = createLocationContext(nodeType.locations);
  if (!context.ok) return context;
  const total = checkTotality(store, fn, context.value);
  if (!total.ok) return total;

  for (const binding of nodeType.locations) {
    const formed = checkTypeWellFormed(store, binding.type);
    if (!formed.ok) return formed;
    const active = mentionsOnlyActive(binding.type, lifetimes.value);
    if (!active.ok) {
      return malformed(active.error.message, [formatLocation(binding.location)]);
    }
  }

  for (const fact of nodeType.obligations) {
    if (fact.kind === "typeOutlives") {
      const formed = checkTypeWellFormed(store, fact.type);
      if (!formed.ok) return formed;
    }
    const inactive = outlivesLifetimes(fact).find(
      (l) => !lifetimes.value.has(lifetimeKey(l))
    );
    if (inactive !== undefined) {
      return malformed(
        `obligation ${formatOutlives(fact)} mentions ${formatLifetime(inactive)}, which is not active`
      );
    }
  }

  return ok({
    locations: withStatics(store, context.value),
    lifetimes: lifetimes.value,
    obligations: nodeType.obligations,
  });
};

/**
 * NodeType-level subtyping: `sub` may flow wherever `sup` is expected.
 * Locations by depth over the same domain, lifetimes equal, and the
 * obligations `sup` relies on entailed by those of `sub`.
 */
export const isNodeTypeSubtype = (
  store: ContextStore,
  sub: FlowState,
  sup: FlowState
): boolean =>
  isContextSubtype(store, sub.locations, sup.locations) &&
  lifetimeSetsEqual(sub.lifetimes, sup.lifetimes) &&
  findUnentailed(sub.obligations, sup.obligations) === undefined;

const lifetimesMismatch = (
  expected: LifetimeContext,
  actual: LifetimeContext
): Check<never> =>
  error(
    createDiagnostic(
      "TypeMismatch",
      "the active lifetimes differ from those the successor declares",
      {
        expected: formatLifetimes([...expected.values()]),
        actual: formatLifetimes([...actual.values()]),
      }
    )
  );

/**
 * Check an outgoing state against a successor's resolved NodeType.
 * A state holding an absurd location is unreachable and satisfies any
 * successor.
 */
export const checkSuccessor = (
  store: ContextStore,
  outgoing: FlowState,
  successor: FlowState
): Check<void> => {
  if (containsAbsurd(outgoing.locations)) {
    return ok(undefined);
  }

  const locations = equalsRequired(
    store,
    outgoing.locations,
    successor.locations
  );
  if (!locations.ok) return locations;

  if (!lifetimeSetsEqual(outgoing.lifetimes, successor.lifetimes)) {
    return lifetimesMismatch(successor.lifetimes, outgoing.lifetimes);
  }

  const missing = findUnentailed(outgoing.obligations, successor.obligations);
  if (missing !== undefined) {
    return error(
      unproved(
        outgoing.obligations,
        missing,
        "the successor relies on an obligation that does not hold here"
      )
    );
  }
  return ok(undefined);
};

const signatureLifetimes = (
  signature: IrFunctionSignature
): LifetimeContext =>
  new Map(
    [
      STATIC_LIFETIME,
      ...signature.lifetimeParameters.map(
        (name): IrLifetime => ({ kind: "namedLifetime", name })
      ),
    ].map((l): [string, IrLifetime] => [lifetimeKey(l), l])
  );

/**
 * Obligations equivalent to the where-clause outlives bounds, ignoring
 * facts about lifetimes outside the signature
 */
const checkBoundaryObligations = (
  fn: IrFunction,
  obligations: readonly IrOutlives[],
  lifetimes: LifetimeContext
): Check<void> => {
  const declared = whereClauseOutlives(fn);
  const missing = findUnentailed(obligations, declared);
  if (missing !== undefined) {
    return error(
      unproved(
        obligations,
        missing,
        `the where-clause of '${fn.name}' promises an obligation that does not hold`
      )
    );
  }

  const visible = obligations.filter((fact) =>
    outlivesLifetimes(fact).every((l) => lifetimes.has(lifetimeKey(l)))
  );
  const extra = findUnentailed(declared, visible);
  if (extra !== undefined) {
    return error(
      unproved(
        declared,
        extra,
        `'${fn.name}' relies on an obligation its where-clause does not declare`
      )
    );
  }
  return ok(undefined);
};

const checkBoundaryLifetimes = (
  fn: IrFunction,
  lifetimes: LifetimeContext
): Check<void> => {
  const expected = signatureLifetimes(fn);
  return lifetimeSetsEqual(lifetimes, expected)
    ? ok(undefined)
    : lifetimesMismatch(expected, lifetimes);
};

const notUninit = (location: IrLocation, context: LocationContext) => {
  const binding = context.get(locationKey(location));
  return binding !== undefined && binding.type.kind !== "uninitType"
    ? binding
    : undefined;
};

/**
 * The typing synthesized for `exit`: parameters and locals uninitialized,
 * the return slot at the declared return type, only the signature's
 * lifetimes active and its outlives bounds in force.
 */
export const checkExit = (
  store: ContextStore,
  fn: IrFunction,
  outgoing: FlowState
): Check<void> => {
  if (containsAbsurd(outgoing.locations)) {
    return ok(undefined);
  }

  const slots = requiredLocations(fn).filter(
    (loc) => loc.kind !== "returnLocation"
  );
  for (const location of slots) {
    const live = notUninit(location, outgoing.locations);
    if (live !== undefined) {
      return error(
        createDiagnostic(
          "TypeMismatch",
          `${formatLocation(location)} still holds ${formatType(live.type)} when '${fn.name}' returns`,
          {
            expected: "Uninit<_>",
            actual: formatType(live.type),
            locations: [formatLocation(location)],
          }
        )
      );
    }
  }

  const returned = outgoing.locations.get(locationKey(RETURN_LOCATION));
  if (returned === undefined || !isSubtype(store, returned.type, fn.returnType)) {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `'${fn.name}' must return ${formatType(fn.returnType)}`,
        {
          expected: formatType(fn.returnType),
          actual: returned ? formatType(returned.type) : undefined,
          locations: ["ret"],
        }
      )
    );
  }

  const lifetimes = checkBoundaryLifetimes(fn, outgoing.lifetimes);
  if (!lifetimes.ok) return lifetimes;

  return checkBoundaryObligations(fn, outgoing.obligations, outgoing.lifetimes);
};

/**
 * The declared `entry` NodeType agrees with the signature: parameters
 * initialized at a supertype of their declared types, locals and the return
 * slot uninitialized, the signature's lifetimes and outlives bounds.
 */
export const checkEntry = (
  store: ContextStore,
  fn: IrFunction,
  entry: FlowState
): Check<void> => {
  for (const parameter of fn.parameters) {
    const location: IrLocation = {
      kind: "parameterLocation",
      name: parameter.name,
    };
    const declared = entry.locations.get(locationKey(location));
    if (
      declared === undefined ||
      !isSubtype(store, parameter.type, declared.type)
    ) {
      return error(
        createDiagnostic(
          "TypeMismatch",
          `parameter ${parameter.name} enters as ${formatType(parameter.type)}`,
          {
            expected: formatType(parameter.type),
            actual: declared ? formatType(declared.type) : undefined,
            locations: [parameter.name],
          }
        )
      );
    }
  }

  const uninitialized = requiredLocations(fn).filter(
    (loc) => loc.kind !== "parameterLocation"
  );
  for (const location of uninitialized) {
    const live = notUninit(location, entry.locations);
    if (live !== undefined) {
      return error(
        createDiagnostic(
          "TypeMismatch",
          `${formatLocation(location)} must be uninitialized at entry`,
          {
            expected: "Uninit<_>",
            actual: formatType(live.type),
            locations: [formatLocation(location)],
          }
        )
      );
    }
  }

  const lifetimes = checkBoundaryLifetimes(fn, entry.lifetimes);
  if (!lifetimes.ok) return lifetimes;

  return checkBoundaryObligations(fn, entry.obligations, entry.lifetimes);
};
