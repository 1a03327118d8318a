/**
 * Location-Context Engine
 *
 * A location context maps every mentioned location to exactly one type at one
 * CFG point. Contexts are persistent: every operation returns a new map.
 */

import type {
  IrAbsurdType,
  IrLocation,
  IrLocationBinding,
  IrType,
  IrUninitType,
} from "@typestate/frontend";
import {
  createDiagnostic,
  error,
  formatBindings,
  formatLocation,
  formatType,
  locationKey,
  ok,
  typesEqual,
} from "@typestate/frontend";
import type { ContextStore } from "./context-store.js";
import { isCopy, sizeOf, sizesMatch, variantsOf } from "./context-store.js";
import type { Check } from "./types.js";

export type LocationContext = ReadonlyMap<string, IrLocationBinding>;

/**
 * Build a context from a declared entry list.
 * A location listed twice violates totality-as-function.
 */
export const createLocationContext = (
  bindings: readonly IrLocationBinding[]
): Check<LocationContext> => {
  const context = new Map<string, IrLocationBinding>();
  for (const binding of bindings) {
    const key = locationKey(binding.location);
    if (context.has(key)) {
      return error(
        createDiagnostic(
          "MalformedContext",
          `location ${formatLocation(binding.location)} is listed twice`,
          { locations: [formatLocation(binding.location)] }
        )
      );
    }
    context.set(key, binding);
  }
  return ok(context);
};

export const lookupLocation = (
  context: LocationContext,
  location: IrLocation
): IrType | undefined => context.get(locationKey(location))?.type;

export const setLocation = (
  context: LocationContext,
  location: IrLocation,
  type: IrType
): LocationContext =>
  new Map(context).set(locationKey(location), { location, type });

export const formatLocationContext = (context: LocationContext): string =>
  formatBindings([...context.values()]);

/**
 * Depth subtyping on types: `sub` may stand wherever `sup` is required.
 *
 * - `!` is a subtype of everything
 * - `Uninit<n>` only of `Uninit<n>`
 * - user types need the same name and identical arguments; a refinement to
 *   fewer variants is a subtype of one allowing more
 */
export const isSubtype = (
  store: ContextStore,
  sub: IrType,
  sup: IrType
): boolean => {
  if (sub.kind === "absurdType") {
    return true;
  }

  switch (sup.kind) {
    case "absurdType":
      return false;

    case "uninitType":
      return sub.kind === "uninitType" && sub.size === sup.size;

    case "typeParameterType":
      return sub.kind === "typeParameterType" && sub.name === sup.name;

    case "userType": {
      if (sub.kind !== "userType" || sub.name !== sup.name) {
        return false;
      }
      const argumentsEqual =
        typesEqual(
          { ...sub, variants: undefined },
          { ...sup, variants: undefined }
        );
      if (!argumentsEqual) {
        return false;
      }
      const allowed = new Set(variantsOf(store, sup));
      return variantsOf(store, sub).every((v) => allowed.has(v));
    }
  }
};

/**
 * Whether `actual` satisfies `required`: every location `required` mentions
 * must be present in `actual` at a subtype. Reports the first offender.
 */
export const equalsRequired = (
  store: ContextStore,
  actual: LocationContext,
  required: LocationContext
): Check<void> => {
  for (const [key, expected] of required) {
    const found = actual.get(key);
    if (found === undefined) {
      return error(
        createDiagnostic(
          "MalformedContext",
          `location ${formatLocation(expected.location)} is missing from the context`,
          {
            expected: formatLocationContext(required),
            actual: formatLocationContext(actual),
            locations: [formatLocation(expected.location)],
          }
        )
      );
    }
    if (!isSubtype(store, found.type, expected.type)) {
      return error(
        createDiagnostic(
          "TypeMismatch",
          `${formatLocation(expected.location)} has type ${formatType(found.type)}, which is not a subtype of ${formatType(expected.type)}`,
          {
            expected: formatLocationContext(required),
            actual: formatLocationContext(actual),
            locations: [formatLocation(expected.location)],
          }
        )
      );
    }
  }
  return ok(undefined);
};

/**
 * Context-level depth subtyping: `sub` offers a subtype at every location
 * of `sup`, and the two mention exactly the same locations (no width
 * subtyping, so no linear value can be silently forgotten).
 */
export const isContextSubtype = (
  store: ContextStore,
  sub: LocationContext,
  sup: LocationContext
): boolean =>
  sub.size === sup.size &&
  [...sup].every(([key, binding]) => {
    const found = sub.get(key);
    return found !== undefined && isSubtype(store, found.type, binding.type);
  });

export const containsAbsurd = (context: LocationContext): boolean =>
  [...context.values()].some((b) => b.type.kind === "absurdType");

const missing = (location: IrLocation): Check<never> =>
  error(
    createDiagnostic(
      "MalformedContext",
      `location ${formatLocation(location)} is not in the context`,
      { locations: [formatLocation(location)] }
    )
  );

export type Consumed = {
  readonly type: IrType;
  readonly context: LocationContext;
};

/**
 * Read a location. A Copy value stays in place; any other value is moved
 * out and leaves `Uninit<size>` behind.
 */
export const consume = (
  store: ContextStore,
  location: IrLocation,
  context: LocationContext
): Check<Consumed> => {
  const type = lookupLocation(context, location);
  if (type === undefined) {
    return missing(location);
  }

  const name = formatLocation(location);
  if (type.kind === "uninitType") {
    return error(
      createDiagnostic(
        "UseAfterMove",
        `${name} is used while uninitialized`,
        { actual: formatType(type), locations: [name] }
      )
    );
  }

  if (isCopy(store, type)) {
    return ok({ type, context });
  }

  if (location.kind === "staticLocation") {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `cannot move the non-Copy static ${name}`,
        { actual: formatType(type), locations: [name] }
      )
    );
  }

  const size = sizeOf(store, type);
  if (!size.ok) return size;
  if (size.value === "any") {
    return ok({ type, context });
  }
  return ok({
    type,
    context: setLocation(context, location, {
      kind: "uninitType",
      size: size.value,
    }),
  });
};

/**
 * A location may be written only while it is uninitialized (or absurd).
 * Returns its current type.
 */
export const checkWritable = (
  location: IrLocation,
  context: LocationContext
): Check<IrUninitType | IrAbsurdType> => {
  const current = lookupLocation(context, location);
  if (current === undefined) {
    return missing(location);
  }

  const name = formatLocation(location);
  if (location.kind === "staticLocation") {
    return error(
      createDiagnostic("DoubleInit", `static ${name} is always initialized`, {
        locations: [name],
      })
    );
  }

  if (current.kind !== "uninitType" && current.kind !== "absurdType") {
    return error(
      createDiagnostic(
        "DoubleInit",
        `${name} is assigned while holding ${formatType(current)}`,
        {
          expected: "Uninit<_>",
          actual: formatType(current),
          locations: [name],
        }
      )
    );
  }
  return ok(current);
};

/**
 * Write a value of type `type` into an uninitialized location of the same
 * size.
 */
export const assign = (
  store: ContextStore,
  location: IrLocation,
  type: IrType,
  context: LocationContext
): Check<LocationContext> => {
  const writable = checkWritable(location, context);
  if (!writable.ok) return writable;
  const current = writable.value;
  if (current.kind === "absurdType") {
    return ok(setLocation(context, location, type));
  }

  const name = formatLocation(location);
  const size = sizeOf(store, type);
  if (!size.ok) return size;
  if (!sizesMatch(size.value, current.size)) {
    return error(
      createDiagnostic(
        "MalformedContext",
        `${formatType(type)} (${size.value} bytes) does not fit ${name}`,
        {
          expected: `Uninit<${size.value}>`,
          actual: formatType(current),
          locations: [name],
        }
      )
    );
  }

  return ok(setLocation(context, location, type));
};

/**
 * Explicitly forget a Copy value
 */
export const drop = (
  store: ContextStore,
  location: IrLocation,
  context: LocationContext
): Check<LocationContext> => {
  const current = lookupLocation(context, location);
  if (current === undefined) {
    return missing(location);
  }

  const name = formatLocation(location);
  if (current.kind === "uninitType") {
    return error(
      createDiagnostic("UseAfterMove", `${name} is dropped while uninitialized`, {
        actual: formatType(current),
        locations: [name],
      })
    );
  }
  if (location.kind === "staticLocation") {
    return error(
      createDiagnostic("TypeMismatch", `static ${name} cannot be dropped`, {
        locations: [name],
      })
    );
  }
  if (!isCopy(store, current)) {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `${name} holds ${formatType(current)}, which is not Copy and must be consumed`,
        { actual: formatType(current), locations: [name] }
      )
    );
  }

  const size = sizeOf(store, current);
  if (!size.ok) return size;
  if (size.value === "any") {
    return ok(context);
  }
  return ok(
    setLocation(context, location, { kind: "uninitType", size: size.value })
  );
};
