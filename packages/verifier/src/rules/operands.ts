/**
 * Operand and rvalue evaluation
 *
 * Evaluation threads the location context left to right: a place operand
 * moves its value out unless the type is Copy.
 */

import type {
  Diagnostic,
  IrOperand,
  IrPrimitiveOperation,
  IrRvalue,
  IrType,
} from "@typestate/frontend";
import {
  createDiagnostic,
  error,
  foldResults,
  formatType,
  ok,
} from "@typestate/frontend";
import type { ContextStore } from "../context-store.js";
import { checkTypeWellFormed, lookupPrimitive } from "../context-store.js";
import type { Consumed, LocationContext } from "../location-context.js";
import { consume, isSubtype } from "../location-context.js";
import type { LifetimeContext } from "../obligations.js";
import { mentionsOnlyActive } from "../obligations.js";
import type { Check } from "../types.js";

/**
 * A constant denotes a fresh, initialized value
 */
const checkConstant = (
  store: ContextStore,
  type: IrType,
  lifetimes: LifetimeContext
): Check<void> => {
  if (type.kind === "uninitType" || type.kind === "absurdType") {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `no constant has type ${formatType(type)}`,
        { actual: formatType(type) }
      )
    );
  }
  const formed = checkTypeWellFormed(store, type);
  if (!formed.ok) return formed;
  return mentionsOnlyActive(type, lifetimes);
};

export const evaluateOperand = (
  store: ContextStore,
  operand: IrOperand,
  context: LocationContext,
  lifetimes: LifetimeContext
): Check<Consumed> => {
  if (operand.kind === "place") {
    return consume(store, operand.location, context);
  }
  const constant = checkConstant(store, operand.type, lifetimes);
  return constant.ok ? ok({ type: operand.type, context }) : constant;
};

/**
 * Evaluate operands in order, each against its expected type
 */
export const evaluateArguments = (
  store: ContextStore,
  operands: readonly IrOperand[],
  expected: readonly IrType[],
  context: LocationContext,
  lifetimes: LifetimeContext,
  what: string
): Check<LocationContext> =>
  foldResults<LocationContext, IrOperand, Diagnostic>(
    operands,
    context,
    (current, operand, index) => {
      const evaluated = evaluateOperand(store, operand, current, lifetimes);
      if (!evaluated.ok) return evaluated;
      const parameter = expected[index];
      if (
        parameter === undefined ||
        !isSubtype(store, evaluated.value.type, parameter)
      ) {
        return error(
          createDiagnostic(
            "TypeMismatch",
            `operand ${index + 1} of ${what} has type ${formatType(evaluated.value.type)}`,
            {
              expected: parameter ? formatType(parameter) : undefined,
              actual: formatType(evaluated.value.type),
            }
          )
        );
      }
      return ok(evaluated.value.context);
    }
  );

const applyPrimitive = (
  store: ContextStore,
  primitive: IrPrimitiveOperation,
  operands: readonly IrOperand[],
  context: LocationContext,
  lifetimes: LifetimeContext
): Check<Consumed> => {
  const evaluated = evaluateArguments(
    store,
    operands,
    primitive.parameters,
    context,
    lifetimes,
    `'${primitive.name}'`
  );
  return evaluated.ok
    ? ok({ type: primitive.result, context: evaluated.value })
    : evaluated;
};

export const evaluateRvalue = (
  store: ContextStore,
  rvalue: IrRvalue,
  context: LocationContext,
  lifetimes: LifetimeContext
): Check<Consumed> => {
  switch (rvalue.kind) {
    case "use":
      return evaluateOperand(store, rvalue.operand, context, lifetimes);

    case "unary": {
      const primitive = lookupPrimitive(store, rvalue.operator, 1);
      if (!primitive.ok) return primitive;
      return applyPrimitive(
        store,
        primitive.value,
        [rvalue.operand],
        context,
        lifetimes
      );
    }

    case "binary": {
      const primitive = lookupPrimitive(store, rvalue.operator, 2);
      if (!primitive.ok) return primitive;
      return applyPrimitive(
        store,
        primitive.value,
        [rvalue.left, rvalue.right],
        context,
        lifetimes
      );
    }
  }
};
