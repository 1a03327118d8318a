/**
 * If and Switch
 *
 * `If` reads a boolean condition and hands the same context to both arms.
 * `Switch` inspects an enum-typed location without moving it and narrows
 * it, per arm, to the variants that arm matches.
 */

import type { IrIfNode, IrSwitchNode, IrType } from "@typestate/frontend";
import {
  createDiagnostic,
  error,
  formatLocation,
  formatType,
  ok,
} from "@typestate/frontend";
import type { ContextStore } from "../context-store.js";
import { checkTypeWellFormed, variantsOf } from "../context-store.js";
import {
  isSubtype,
  lookupLocation,
  setLocation,
} from "../location-context.js";
import type { Check, FlowState, Transfer } from "../types.js";
import { evaluateOperand } from "./operands.js";

export const checkIf = (
  store: ContextStore,
  state: FlowState,
  node: IrIfNode
): Check<readonly Transfer[]> => {
  const condition = evaluateOperand(
    store,
    node.condition,
    state.locations,
    state.lifetimes
  );
  if (!condition.ok) return condition;

  const boolType: IrType = {
    kind: "userType",
    name: store.boolType,
    typeArguments: [],
    lifetimeArguments: [],
  };
  if (!isSubtype(store, condition.value.type, boolType)) {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `the condition has type ${formatType(condition.value.type)}`,
        {
          expected: store.boolType,
          actual: formatType(condition.value.type),
        }
      )
    );
  }

  const outgoing: FlowState = { ...state, locations: condition.value.context };
  return ok([
    { label: node.then, state: outgoing },
    { label: node.else, state: outgoing },
  ]);
};

/**
 * The switched location's type restricted to the variants a branch
 * matches. No common variant means the arm is unreachable.
 */
const narrow = (
  store: ContextStore,
  current: IrType,
  branch: IrType
): IrType => {
  if (current.kind !== "userType") {
    return current;
  }
  const matched = new Set(variantsOf(store, branch));
  const remaining = variantsOf(store, current).filter((v) => matched.has(v));
  return remaining.length === 0
    ? { kind: "absurdType" }
    : { ...current, variants: remaining };
};

export const checkSwitch = (
  store: ContextStore,
  state: FlowState,
  node: IrSwitchNode
): Check<readonly Transfer[]> => {
  const name = formatLocation(node.location);
  const current = lookupLocation(state.locations, node.location);
  if (current === undefined) {
    return error(
      createDiagnostic(
        "MalformedContext",
        `location ${name} is not in the context`,
        { locations: [name] }
      )
    );
  }
  if (current.kind === "uninitType") {
    return error(
      createDiagnostic(
        "UseAfterMove",
        `${name} is switched on while uninitialized`,
        { actual: formatType(current), locations: [name] }
      )
    );
  }

  const formed = checkTypeWellFormed(store, node.staticType);
  if (!formed.ok) return formed;
  const declared = variantsOf(store, node.staticType);
  if (declared.length === 0) {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `${formatType(node.staticType)} has no variants to switch on`,
        { actual: formatType(node.staticType), locations: [name] }
      )
    );
  }
  if (!isSubtype(store, current, node.staticType)) {
    return error(
      createDiagnostic(
        "TypeMismatch",
        `${name} has type ${formatType(current)}`,
        {
          expected: formatType(node.staticType),
          actual: formatType(current),
          locations: [name],
        }
      )
    );
  }

  for (const branch of node.branches) {
    const branchFormed = checkTypeWellFormed(store, branch.type);
    if (!branchFormed.ok) return branchFormed;
    if (!isSubtype(store, branch.type, node.staticType)) {
      return error(
        createDiagnostic(
          "TypeMismatch",
          `branch '${branch.label}' matches ${formatType(branch.type)}, which does not refine the switched type`,
          {
            expected: formatType(node.staticType),
            actual: formatType(branch.type),
          }
        )
      );
    }
  }

  const covered = new Set(
    node.branches.flatMap((branch) => variantsOf(store, branch.type))
  );
  const uncovered = declared.filter((v) => !covered.has(v));
  if (uncovered.length > 0) {
    return error(
      createDiagnostic(
        "NonExhaustiveSwitch",
        `no branch matches ${uncovered.join(", ")}`,
        {
          expected: declared.join("|"),
          actual: [...covered].join("|"),
          locations: [name],
        }
      )
    );
  }

  return ok(
    node.branches.map((branch) => ({
      label: branch.label,
      state: {
        ...state,
        locations: setLocation(
          state.locations,
          node.location,
          narrow(store, current, branch.type)
        ),
      },
    }))
  );
};
