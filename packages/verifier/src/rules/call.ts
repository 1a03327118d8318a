/**
 * Call: instantiate the callee's signature at the call's generic
 * arguments, pass the arguments, discharge the where-clause, and write the
 * return type into the destination
 */

import type { IrCallNode, IrFunctionSignature } from "@typestate/frontend";
import {
  createDiagnostic,
  createSubstitution,
  error,
  formatType,
  ok,
  substituteIrType,
} from "@typestate/frontend";
import type { ContextStore } from "../context-store.js";
import {
  checkTypeWellFormed,
  lookupSignature,
  sizeOf,
  sizesMatch,
} from "../context-store.js";
import { assign, checkWritable } from "../location-context.js";
import { checkCallObligations, mentionsOnlyActive } from "../obligations.js";
import type { Check, FlowState, Transfer } from "../types.js";
import { evaluateArguments } from "./operands.js";

const arityMismatch = (
  signature: IrFunctionSignature,
  what: string,
  expected: number,
  actual: number
): Check<never> =>
  error(
    createDiagnostic(
      "TypeMismatch",
      `'${signature.name}' takes ${expected} ${what}, got ${actual}`,
      { expected: String(expected), actual: String(actual) }
    )
  );

/**
 * Generic arguments are well formed, live, and sized like the parameters
 * they replace
 */
const checkGenericArguments = (
  store: ContextStore,
  state: FlowState,
  signature: IrFunctionSignature,
  node: IrCallNode
): Check<void> => {
  if (node.typeArguments.length !== signature.typeParameters.length) {
    return arityMismatch(
      signature,
      "type arguments",
      signature.typeParameters.length,
      node.typeArguments.length
    );
  }
  if (node.lifetimeArguments.length !== signature.lifetimeParameters.length) {
    return arityMismatch(
      signature,
      "lifetime arguments",
      signature.lifetimeParameters.length,
      node.lifetimeArguments.length
    );
  }
  if (node.arguments.length !== signature.parameters.length) {
    return arityMismatch(
      signature,
      "arguments",
      signature.parameters.length,
      node.arguments.length
    );
  }

  for (const [i, arg] of node.typeArguments.entries()) {
    const formed = checkTypeWellFormed(store, arg);
    if (!formed.ok) return formed;
    const active = mentionsOnlyActive(arg, state.lifetimes);
    if (!active.ok) return active;

    const parameter = signature.typeParameters[i];
    const size = sizeOf(store, arg);
    if (!size.ok) return size;
    if (parameter !== undefined && !sizesMatch(size.value, parameter.size)) {
      return error(
        createDiagnostic(
          "TypeMismatch",
          `${formatType(arg)} does not have the size of '${signature.name}' parameter ${parameter.name}`,
          { expected: String(parameter.size), actual: String(size.value) }
        )
      );
    }
  }
  return ok(undefined);
};

export const checkCall = (
  store: ContextStore,
  state: FlowState,
  node: IrCallNode
): Check<readonly Transfer[]> => {
  const signature = lookupSignature(store, node.callee);
  if (!signature.ok) return signature;
  const callee = signature.value;

  const generic = checkGenericArguments(store, state, callee, node);
  if (!generic.ok) return generic;

  const writable = checkWritable(node.destination, state.locations);
  if (!writable.ok) return writable;

  const substitution = createSubstitution(
    callee.typeParameters.map((p) => p.name),
    node.typeArguments,
    callee.lifetimeParameters,
    node.lifetimeArguments
  );

  const passed = evaluateArguments(
    store,
    node.arguments,
    callee.parameters.map((p) => substituteIrType(p.type, substitution)),
    state.locations,
    state.lifetimes,
    `'${callee.name}'`
  );
  if (!passed.ok) return passed;

  const obligations = checkCallObligations(
    store,
    state,
    callee,
    node.typeArguments,
    node.lifetimeArguments
  );
  if (!obligations.ok) return obligations;

  const written = assign(
    store,
    node.destination,
    substituteIrType(callee.returnType, substitution),
    passed.value
  );
  if (!written.ok) return written;

  return ok([
    { label: node.next, state: { ...state, locations: written.value } },
  ]);
};
