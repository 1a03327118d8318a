/**
 * Assign: the destination must be uninitialized on entry; evaluate the
 * rvalue, then write its type into the destination
 */

import type { IrAssignNode } from "@typestate/frontend";
import { ok } from "@typestate/frontend";
import type { ContextStore } from "../context-store.js";
import { assign, checkWritable } from "../location-context.js";
import type { Check, FlowState, Transfer } from "../types.js";
import { evaluateRvalue } from "./operands.js";

export const checkAssign = (
  store: ContextStore,
  state: FlowState,
  node: IrAssignNode
): Check<readonly Transfer[]> => {
  const writable = checkWritable(node.destination, state.locations);
  if (!writable.ok) return writable;

  const evaluated = evaluateRvalue(
    store,
    node.value,
    state.locations,
    state.lifetimes
  );
  if (!evaluated.ok) return evaluated;

  const written = assign(
    store,
    node.destination,
    evaluated.value.type,
    evaluated.value.context
  );
  if (!written.ok) return written;

  return ok([
    { label: node.next, state: { ...state, locations: written.value } },
  ]);
};
