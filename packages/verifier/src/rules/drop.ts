import type { IrDropNode } from "@typestate/frontend";
import { ok } from "@typestate/frontend";
import type { ContextStore } from "../context-store.js";
import { drop } from "../location-context.js";
import type { Check, FlowState, Transfer } from "../types.js";

export const checkDrop = (
  store: ContextStore,
  state: FlowState,
  node: IrDropNode
): Check<readonly Transfer[]> => {
  const dropped = drop(store, node.location, state.locations);
  if (!dropped.ok) return dropped;
  return ok([
    { label: node.next, state: { ...state, locations: dropped.value } },
  ]);
};
