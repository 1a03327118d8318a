/**
 * LifetimeBegin / LifetimeEnd
 */

import type {
  IrLifetimeBeginNode,
  IrLifetimeEndNode,
} from "@typestate/frontend";
import { ok } from "@typestate/frontend";
import type { ContextStore } from "../context-store.js";
import { beginLifetime, endLifetime } from "../obligations.js";
import type { Check, FlowState, Transfer } from "../types.js";

export const checkLifetimeBegin = (
  store: ContextStore,
  state: FlowState,
  node: IrLifetimeBeginNode
): Check<readonly Transfer[]> => {
  const begun = beginLifetime(store, node.lifetime, state);
  return begun.ok ? ok([{ label: node.next, state: begun.value }]) : begun;
};

export const checkLifetimeEnd = (
  store: ContextStore,
  state: FlowState,
  node: IrLifetimeEndNode
): Check<readonly Transfer[]> => {
  const ended = endLifetime(store, node.lifetime, state);
  return ended.ok ? ok([{ label: node.next, state: ended.value }]) : ended;
};
