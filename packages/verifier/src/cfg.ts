/**
 * CFG Verifier
 *
 * Every label is checked exactly once, in table order: the node's rule runs
 * against the label's own declared NodeType and each resulting transfer is
 * checked against the declared NodeType of its successor. Declared typings
 * stand in for the join at every label, so no fixpoint is needed.
 */

import type { IrFunction, IrLabeledNode } from "@typestate/frontend";
import {
  ENTRY_LABEL,
  EXIT_LABEL,
  atLabel,
  createDiagnostic,
  error,
  ok,
  successorLabels,
  withRule,
} from "@typestate/frontend";
import type { ContextStore } from "./context-store.js";
import {
  checkEntry,
  checkExit,
  checkSuccessor,
  resolveNodeType,
} from "./node-type.js";
import { checkAssign } from "./rules/assign.js";
import { checkIf, checkSwitch } from "./rules/branch.js";
import { checkCall } from "./rules/call.js";
import { checkDeadCode } from "./rules/dead-code.js";
import { checkDrop } from "./rules/drop.js";
import { checkLifetimeBegin, checkLifetimeEnd } from "./rules/lifetimes.js";
import type { Check, FlowState, Transfer } from "./types.js";

/**
 * `entry` defined, `exit` never defined, every successor defined or `exit`
 */
export const checkLabels = (fn: IrFunction): Check<void> => {
  const malformed = (message: string, label?: string): Check<never> => {
    const diagnostic = withRule(
      createDiagnostic("MalformedContext", message),
      "labels"
    );
    return error(
      label === undefined
        ? { ...diagnostic, functionName: fn.name }
        : atLabel(diagnostic, fn.name, label)
    );
  };

  if (!fn.labels.has(ENTRY_LABEL)) {
    return malformed(`'${fn.name}' has no '${ENTRY_LABEL}' label`);
  }
  if (fn.labels.has(EXIT_LABEL)) {
    return malformed(
      `'${EXIT_LABEL}' is reserved and cannot be defined`,
      EXIT_LABEL
    );
  }
  for (const [label, { node }] of fn.labels) {
    const unknown = successorLabels(node).find(
      (target) => target !== EXIT_LABEL && !fn.labels.has(target)
    );
    if (unknown !== undefined) {
      return malformed(`successor '${unknown}' is not a label`, label);
    }
  }
  return ok(undefined);
};

/**
 * Apply the rule for one node kind
 */
export const dispatch = (
  store: ContextStore,
  state: FlowState,
  labeled: IrLabeledNode
): Check<readonly Transfer[]> => {
  const node = labeled.node;
  switch (node.kind) {
    case "assign":
      return checkAssign(store, state, node);
    case "call":
      return checkCall(store, state, node);
    case "if":
      return checkIf(store, state, node);
    case "switch":
      return checkSwitch(store, state, node);
    case "drop":
      return checkDrop(store, state, node);
    case "lifetimeBegin":
      return checkLifetimeBegin(store, state, node);
    case "lifetimeEnd":
      return checkLifetimeEnd(store, state, node);
    case "deadCode":
      return checkDeadCode(state);
  }
};

/**
 * Check one transfer against its successor's typing
 */
const checkTransfer = (
  store: ContextStore,
  fn: IrFunction,
  resolved: ReadonlyMap<string, FlowState>,
  transfer: Transfer
): Check<void> => {
  if (transfer.label === EXIT_LABEL) {
    const exit = checkExit(store, fn, transfer.state);
    return exit.ok ? exit : error(withRule(exit.error, "exit"));
  }

  const successor = resolved.get(transfer.label);
  if (successor === undefined) {
    return error(
      withRule(
        createDiagnostic(
          "MalformedContext",
          `successor '${transfer.label}' is not a label`
        ),
        "labels"
      )
    );
  }

  const checked = checkSuccessor(store, transfer.state, successor);
  return checked.ok
    ? checked
    : error(
        withRule(
          {
            ...checked.error,
            hint:
              checked.error.hint ?? `while flowing into '${transfer.label}'`,
          },
          "successor"
        )
      );
};

/**
 * Verify a function body; returns the number of nodes checked.
 * The first failing node aborts the walk.
 */
export const verifyCfg = (
  store: ContextStore,
  fn: IrFunction
): Check<number> => {
  const labels = checkLabels(fn);
  if (!labels.ok) return labels;

  const resolved = new Map<string, FlowState>();
  for (const [label, { nodeType }] of fn.labels) {
    const state = resolveNodeType(store, fn, nodeType);
    if (!state.ok) {
      return error(atLabel(state.error, fn.name, label));
    }
    resolved.set(label, state.value);
  }

  const entry = resolved.get(ENTRY_LABEL);
  if (entry !== undefined) {
    const entered = checkEntry(store, fn, entry);
    if (!entered.ok) {
      return error(
        atLabel(withRule(entered.error, "entry"), fn.name, ENTRY_LABEL)
      );
    }
  }

  let checked = 0;
  for (const [label, labeled] of fn.labels) {
    const state = resolved.get(label);
    if (state === undefined) continue;

    const transfers = dispatch(store, state, labeled);
    if (!transfers.ok) {
      return error(
        atLabel(withRule(transfers.error, labeled.node.kind), fn.name, label)
      );
    }

    for (const transfer of transfers.value) {
      const flowed = checkTransfer(store, fn, resolved, transfer);
      if (!flowed.ok) {
        return error(atLabel(flowed.error, fn.name, label));
      }
    }
    checked++;
  }

  return ok(checked);
};
