import { createDiagnostic, error, ok } from "@typestate/frontend";
import { containsAbsurd, formatLocationContext } from "../location-context.js";
import type { Check, FlowState, Transfer } from "../types.js";

/**
 * DeadCode has no successors and is only reachable in theory: its context
 * must hold an absurd location
 */
export const checkDeadCode = (
  state: FlowState
): Check<readonly Transfer[]> =>
  containsAbsurd(state.locations)
    ? ok([])
    : error(
        createDiagnostic(
          "TypeMismatch",
          "dead code is reachable: no location has the absurd type",
          { actual: formatLocationContext(state.locations) }
        )
      );
