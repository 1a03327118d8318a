/**
 * Program-level entry points
 */

import type { IrProgram } from "@typestate/frontend";
import { formatDiagnostic, map } from "@typestate/frontend";
import { createContextStore } from "./context-store.js";
import { verifyFunction } from "./function.js";
import type { Check, FunctionVerdict, VerifierOptions } from "./types.js";

/**
 * Verify every function of a program. A rejection never stops the others;
 * only a malformed program-wide declaration fails the whole call.
 */
export const verifyProgram = (
  program: IrProgram,
  options: VerifierOptions = {}
): Check<readonly FunctionVerdict[]> =>
  map(createContextStore(program, options), (store) =>
    program.functions.map((fn) => verifyFunction(store, fn))
  );

/**
 * `∀T, 'a. name` for an accepted function, the diagnostic otherwise
 */
export const formatVerdict = (verdict: FunctionVerdict): string => {
  if (!verdict.accepted) {
    return formatDiagnostic(verdict.diagnostic);
  }
  const bound = [
    ...verdict.quantifier.typeParameters,
    ...verdict.quantifier.lifetimeParameters.map((name) => `'${name}`),
  ];
  return bound.length > 0 ? `∀${bound.join(", ")}. ${verdict.name}` : verdict.name;
};
