/**
 * Function Verifier
 *
 * A function is checked in isolation against a store extended with its own
 * generic parameters. Acceptance holds for every instantiation of those
 * parameters that satisfies the where-clause.
 */

import type { IrFunction } from "@typestate/frontend";
import { verifyCfg } from "./cfg.js";
import type { ContextStore } from "./context-store.js";
import { extendContextStore } from "./context-store.js";
import type { FunctionVerdict } from "./types.js";

export const verifyFunction = (
  store: ContextStore,
  fn: IrFunction
): FunctionVerdict => {
  const extended = extendContextStore(store, fn);
  if (!extended.ok) {
    return {
      accepted: false,
      name: fn.name,
      diagnostic: { ...extended.error, functionName: fn.name },
    };
  }

  const checked = verifyCfg(extended.value, fn);
  if (!checked.ok) {
    return { accepted: false, name: fn.name, diagnostic: checked.error };
  }

  return {
    accepted: true,
    name: fn.name,
    quantifier: {
      typeParameters: fn.typeParameters.map((p) => p.name),
      lifetimeParameters: fn.lifetimeParameters,
    },
    nodesChecked: checked.value,
  };
};
