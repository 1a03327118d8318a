/**
 * Verifier types
 */

import type { Diagnostic, IrLifetime, IrOutlives, Result } from "@typestate/frontend";
import type { LocationContext } from "./location-context.js";

/**
 * Outcome of one check: a value, or the diagnostic that rejects it
 */
export type Check<T> = Result<T, Diagnostic>;

export type VerifierOptions = {
  /** Name of the user type `If` conditions must have (default "Bool") */
  readonly boolType?: string;
};

/**
 * Typing in force at one CFG point while a node is being checked
 */
export type FlowState = {
  readonly locations: LocationContext;
  /** Active lifetimes keyed by lifetimeKey */
  readonly lifetimes: ReadonlyMap<string, IrLifetime>;
  readonly obligations: readonly IrOutlives[];
};

export type Quantifier = {
  readonly typeParameters: readonly string[];
  readonly lifetimeParameters: readonly string[];
};

export type FunctionVerdict =
  | {
      readonly accepted: true;
      readonly name: string;
      /** The judgment holds for every instantiation of these parameters */
      readonly quantifier: Quantifier;
      readonly nodesChecked: number;
    }
  | {
      readonly accepted: false;
      readonly name: string;
      readonly diagnostic: Diagnostic;
    };

/**
 * State leaving a node towards one successor label
 */
export type Transfer = {
  readonly label: string;
  readonly state: FlowState;
};
