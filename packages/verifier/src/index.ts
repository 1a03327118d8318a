/**
 * Typestate Verifier - checks typestate IR functions against their declared
 * NodeTypes
 */

export type {
  Check,
  FlowState,
  FunctionVerdict,
  Quantifier,
  Transfer,
  VerifierOptions,
} from "./types.js";

export {
  type ContextStore,
  type Size,
  COPY_TRAIT,
  createContextStore,
  extendContextStore,
  checkTypeWellFormed,
  holds,
  requireBound,
  isCopy,
  sizeOf,
  variantsOf,
  lookupSignature,
  lookupPrimitive,
} from "./context-store.js";

export {
  type LocationContext,
  type Consumed,
  createLocationContext,
  lookupLocation,
  setLocation,
  formatLocationContext,
  isSubtype,
  isContextSubtype,
  equalsRequired,
  containsAbsurd,
  consume,
  assign,
  drop,
} from "./location-context.js";

export {
  type LifetimeContext,
  createLifetimeContext,
  lifetimeSetsEqual,
  lifetimeOutlives,
  typeOutlives,
  entails,
  findUnentailed,
  obligationsEquivalent,
  mentionsOnlyActive,
  beginLifetime,
  endLifetime,
  instantiateWhereClause,
  checkCallObligations,
} from "./obligations.js";

export {
  checkTotality,
  resolveNodeType,
  isNodeTypeSubtype,
  checkSuccessor,
  checkEntry,
  checkExit,
} from "./node-type.js";

export { checkLabels, dispatch, verifyCfg } from "./cfg.js";
export { verifyFunction } from "./function.js";
export { verifyProgram, formatVerdict } from "./program.js";
