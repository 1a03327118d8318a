/**
 * IR types barrel exports
 * Intermediate Representation (IR) types for the typestate verifier
 */

// Type system types
export type {
  IrType,
  IrUninitType,
  IrAbsurdType,
  IrTypeParameterType,
  IrUserType,
} from "./ir-types.js";

// Lifetimes
export type {
  IrLifetime,
  IrStaticLifetime,
  IrNamedLifetime,
  IrLifetimeOutlives,
  IrTypeOutlives,
  IrOutlives,
} from "./lifetimes.js";
export { STATIC_LIFETIME, lifetimeKey, lifetimesEqual } from "./lifetimes.js";

// Locations
export type {
  IrLocation,
  IrReturnLocation,
  IrStaticLocation,
  IrLocalLocation,
  IrParameterLocation,
} from "./locations.js";
export {
  RETURN_LOCATION,
  locationKey,
  isStaticLocation,
} from "./locations.js";

// Contexts
export type { IrLocationBinding, IrNodeType } from "./contexts.js";

// Nodes
export type {
  IrNode,
  IrNodeKind,
  IrOperand,
  IrPlaceOperand,
  IrConstantOperand,
  IrRvalue,
  IrUseRvalue,
  IrUnaryRvalue,
  IrBinaryRvalue,
  IrAssignNode,
  IrCallNode,
  IrIfNode,
  IrSwitchNode,
  IrSwitchBranch,
  IrDropNode,
  IrLifetimeBeginNode,
  IrLifetimeEndNode,
  IrDeadCodeNode,
} from "./nodes.js";
export { successorLabels } from "./nodes.js";

// Declarations
export type {
  IrTypeDeclaration,
  IrTypeParameterDeclaration,
  IrTraitBound,
  IrWhereClause,
  IrImplFact,
  IrPrimitiveOperation,
  IrFunctionSignature,
  IrParameter,
  IrStaticDeclaration,
} from "./declarations.js";

// Functions and programs
export type { IrLabeledNode, IrFunction, IrProgram } from "./program.js";
export { ENTRY_LABEL, EXIT_LABEL } from "./program.js";

// Type operations
export {
  stableIrTypeKey,
  typesEqual,
  typeLifetimes,
  typeMentionsLifetime,
  isOutlivesBound,
} from "./type-ops.js";

// Substitution
export type { GenericSubstitution } from "./ir-substitution.js";
export {
  createSubstitution,
  substituteIrType,
  substituteLifetime,
  substituteOutlives,
  substituteWhereClause,
  unify,
} from "./ir-substitution.js";
