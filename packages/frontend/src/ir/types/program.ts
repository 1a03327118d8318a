/**
 * Functions and programs - the input unit of the verifier
 */

import type { IrNodeType } from "./contexts.js";
import type {
  IrFunctionSignature,
  IrImplFact,
  IrPrimitiveOperation,
  IrStaticDeclaration,
  IrTypeDeclaration,
} from "./declarations.js";
import type { IrNode } from "./nodes.js";

export const ENTRY_LABEL = "entry";
export const EXIT_LABEL = "exit";

export type IrLabeledNode = {
  readonly nodeType: IrNodeType;
  readonly node: IrNode;
};

/**
 * A function body as a label table.
 *
 * `entry` is defined like any other label. `exit` is never defined; nodes
 * transfer control to it and its typing is derived from the signature.
 */
export type IrFunction = IrFunctionSignature & {
  readonly locals: readonly string[];
  readonly labels: ReadonlyMap<string, IrLabeledNode>;
};

export type IrProgram = {
  readonly types: readonly IrTypeDeclaration[];
  readonly statics: readonly IrStaticDeclaration[];
  readonly impls: readonly IrImplFact[];
  readonly primitives: readonly IrPrimitiveOperation[];
  /** Signatures of callees defined outside this program */
  readonly externs: readonly IrFunctionSignature[];
  readonly functions: readonly IrFunction[];
};
