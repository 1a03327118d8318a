/**
 * CFG node types - a closed set of kinds, each naming its successor labels
 */

import type { IrType } from "./ir-types.js";
import type { IrLifetime } from "./lifetimes.js";
import type { IrLocation } from "./locations.js";

export type IrNode =
  | IrAssignNode
  | IrCallNode
  | IrIfNode
  | IrSwitchNode
  | IrDropNode
  | IrLifetimeBeginNode
  | IrLifetimeEndNode
  | IrDeadCodeNode;

export type IrNodeKind = IrNode["kind"];

export type IrOperand = IrPlaceOperand | IrConstantOperand;

/**
 * Read of a location; moves or copies depending on the Copy capability
 */
export type IrPlaceOperand = {
  readonly kind: "place";
  readonly location: IrLocation;
};

export type IrConstantOperand = {
  readonly kind: "constant";
  readonly type: IrType;
};

export type IrRvalue = IrUseRvalue | IrUnaryRvalue | IrBinaryRvalue;

export type IrUseRvalue = {
  readonly kind: "use";
  readonly operand: IrOperand;
};

export type IrUnaryRvalue = {
  readonly kind: "unary";
  readonly operator: string;
  readonly operand: IrOperand;
};

export type IrBinaryRvalue = {
  readonly kind: "binary";
  readonly operator: string;
  readonly left: IrOperand;
  readonly right: IrOperand;
};

export type IrAssignNode = {
  readonly kind: "assign";
  readonly destination: IrLocation;
  readonly value: IrRvalue;
  readonly next: string;
};

export type IrCallNode = {
  readonly kind: "call";
  readonly destination: IrLocation;
  readonly callee: string;
  readonly typeArguments: readonly IrType[];
  readonly lifetimeArguments: readonly IrLifetime[];
  readonly arguments: readonly IrOperand[];
  readonly next: string;
};

export type IrIfNode = {
  readonly kind: "if";
  readonly condition: IrOperand;
  readonly then: string;
  readonly else: string;
};

export type IrSwitchBranch = {
  readonly label: string;
  readonly type: IrType;
};

export type IrSwitchNode = {
  readonly kind: "switch";
  readonly location: IrLocation;
  readonly staticType: IrType;
  readonly branches: readonly IrSwitchBranch[];
};

export type IrDropNode = {
  readonly kind: "drop";
  readonly location: IrLocation;
  readonly next: string;
};

export type IrLifetimeBeginNode = {
  readonly kind: "lifetimeBegin";
  readonly lifetime: IrLifetime;
  readonly next: string;
};

export type IrLifetimeEndNode = {
  readonly kind: "lifetimeEnd";
  readonly lifetime: IrLifetime;
  readonly next: string;
};

/**
 * Unreachable point; valid only where the context holds an absurd location
 */
export type IrDeadCodeNode = {
  readonly kind: "deadCode";
};

/**
 * Successor labels of a node, in the order the node names them
 */
export const successorLabels = (node: IrNode): readonly string[] => {
  switch (node.kind) {
    case "assign":
    case "call":
    case "drop":
    case "lifetimeBegin":
    case "lifetimeEnd":
      return [node.next];
    case "if":
      return [node.then, node.else];
    case "switch":
      return node.branches.map((branch) => branch.label);
    case "deadCode":
      return [];
  }
};
