/**
 * Declared typings attached to CFG labels
 */

import type { IrType } from "./ir-types.js";
import type { IrLifetime, IrOutlives } from "./lifetimes.js";
import type { IrLocation } from "./locations.js";

export type IrLocationBinding = {
  readonly location: IrLocation;
  readonly type: IrType;
};

/**
 * Typing required of whoever transfers control to a label.
 *
 * `locations` is kept as the declared entry list; the verifier turns it into
 * a keyed context and rejects a location listed twice.
 */
export type IrNodeType = {
  readonly locations: readonly IrLocationBinding[];
  readonly lifetimes: readonly IrLifetime[];
  readonly obligations: readonly IrOutlives[];
};
