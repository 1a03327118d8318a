/**
 * Render IR in the notation the program loader reads back
 */

import type {
  IrLifetime,
  IrLocation,
  IrLocationBinding,
  IrNodeType,
  IrOutlives,
  IrType,
  IrWhereClause,
} from "./types/index.js";

export const formatLifetime = (lifetime: IrLifetime): string =>
  lifetime.kind === "staticLifetime" ? "'static" : `'${lifetime.name}`;

export const formatType = (type: IrType): string => {
  switch (type.kind) {
    case "uninitType":
      return `Uninit<${type.size}>`;
    case "absurdType":
      return "!";
    case "typeParameterType":
      return type.name;
    case "userType": {
      const args = [
        ...type.lifetimeArguments.map(formatLifetime),
        ...type.typeArguments.map(formatType),
      ];
      const generic = args.length > 0 ? `<${args.join(", ")}>` : "";
      const refinement =
        type.variants !== undefined ? `{${type.variants.join("|")}}` : "";
      return `${type.name}${generic}${refinement}`;
    }
  }
};

export const formatLocation = (location: IrLocation): string =>
  location.kind === "returnLocation" ? "ret" : location.name;

export const formatOutlives = (fact: IrOutlives): string =>
  fact.kind === "lifetimeOutlives"
    ? `${formatLifetime(fact.longer)}: ${formatLifetime(fact.shorter)}`
    : `${formatType(fact.type)}: ${formatLifetime(fact.shorter)}`;

export const formatWhereClause = (clause: IrWhereClause): string =>
  clause.kind === "traitBound"
    ? `${formatType(clause.type)}: ${clause.trait}`
    : formatOutlives(clause);

export const formatBindings = (
  bindings: readonly IrLocationBinding[]
): string =>
  `{${bindings
    .map((b) => `${formatLocation(b.location)}: ${formatType(b.type)}`)
    .join(", ")}}`;

export const formatLifetimes = (lifetimes: readonly IrLifetime[]): string =>
  `[${lifetimes.map(formatLifetime).join(", ")}]`;

export const formatObligations = (obligations: readonly IrOutlives[]): string =>
  `[${obligations.map(formatOutlives).join(", ")}]`;

/**
 * `{x: Int, ret: Uninit<4>} / ['static, 'a] / ['a: 'b]`
 */
export const formatNodeType = (nodeType: IrNodeType): string =>
  [
    formatBindings(nodeType.locations),
    formatLifetimes(nodeType.lifetimes),
    formatObligations(nodeType.obligations),
  ].join(" / ");
