/**
 * Locations ("lvalues") - addressable slots whose type changes over the CFG
 */

export type IrLocation =
  | IrReturnLocation
  | IrStaticLocation
  | IrLocalLocation
  | IrParameterLocation;

export type IrReturnLocation = {
  readonly kind: "returnLocation";
};

/**
 * Program-wide slot; visible from every function
 */
export type IrStaticLocation = {
  readonly kind: "staticLocation";
  readonly name: string;
};

export type IrLocalLocation = {
  readonly kind: "localLocation";
  readonly name: string;
};

export type IrParameterLocation = {
  readonly kind: "parameterLocation";
  readonly name: string;
};

export const RETURN_LOCATION: IrReturnLocation = { kind: "returnLocation" };

/**
 * Stable key used to index location contexts.
 * Distinct locations never share a key, even when their names coincide.
 */
export const locationKey = (location: IrLocation): string => {
  switch (location.kind) {
    case "returnLocation":
      return "ret";
    case "staticLocation":
      return `static:${location.name}`;
    case "localLocation":
      return `local:${location.name}`;
    case "parameterLocation":
      return `param:${location.name}`;
  }
};

export const isStaticLocation = (
  location: IrLocation
): location is IrStaticLocation => location.kind === "staticLocation";
