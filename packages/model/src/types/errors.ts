/**
 * Error types for classification failures
 */

export type AbiErrorKind =
  | "configuration"
  | "usage"
  | "variadic"
  | "unsupported";

export type AbiErrorCode =
  | "RVC1001" // Unsupported XLEN
  | "RVC1002" // Unsupported FLEN
  | "RVC2001" // Argument/return descriptors are not unique instances
  | "RVC2002" // VarArgs used outside the trailing argument position
  | "RVC2003" // Array passed or returned by value
  | "RVC2004" // Invalid type descriptor construction
  | "RVC2005" // Stack object index out of range
  // CLI errors (RVC3001-RVC3004)
  | "RVC3001" // Config file not found
  | "RVC3002" // Failed to read or parse config file
  | "RVC3003" // Invalid config value
  | "RVC3004"; // Invalid call description

const kindByCode: Readonly<Record<AbiErrorCode, AbiErrorKind>> = {
  RVC1001: "configuration",
  RVC1002: "configuration",
  RVC2001: "usage",
  RVC2002: "variadic",
  RVC2003: "unsupported",
  RVC2004: "usage",
  RVC2005: "usage",
  RVC3001: "configuration",
  RVC3002: "configuration",
  RVC3003: "configuration",
  RVC3004: "usage",
};

export type AbiError = {
  readonly code: AbiErrorCode;
  readonly kind: AbiErrorKind;
  readonly message: string;
  readonly hint?: string;
};

export const createAbiError = (
  code: AbiErrorCode,
  message: string,
  hint?: string
): AbiError => ({
  code,
  kind: kindByCode[code],
  message,
  hint,
});

export const formatAbiError = (abiError: AbiError): string => {
  const parts: string[] = [`${abiError.kind} error ${abiError.code}:`];
  parts.push(abiError.message);

  if (abiError.hint) {
    parts.push(`Hint: ${abiError.hint}`);
  }

  return parts.join(" ");
};

/**
 * Thrown by descriptor constructors, which are used as expressions and
 * cannot return a Result. Carries the same payload as a returned error.
 */
export class AbiConstructionError extends Error {
  readonly abiError: AbiError;

  constructor(abiError: AbiError) {
    super(formatAbiError(abiError));
    this.name = "AbiConstructionError";
    this.abiError = abiError;
  }
}

/**
 * Internal invariant violation: only reachable through a defect in the
 * classification routing, never through caller input.
 */
export const internalError = (message: string): Error =>
  new Error(`ICE: ${message}`);
