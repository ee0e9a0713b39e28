export type TopologyErrorCode = "INVALID_PARAMETER" | "SERIALIZATION_ERROR";

export class TopologyError extends Error {
  readonly code: TopologyErrorCode;

  constructor(code: TopologyErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised before any construction work when inputs are malformed or out of range. */
export class InvalidParameterError extends TopologyError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super("INVALID_PARAMETER", `Invalid parameters: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** Raised by the exporter when an element cannot be written to the persisted format. */
export class SerializationError extends TopologyError {
  readonly elementId: string;

  constructor(elementId: string, message: string) {
    super("SERIALIZATION_ERROR", `${elementId}: ${message}`);
    this.elementId = elementId;
  }
}

export function isTopologyError(err: unknown): err is TopologyError {
  return err instanceof TopologyError;
}
