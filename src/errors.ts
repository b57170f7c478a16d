import { ERROR_CODES, normaliseErrorMessage, type ErrorCode } from "./types.js";

/**
 * Base class for every failure raised by the topology package. Structural
 * queries never throw (they report sentinels such as a `-1` diameter), so
 * these errors only surface from construction-time misuse and shape lookups.
 */
export class TopologyError extends Error {
  /** Stable error code, see {@link ERROR_CODES}. */
  public readonly code: ErrorCode;

  /** Optional operator hint describing how to recover from the error. */
  public readonly hint?: string;

  constructor(code: ErrorCode, message: string, hint?: string) {
    super(normaliseErrorMessage(message));
    this.name = "TopologyError";
    this.code = code;
    if (hint !== undefined) {
      this.hint = hint;
    }
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when a size, dimension or vertex id is rejected. */
export class InvalidArgumentError extends TopologyError {
  public readonly code: typeof ERROR_CODES.TOPO_INVALID_ARGUMENT;
  /** Schema issues reported by zod when the value failed validation. */
  public readonly issues?: unknown;

  constructor(message: string, options: { hint?: string; issues?: unknown } = {}) {
    super(ERROR_CODES.TOPO_INVALID_ARGUMENT, message, options.hint);
    this.name = "InvalidArgumentError";
    this.code = ERROR_CODES.TOPO_INVALID_ARGUMENT;
    if (options.issues !== undefined) {
      this.issues = options.issues;
    }
  }
}

/** Raised when a dimension index falls outside the canonical sequence. */
export class OutOfRangeError extends TopologyError {
  public readonly code: typeof ERROR_CODES.TOPO_OUT_OF_RANGE;
  public readonly details: { index: number; length: number };

  constructor(index: number, length: number) {
    super(
      ERROR_CODES.TOPO_OUT_OF_RANGE,
      `dimension index ${index} is out of range for ${length} dimension(s)`,
      length === 1 ? "the only valid index is 0" : `use an index between 0 and ${length - 1}`,
    );
    this.name = "OutOfRangeError";
    this.code = ERROR_CODES.TOPO_OUT_OF_RANGE;
    this.details = { index, length };
  }
}

/** Raised when a frozen specialised topology is structurally modified. */
export class ImmutableTopologyError extends TopologyError {
  public readonly code: typeof ERROR_CODES.TOPO_IMMUTABLE;
  public readonly details: { kind: string; operation: "addVertex" | "addEdge" };

  constructor(kind: string, operation: "addVertex" | "addEdge") {
    super(
      ERROR_CODES.TOPO_IMMUTABLE,
      `${kind} topology is frozen and rejects ${operation}`,
      "copy the structure into a generic graph or build it in degrade mode",
    );
    this.name = "ImmutableTopologyError";
    this.code = ERROR_CODES.TOPO_IMMUTABLE;
    this.details = { kind, operation };
  }
}
