/**
 * @fileoverview Error codes and the error class shared by every layer of the
 * application. Codes follow JSON-RPC 2.0; domain failures use the
 * implementation-defined server range.
 * @module src/types-global/errors
 */

/**
 * JSON-RPC 2.0 error codes, plus the domain codes of the loop-trim pipeline.
 */
export enum JsonRpcErrorCode {
  /** Malformed numeric or position token. */
  ParseError = -32700,
  InvalidRequest = -32600,
  MethodNotFound = -32601,
  InvalidParams = -32602,
  InternalError = -32603,
  ServiceUnavailable = -32000,
  NotFound = -32001,
  Timeout = -32004,
  ValidationError = -32007,
  /** Loop specification or loop set violates an invariant. */
  ConfigurationError = -32008,
  /** Reading or writing a file failed. */
  IoError = -32011,
  /** Every candidate model failed. */
  NoValidModel = -32020,
  /** Template and candidate residues cannot be put in correspondence. */
  StructureMismatch = -32021,
  /** A trimmed or out-of-range residue was asked for its output index. */
  ResidueNotMapped = -32022,
}

/**
 * Application error carrying a {@link JsonRpcErrorCode} and optional details.
 */
export class McpError extends Error {
  public readonly code: JsonRpcErrorCode;
  public readonly data?: Record<string, unknown> | undefined;

  constructor(
    code: JsonRpcErrorCode,
    message: string,
    data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'McpError';
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Human-readable name of an error code, used in CLI and tool error output.
 */
export function errorCodeName(code: JsonRpcErrorCode): string {
  return JsonRpcErrorCode[code] ?? 'UnknownError';
}
