export type FtlErrorCode =
  | "E_BLOCK_FULL"
  | "E_ALLOCATION_EXHAUSTED"
  | "E_STORAGE_EXHAUSTED"
  | "E_NOT_MAPPED"
  | "E_INVALID_ADDRESS"
  | "E_INVALID_CONFIG";

export class FtlError extends Error {
  readonly code: FtlErrorCode;

  constructor(code: FtlErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = "FtlError";
  }
}

/**
 * Outcome of an operation that can fail during normal simulation
 * (full blocks, exhausted storage, unmapped reads).
 */
export type FtlResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: FtlError };

export const ok = <T>(value: T): FtlResult<T> => ({ ok: true, value });

export const fail = <T = never>(
  code: FtlErrorCode,
  message: string,
): FtlResult<T> => ({ ok: false, error: new FtlError(code, message) });

/**
 * Returns the value or throws the carried FtlError.
 */
export function unwrap<T>(result: FtlResult<T>): T {
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}
