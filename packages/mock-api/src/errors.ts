export type MockApiErrorCode = "INVALID_JSON" | "INVALID_INPUT" | "PAYLOAD_TOO_LARGE";

const STATUS_BY_CODE: Record<MockApiErrorCode, number> = {
  INVALID_JSON: 400,
  INVALID_INPUT: 422,
  PAYLOAD_TOO_LARGE: 413,
};

/**
 * Client-caused request failure. Anything else thrown from a handler is an internal error.
 */
export class MockApiError extends Error {
  constructor(
    public readonly code: MockApiErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "MockApiError";
  }

  public get statusCode(): number {
    return STATUS_BY_CODE[this.code];
  }
}

/**
 * Startup failure while binding the listener (port in use, permission denied).
 */
export class ListenError extends Error {
  constructor(
    public readonly code: string | undefined,
    message: string,
  ) {
    super(message);
    this.name = "ListenError";
  }
}
