export type SpotlightErrorCode =
  | "SETUP_REQUIRED"
  | "INVALID_MESSAGE"
  | "INVALID_CONFIG"
  | "STORAGE_IO";

type SpotlightErrorOptions = {
  context?: Record<string, unknown>;
  cause?: unknown;
};

export class SpotlightError extends Error {
  readonly code: SpotlightErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: SpotlightErrorCode, message: string, options: SpotlightErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "SpotlightError";
    this.code = code;
    this.context = options.context;
  }
}

export function isSpotlightError(error: unknown, code?: SpotlightErrorCode): error is SpotlightError {
  if (!(error instanceof SpotlightError)) {
    return false;
  }
  return code === undefined || error.code === code;
}
