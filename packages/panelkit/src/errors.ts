// Error codes for type safety
export const ERROR_CODES = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class PanelKitError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly context: Record<string, string | number | boolean> = {},
  ) {
    super(message);
    this.name = "PanelKitError";
  }
}

/**
 * Validation failure with the offending field and value.
 */
export class ValidationError extends PanelKitError {
  constructor(
    message: string,
    public readonly field: string,
    public readonly value: unknown,
  ) {
    super(`${field}: ${message}`, ERROR_CODES.VALIDATION_ERROR, { field });
    this.name = "ValidationError";
  }
}
