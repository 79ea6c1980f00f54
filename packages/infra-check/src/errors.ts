export type InfraCheckErrorCode = "malformed_request" | "invalid_config" | "internal_error";

export class InfraCheckError extends Error {
  readonly code: InfraCheckErrorCode;

  constructor(code: InfraCheckErrorCode, message: string) {
    super(message);
    this.name = "InfraCheckError";
    this.code = code;
  }
}

// Non-blank stdin that is not a JSON object.
export class MalformedRequestError extends InfraCheckError {
  constructor(message: string) {
    super("malformed_request", message);
    this.name = "MalformedRequestError";
  }
}

export class ConfigError extends InfraCheckError {
  constructor(message: string) {
    super("invalid_config", message);
    this.name = "ConfigError";
  }
}

export const formatUnknownError = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export const errorCodeOf = (err: unknown): InfraCheckErrorCode =>
  err instanceof InfraCheckError ? err.code : "internal_error";
