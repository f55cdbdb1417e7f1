/**
 * Purpose: Classify migrator failures into pre-flight configuration errors and runtime operation errors.
 * Persists: None.
 * Security Risks: Error envelopes must not include the account key or SAS query strings.
 */

export type ConfigurationErrorCode =
  | "missing_account_key"
  | "invalid_tier"
  | "same_tier"
  | "invalid_number"
  | "invalid_url"
  | "invalid_name";

export type OperationErrorCode = "authentication_failed" | "enumeration_failed" | "batch_failed";

export class ConfigurationError extends Error {
  readonly code: ConfigurationErrorCode;

  constructor(code: ConfigurationErrorCode, message: string) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class OperationError extends Error {
  readonly code: OperationErrorCode;

  constructor(args: { code: OperationErrorCode; message: string; cause?: unknown }) {
    super(args.message, { cause: args.cause });
    this.name = "OperationError";
    this.code = args.code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const toErrorMessage = (reason: unknown): string => {
  if (reason instanceof Error) return reason.message;
  return String(reason);
};

export const wrapOperationFailure = (
  code: OperationErrorCode,
  reason: unknown,
  context: string
): OperationError => {
  if (reason instanceof OperationError) {
    return reason;
  }
  return new OperationError({
    code,
    message: `${context}: ${toErrorMessage(reason)}`,
    cause: reason,
  });
};

export type ErrorEnvelope = {
  name: string;
  message: string;
  code?: string;
  cause?: string;
  stack?: string;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

export const describeError = (err: unknown, includeStack: boolean): ErrorEnvelope => {
  const error = err instanceof Error ? err : new Error(String(err));
  const errorRecord = isRecord(err) ? err : {};

  const envelope: ErrorEnvelope = {
    name: error.name || "Error",
    message: error.message,
  };

  if (typeof errorRecord.code === "string") {
    envelope.code = errorRecord.code;
  }

  if (errorRecord.cause !== undefined) {
    envelope.cause = toErrorMessage(errorRecord.cause);
  }

  if (includeStack && typeof error.stack === "string") {
    envelope.stack = error.stack;
  }

  return envelope;
};

export const isDebugMode = (env: NodeJS.ProcessEnv = process.env): boolean => {
  const debug = env.DEBUG?.toLowerCase();
  return debug === "1" || debug === "true";
};
