export type ErrorContext = Record<string, unknown>;

export class StatusLedgerError extends Error {
  code: string;
  context?: ErrorContext;
  cause?: unknown;

  constructor(code: string, message: string, context?: ErrorContext, cause?: unknown) {
    super(message);
    this.name = code;
    this.code = code;
    this.context = context;
    this.cause = cause;
  }
}

export class ConfigurationError extends StatusLedgerError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super("ConfigurationError", message, context, cause);
  }
}

export class AuthenticationError extends StatusLedgerError {
  constructor(message: string, context?: ErrorContext, cause?: unknown) {
    super("AuthenticationError", message, context, cause);
  }
}

export class ValidationError extends StatusLedgerError {
  constructor(message: string, context?: ErrorContext) {
    super("ValidationError", message, context);
  }
}

export class DriveRequestError extends StatusLedgerError {
  status: number;

  constructor(operation: string, status: number, body: string) {
    super(
      "DriveRequestError",
      `${operation} failed (${status}): ${body || "no response body"}`,
      { operation, status }
    );
    this.status = status;
  }
}

export class DocumentWriteError extends StatusLedgerError {
  constructor(documentName: string, cause: unknown, context?: ErrorContext) {
    super(
      "DocumentWriteError",
      `Failed to update the document "${documentName}": ${toUserMessage(cause)}`,
      { documentName, ...context },
      cause
    );
  }
}

export function toUserMessage(err: unknown): string {
  if (err instanceof StatusLedgerError) return err.message;
  if (err instanceof Error) return err.message;
  return String(err);
}
