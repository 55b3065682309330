import { ZodError } from "zod";

export const ERROR_CODES = {
  PERSISTENCE_ERROR: "PERSISTENCE_ERROR",
  CORRUPT_RECORD: "CORRUPT_RECORD",
  ENTRY_NOT_FOUND: "ENTRY_NOT_FOUND",
  VALIDATION_ERROR: "VALIDATION_ERROR",
  CONFIGURATION_ERROR: "CONFIGURATION_ERROR",
  CONFIRMATION_REQUIRED: "CONFIRMATION_REQUIRED",
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export interface FieldError {
  field: string;
  message: string;
}

export class SyncError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: unknown
  ) {
    super(message);
    this.name = "SyncError";
  }

  getTitle(): string {
    return this.code.replace(/_/g, " ").toLowerCase().replace(/^\w/, (c) => c.toUpperCase());
  }
}

/**
 * Local storage could not be read or written. The operation that raised it
 * must be treated as not having happened.
 */
export class PersistenceError extends SyncError {
  constructor(
    message: string,
    public key: string,
    options?: { cause?: unknown; code?: ErrorCode }
  ) {
    super(message, options?.code ?? ERROR_CODES.PERSISTENCE_ERROR, {
      key,
      cause:
        options?.cause instanceof Error ? options.cause.message : options?.cause,
    });
    this.name = "PersistenceError";
  }

  isCorruption(): boolean {
    return this.code === ERROR_CODES.CORRUPT_RECORD;
  }
}

export class EntryNotFoundError extends SyncError {
  constructor(public entryId: number) {
    super(`Entry with id '${entryId}' is not stored locally`, ERROR_CODES.ENTRY_NOT_FOUND, {
      entryId,
    });
    this.name = "EntryNotFoundError";
  }
}

export class ValidationError extends SyncError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.VALIDATION_ERROR, details);
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends SyncError {
  constructor(message: string, details?: unknown) {
    super(message, ERROR_CODES.CONFIGURATION_ERROR, details);
    this.name = "ConfigurationError";
  }
}

export class ConfirmationRequiredError extends SyncError {
  constructor(operation: string, pending: number) {
    super(
      `${operation} discards ${pending} unsynced change(s) and needs explicit confirmation`,
      ERROR_CODES.CONFIRMATION_REQUIRED,
      { operation, pending }
    );
    this.name = "ConfirmationRequiredError";
  }
}

export const formatZodError = (error: ZodError): FieldError[] => {
  return error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
  }));
};

export const errorMessage = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  return String(error);
};

export const formatErrorForLog = (
  error: unknown
): { code: string; message: string; details?: unknown } => {
  if (error instanceof SyncError) {
    return { code: error.code, message: error.message, details: error.details };
  }

  if (error instanceof ZodError) {
    return {
      code: ERROR_CODES.VALIDATION_ERROR,
      message: "Validation failed",
      details: formatZodError(error),
    };
  }

  if (error instanceof Error) {
    return { code: error.name, message: error.message };
  }

  return { code: ERROR_CODES.UNKNOWN_ERROR, message: String(error) };
};
