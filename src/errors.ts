import { inspect } from "node:util";

export type ConversionErrorCode = "ERR_NORMALIZE" | "ERR_FILTER" | "ERR_MARKDOWN" | "ERR_INVALID_OPTIONS";

export interface ConversionErrorDetails {
  name: string;
  message: string;
  code?: string | number;
  originalError?: ConversionErrorDetails;
}

/**
 * Raised inside the pipeline when a stage fails. The generator logs it and degrades
 * instead of letting it escape.
 */
export class ConversionError extends Error {
  /** Pipeline stage that failed. */
  public readonly code: ConversionErrorCode;
  /** The original error object, if available. */
  public readonly originalError?: Error;

  constructor(message: string, code: ConversionErrorCode, originalError?: Error) {
    super(message);
    this.name = "ConversionError";
    this.code = code;
    this.originalError = originalError;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConversionError);
    }
  }

  /**
   * Wraps whatever a stage threw, keeping an existing ConversionError as is.
   */
  static from(error: unknown, code: ConversionErrorCode, message: string): ConversionError {
    if (error instanceof ConversionError) {
      return error;
    }
    const original = error instanceof Error ? error : new Error(String(error));
    return new ConversionError(`${message}: ${original.message}`, code, original);
  }

  /**
   * Returns a plain object representation with only useful metadata for logging.
   */
  toObject(): ConversionErrorDetails {
    const descriptor: ConversionErrorDetails = {
      name: this.name,
      message: this.message,
      code: this.code,
    };

    const original = serializeUnknownError(this.originalError);
    if (original) {
      descriptor.originalError = original;
    }

    return descriptor;
  }

  toJSON(): ConversionErrorDetails {
    return this.toObject();
  }

  [inspect.custom](): ConversionErrorDetails {
    return this.toObject();
  }
}

function serializeUnknownError(error: unknown): ConversionErrorDetails | undefined {
  if (!error) {
    return undefined;
  }

  if (error instanceof ConversionError) {
    return error.toObject();
  }

  if (error instanceof Error) {
    const descriptor: ConversionErrorDetails = {
      name: error.name || "Error",
      message: error.message,
    };

    if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
      descriptor.code = error.code;
    }

    return descriptor;
  }

  return {
    name: "Error",
    message: typeof error === "string" ? error : String(error),
  };
}
