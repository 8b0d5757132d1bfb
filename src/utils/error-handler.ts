import * as logger from "./logger.js";

export type AdbErrorKind = "missing" | "connection" | "failed";

/**
 * Fatal failure talking to adb. Aborts the whole batch.
 */
export class AdbError extends Error {
  public readonly kind: AdbErrorKind;
  public readonly details: Record<string, unknown>;

  public constructor(kind: AdbErrorKind, message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = "AdbError";
    this.kind = kind;
    this.details = details;
  }
}

export interface ErrorResult {
  success: false;
  error: string;
}

export const handleError = (
  error: unknown,
  context: string,
  verbosity?: number
): ErrorResult => {
  const msg = formatError(error);
  logger.error(`${context}: ${msg}`, verbosity);
  return { success: false, error: msg };
};

export const formatError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};

/**
 * Context attached to an AdbError, or null when there is none
 */
export const formatErrorDetails = (error: unknown): string | null => {
  if (!(error instanceof AdbError) || Object.keys(error.details).length === 0) {
    return null;
  }
  return `${error.kind}: ${JSON.stringify(error.details)}`;
};
