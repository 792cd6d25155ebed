/**
 * tcsetup Engine - Error Type
 */

import { ErrorCategory } from "./types";

export class ProvisionError extends Error {
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "ProvisionError";
    this.category = category;
    this.details = details;
  }
}

export function isProvisionError(err: unknown): err is ProvisionError {
  return err instanceof ProvisionError;
}

/**
 * Message of any thrown value.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
