/**
 * Local invariant checks
 *
 * A violated invariant is fatal in development and logged-and-skipped
 * everywhere else; callers continue past it when this returns false.
 * In development the thrown InvariantViolation reaches the update processor,
 * which halts and hands it to its `onInvariantViolation` hook.
 */
import { isDev } from "../config/index.js";
import type { Logger } from "../infrastructure/logger.js";

export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}

export function checkInvariant(
  condition: boolean,
  message: string,
  details: Record<string, unknown>,
  logger: Logger,
): boolean {
  if (condition) return true;

  logger.error(details, message);
  if (isDev) {
    throw new InvariantViolation(message);
  }
  return false;
}
