/**
 * tcsetup Engine - Privilege Handling
 *
 * Obtains sudo credentials once before any mutation and keeps them fresh
 * for the rest of the run.
 */

import { Logger } from "../utils/logger";
import { ProvisionError } from "../errors";
import { SystemAdapter } from "./types";

export const KEEP_ALIVE_INTERVAL_MS = 60_000;

/**
 * Make sure mutations can run. Cached credentials are used silently,
 * otherwise sudo prompts on the terminal.
 *
 * @throws ProvisionError (PRIVILEGE_ERROR) when sudo refuses
 */
export async function ensurePrivileges(
  system: SystemAdapter,
  logger: Logger,
): Promise<void> {
  if (await system.hasPrivileges()) {
    logger.debug("Administrative privileges are active");
    return;
  }

  logger.info("Requesting administrative privileges");
  if (!(await system.obtainPrivileges())) {
    throw new ProvisionError(
      "PRIVILEGE_ERROR",
      "Could not obtain administrative privileges.",
    );
  }
}

/**
 * Re-validate the sudo timestamp periodically. The timer is unref'd so it
 * never keeps the process alive; call the returned function to stop it.
 */
export function startKeepAlive(
  system: SystemAdapter,
  logger: Logger,
  intervalMs: number = KEEP_ALIVE_INTERVAL_MS,
): () => void {
  const timer = setInterval(() => {
    system.refreshPrivileges().catch((err: unknown) => {
      const message = err instanceof Error ? err.message : String(err);
      logger.debug({ error: message }, "Keep-alive refresh failed");
    });
  }, intervalMs);
  timer.unref();

  return () => clearInterval(timer);
}
