/**
 * tcsetup CLI - Configuration
 *
 * Turns parsed flags and the environment into the engine's Settings and
 * the frozen RunConfig for one run.
 */

import * as os from "os";
import { loadSettings, ProvisionError, RunConfig, Settings } from "@tcsetup/engine";

/** Flags as commander hands them over */
export interface CliOptions {
  version?: string;
  uninstall?: boolean;
  debug?: boolean;
}

/**
 * The person who runs the tool. Under sudo that is SUDO_USER, not root.
 */
export function currentUserName(env: NodeJS.ProcessEnv = process.env): string {
  return env.SUDO_USER || env.USER || os.userInfo().username;
}

/**
 * Build the run configuration. The result is never mutated.
 *
 * @throws ProvisionError (VALIDATION_ERROR) when --version swallowed another flag
 */
export function buildRunConfig(
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Readonly<RunConfig> {
  if (opts.version !== undefined && (opts.version === "" || opts.version.startsWith("-"))) {
    throw new ProvisionError(
      "VALIDATION_ERROR",
      "--version argument requires a value (e.g., --version N)",
    );
  }

  return Object.freeze({
    targetVersion: opts.version,
    uninstallRequested: Boolean(opts.uninstall),
    debugMode: Boolean(opts.debug),
    currentUser: currentUserName(env),
  });
}

/**
 * Settings for this run. --debug raises logging to debug regardless of
 * the configured level.
 */
export function loadCliSettings(
  opts: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Settings {
  const settings = loadSettings({ env });
  return opts.debug ? { ...settings, logLevel: "debug" } : settings;
}
