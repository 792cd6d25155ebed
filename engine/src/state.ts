/**
 * tcsetup Engine - Installation State
 *
 * Derives what is already on the machine for a release line and decides
 * what to do about an existing install before a new one starts.
 *
 * Interactive runs never return control to the install flow when an
 * install exists: every branch ends in an "exit" outcome. Automated runs
 * remove the existing install and continue, which makes repeated
 * unattended runs behave the same every time.
 */

import { Settings, installDirFor, serviceNameFor, unitFilePathFor } from "./config";
import { SystemAdapter, SystemInspector } from "./linux/types";
import { Logger } from "./utils/logger";
import { Uninstaller } from "./uninstaller";
import { ConflictOutcome, InstallationRecord, Prompter, RunMode } from "./types";

export async function inspectInstallation(
  inspector: SystemInspector,
  settings: Settings,
  major: string,
): Promise<InstallationRecord> {
  const installDir = installDirFor(settings, major);
  const serviceName = serviceNameFor(major);

  return {
    major,
    installDir,
    serviceName,
    installExists: await inspector.pathExists(installDir),
    serviceActive: await inspector.serviceActive(serviceName),
    serviceEnabled: await inspector.serviceEnabled(serviceName),
    unitFileExists: await inspector.pathExists(unitFilePathFor(settings, major)),
    userExists: await inspector.userExists(settings.serviceUser),
    groupExists: await inspector.groupExists(settings.serviceGroup),
  };
}

export interface ConflictCheckOptions {
  system: SystemInspector & SystemAdapter;
  settings: Settings;
  logger: Logger;
  prompter: Prompter;
  uninstaller: Uninstaller;
  /** Called with user-facing notices (existing install found, reinstalling, ...) */
  onNotice?: (level: "info" | "warn", message: string) => void;
}

const ACTION_QUESTION =
  "Do you want to uninstall the existing version or just stop any running service and exit? (uninstall/stop) ";

export async function checkForExistingInstall(
  major: string,
  mode: RunMode,
  options: ConflictCheckOptions,
): Promise<ConflictOutcome> {
  const { system, settings, logger, prompter, uninstaller } = options;
  const notice = (level: "info" | "warn", message: string) => {
    logger[level]({ major }, message);
    options.onNotice?.(level, message);
  };

  const installDir = installDirFor(settings, major);
  if (!(await system.pathExists(installDir))) {
    return { action: "continue", reinstalled: false };
  }

  notice("info", `An existing Tomcat installation was found at '${installDir}'.`);

  if (mode === "automated") {
    notice(
      "warn",
      `Automated mode: removing the existing Tomcat ${major} installation before reinstalling.`,
    );
    await uninstaller.uninstall(major, "automated");
    return { action: "continue", reinstalled: true };
  }

  const answer = (await prompter.ask(ACTION_QUESTION)).trim();

  if (answer === "uninstall") {
    const report = await uninstaller.uninstall(major, "interactive");
    if (report.cancelled) {
      return { action: "exit", exitCode: 1, message: "Uninstall cancelled." };
    }
    return {
      action: "exit",
      exitCode: 0,
      message: "Existing version has been uninstalled. Exiting.",
    };
  }

  if (answer === "stop") {
    const serviceName = serviceNameFor(major);
    if (await system.serviceActive(serviceName)) {
      notice("info", "Stopping the existing Tomcat service...");
      await system.stopService(serviceName);
    } else {
      notice("info", "Installation directory exists, but the service is not active.");
    }
    return { action: "exit", exitCode: 1, message: "Exiting without changes to the installation." };
  }

  return { action: "exit", exitCode: 1, message: "Invalid option. Exiting." };
}
