/**
 * tcsetup Engine - Uninstaller
 *
 * Tears an installation down in a fixed order:
 *
 *   service stop/disable/unit removal
 *   → invoking user leaves the service group
 *   → service user (and its group) deleted
 *   → install directory removed
 *   → shared temp area removed
 *
 * Group membership is removed before the user/group deletion so the
 * group is never deleted while it still lists the invoking user.
 */

import { Settings, installDirFor, serviceNameFor, unitFilePathFor } from "./config";
import { System } from "./linux/types";
import { Logger } from "./utils/logger";
import { Prompter, RunMode, UninstallReport } from "./types";

export interface UninstallerOptions {
  system: System;
  settings: Settings;
  logger: Logger;
  prompter: Prompter;
  currentUser: string;
  /** Receives one line per action for the CLI */
  onAction?: (message: string) => void;
}

const CONFIRM_QUESTION =
  "This will permanently delete the Tomcat installation, user, and service.\n" +
  "Are you sure you want to continue? (y/n) ";

export class Uninstaller {
  constructor(private readonly options: UninstallerOptions) {}

  async uninstall(major: string, mode: RunMode): Promise<UninstallReport> {
    const { system, settings, logger, prompter, currentUser } = this.options;
    const actions: string[] = [];
    const record = (message: string) => {
      actions.push(message);
      logger.info({ major }, message);
      this.options.onAction?.(message);
    };

    if (mode === "interactive") {
      const reply = await prompter.ask(CONFIRM_QUESTION);
      if (!/^[Yy]/.test(reply.trim())) {
        logger.info({ major }, "Uninstall cancelled");
        return { cancelled: true, actions };
      }
    }

    const serviceName = serviceNameFor(major);
    const unitFile = unitFilePathFor(settings, major);
    const installDir = installDirFor(settings, major);
    const user = settings.serviceUser;
    const group = settings.serviceGroup;

    // 1. Service
    if (await system.serviceActive(serviceName)) {
      await system.stopService(serviceName);
      record(`Stopped ${serviceName}`);
    }
    if (await system.serviceEnabled(serviceName)) {
      await system.disableService(serviceName);
      record(`Disabled ${serviceName}`);
    }
    if (await system.pathExists(unitFile)) {
      await system.removePath(unitFile);
      await system.reloadServices();
      record(`Removed ${unitFile}`);
    } else {
      record("Service file not found");
    }

    // 2. Membership first
    if (await system.userInGroup(currentUser, group)) {
      await system.removeUserFromGroup(currentUser, group);
      record(`Removed user ${currentUser} from group ${group}`);
    }

    // 3. Account, then any leftover group
    if (await system.userExists(user)) {
      await system.deleteUser(user);
      record(`Deleted user ${user}`);
      if (await system.groupExists(group)) {
        await system.deleteGroup(group);
        record(`Deleted group ${group}`);
      }
    } else {
      record(`User ${user} not found`);
    }

    // 4. Files
    if (await system.pathExists(installDir)) {
      await system.removePath(installDir);
      record(`Deleted installation directory ${installDir}`);
    } else {
      record(`Installation directory ${installDir} not found`);
    }

    // 5. Shared temp area, unless another release line still uses it
    if (await system.pathExists(settings.sharedTempDir)) {
      const remaining = (await system.listDirectories(settings.installRoot)).filter(
        (name) => /^tomcat\d+$/.test(name) && name !== `tomcat${major}`,
      );
      if (remaining.length === 0) {
        await system.removePath(settings.sharedTempDir);
        record(`Deleted shared directory ${settings.sharedTempDir}`);
      } else {
        record(
          `Kept shared directory ${settings.sharedTempDir} (still used by ${remaining.join(", ")})`,
        );
      }
    }

    logger.info({ major, actions: actions.length }, "Uninstall complete");
    return { cancelled: false, actions };
  }
}
