/**
 * tcsetup Engine - Linux System (apt, coreutils, acl, shadow-utils, systemd)
 *
 * Implements SystemInspector and SystemAdapter with the real tools.
 * Mutations run privileged (through sudo when not root) and throw
 * COMMAND_ERROR on a non-zero exit. Predicates never throw for a
 * "no" answer.
 */

import * as fs from "fs";
import { Logger } from "../utils/logger";
import { runChecked } from "./command";
import { parseGroupList, parseJavaAlternatives } from "./platform";
import { CommandRunner, OwnerSpec, System } from "./types";

export class LinuxSystem implements System {
  constructor(
    private readonly runner: CommandRunner,
    private readonly logger: Logger,
  ) {}

  private async sudo(command: string, args: string[], input?: string): Promise<string> {
    const { stdout } = await runChecked(this.runner, command, args, {
      privileged: true,
      input,
    });
    return stdout;
  }

  private async succeeds(command: string, args: string[]): Promise<boolean> {
    const { code } = await this.runner.run(command, args);
    return code === 0;
  }

  // ─── Inspection ──────────────────────────────────────────────

  async pathExists(target: string): Promise<boolean> {
    return fs.existsSync(target);
  }

  async listDirectories(dir: string): Promise<string[]> {
    if (!fs.existsSync(dir)) return [];
    return fs
      .readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isDirectory())
      .map((entry) => entry.name);
  }

  serviceActive(serviceName: string): Promise<boolean> {
    return this.succeeds("systemctl", ["is-active", "--quiet", serviceName]);
  }

  serviceEnabled(serviceName: string): Promise<boolean> {
    return this.succeeds("systemctl", ["is-enabled", "--quiet", serviceName]);
  }

  userExists(user: string): Promise<boolean> {
    return this.succeeds("id", [user]);
  }

  groupExists(group: string): Promise<boolean> {
    return this.succeeds("getent", ["group", group]);
  }

  async userInGroup(user: string, group: string): Promise<boolean> {
    const { code, stdout } = await this.runner.run("id", ["-nG", user]);
    if (code !== 0) return false;
    return parseGroupList(stdout).includes(group);
  }

  // ─── Privileges ──────────────────────────────────────────────

  async hasPrivileges(): Promise<boolean> {
    const { code } = await this.runner.run("sudo", ["-n", "true"]);
    return code === 0;
  }

  async obtainPrivileges(): Promise<boolean> {
    const { code } = await this.runner.run("sudo", ["-v"], { interactive: true });
    return code === 0;
  }

  async refreshPrivileges(): Promise<void> {
    const { code } = await this.runner.run("sudo", ["-n", "true"]);
    if (code !== 0) {
      this.logger.debug("sudo keep-alive refresh did not succeed");
    }
  }

  // ─── Packages ────────────────────────────────────────────────

  async updatePackages(): Promise<void> {
    await this.sudo("apt-get", ["update"]);
    await this.sudo("apt-get", ["upgrade", "-y"]);
  }

  async installPackages(packages: string[]): Promise<void> {
    if (packages.length === 0) return;
    await this.sudo("apt-get", ["install", "-y", ...packages]);
  }

  // ─── Files ───────────────────────────────────────────────────

  async makeDirectory(target: string): Promise<void> {
    await this.sudo("mkdir", ["-p", target]);
  }

  async extractArchive(archive: string, dest: string, stripComponents: number): Promise<void> {
    await this.sudo("tar", [
      "xzf",
      archive,
      "-C",
      dest,
      `--strip-components=${stripComponents}`,
    ]);
  }

  async copyFile(source: string, dest: string): Promise<void> {
    await this.sudo("cp", [source, dest]);
  }

  async writeFile(dest: string, content: string): Promise<void> {
    // tee keeps the write under sudo without a shell
    await this.sudo("tee", [dest], content);
  }

  async removePath(target: string): Promise<void> {
    await this.sudo("rm", ["-rf", target]);
  }

  async setOwner(target: string, owner: OwnerSpec, recursive: boolean): Promise<void> {
    const spec = `${owner.user}:${owner.group}`;
    await this.sudo("chown", recursive ? ["-R", spec, target] : [spec, target]);
  }

  async setMode(target: string, mode: string, recursive: boolean): Promise<void> {
    await this.sudo("chmod", recursive ? ["-R", mode, target] : [mode, target]);
  }

  async applyGroupAcl(target: string, group: string, inherit: boolean): Promise<void> {
    const entry = `g:${group}:rwx`;
    await this.sudo("setfacl", inherit ? ["-Rdm", entry, target] : ["-R", "-m", entry, target]);
  }

  // ─── Accounts ────────────────────────────────────────────────

  async createSystemGroup(group: string): Promise<void> {
    await this.sudo("groupadd", ["--system", "--force", group]);
  }

  async createSystemUser(user: string, group: string, homeDir: string): Promise<void> {
    await this.sudo("useradd", ["-d", homeDir, "--system", "-g", group, "-s", "/bin/false", user]);
  }

  async addUserToGroup(user: string, group: string): Promise<void> {
    await this.sudo("usermod", ["-aG", group, user]);
  }

  async removeUserFromGroup(user: string, group: string): Promise<void> {
    await this.sudo("gpasswd", ["-d", user, group]);
  }

  async deleteUser(user: string): Promise<void> {
    await this.sudo("userdel", [user]);
  }

  async deleteGroup(group: string): Promise<void> {
    await this.sudo("groupdel", [group]);
  }

  // ─── Services ────────────────────────────────────────────────

  async reloadServices(): Promise<void> {
    await this.sudo("systemctl", ["daemon-reload"]);
  }

  async enableService(serviceName: string): Promise<void> {
    await this.sudo("systemctl", ["enable", serviceName]);
  }

  async startService(serviceName: string): Promise<void> {
    await this.sudo("systemctl", ["start", serviceName]);
  }

  async stopService(serviceName: string): Promise<void> {
    await this.sudo("systemctl", ["stop", serviceName]);
  }

  async disableService(serviceName: string): Promise<void> {
    await this.sudo("systemctl", ["disable", serviceName]);
  }

  /** Status text; exit code 3 (inactive) is not an error here */
  async serviceStatus(serviceName: string): Promise<string> {
    const { stdout } = await this.runner.run("systemctl", ["status", "--no-pager", serviceName], {
      privileged: true,
    });
    return stdout;
  }

  // ─── Environment discovery ───────────────────────────────────

  async detectJavaHome(javaVersion: string): Promise<string | undefined> {
    const { code, stdout } = await this.runner.run("update-java-alternatives", ["-l"]);
    if (code !== 0) return undefined;
    return parseJavaAlternatives(stdout, javaVersion);
  }

  async distributionName(): Promise<string | undefined> {
    const { code, stdout } = await this.runner.run("lsb_release", ["-is"]);
    if (code !== 0) return undefined;
    return stdout.trim() || undefined;
  }
}
