/**
 * tcsetup Engine - Linux System Interfaces
 *
 * The orchestration code never runs a command itself. It asks a
 * SystemInspector questions and tells a SystemAdapter what to change.
 * LinuxSystem implements both with real tools; tests use an in-memory fake.
 */

// ─── Command execution ─────────────────────────────────────────

export interface CommandOptions {
  /** Data written to the child's stdin */
  input?: string;
  /** Inherit the terminal (password prompts) instead of capturing output */
  interactive?: boolean;
  /** Run through sudo when the process is not root */
  privileged?: boolean;
}

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs a program. Resolves for any exit code; rejects never.
 */
export interface CommandRunner {
  run(
    command: string,
    args: string[],
    options?: CommandOptions,
  ): Promise<CommandResult>;
}

// ─── Inspection ────────────────────────────────────────────────

export interface SystemInspector {
  pathExists(target: string): Promise<boolean>;
  /** Names of the sub-directories of `dir` (empty when `dir` is missing) */
  listDirectories(dir: string): Promise<string[]>;
  serviceActive(serviceName: string): Promise<boolean>;
  serviceEnabled(serviceName: string): Promise<boolean>;
  userExists(user: string): Promise<boolean>;
  groupExists(group: string): Promise<boolean>;
  userInGroup(user: string, group: string): Promise<boolean>;
}

// ─── Mutation ──────────────────────────────────────────────────

export interface OwnerSpec {
  user: string;
  group: string;
}

export interface SystemAdapter {
  // Privileges
  hasPrivileges(): Promise<boolean>;
  obtainPrivileges(): Promise<boolean>;
  refreshPrivileges(): Promise<void>;

  // Packages
  updatePackages(): Promise<void>;
  installPackages(packages: string[]): Promise<void>;

  // Files
  makeDirectory(target: string): Promise<void>;
  extractArchive(archive: string, dest: string, stripComponents: number): Promise<void>;
  copyFile(source: string, dest: string): Promise<void>;
  writeFile(dest: string, content: string): Promise<void>;
  removePath(target: string): Promise<void>;
  setOwner(target: string, owner: OwnerSpec, recursive: boolean): Promise<void>;
  /** chmod mode, numeric ("644") or symbolic ("g+w") */
  setMode(target: string, mode: string, recursive: boolean): Promise<void>;
  /** rwx for the group on everything under `target`; `inherit` sets the default ACL */
  applyGroupAcl(target: string, group: string, inherit: boolean): Promise<void>;

  // Accounts
  createSystemGroup(group: string): Promise<void>;
  createSystemUser(user: string, group: string, homeDir: string): Promise<void>;
  addUserToGroup(user: string, group: string): Promise<void>;
  removeUserFromGroup(user: string, group: string): Promise<void>;
  deleteUser(user: string): Promise<void>;
  deleteGroup(group: string): Promise<void>;

  // Services
  reloadServices(): Promise<void>;
  enableService(serviceName: string): Promise<void>;
  startService(serviceName: string): Promise<void>;
  stopService(serviceName: string): Promise<void>;
  disableService(serviceName: string): Promise<void>;
  serviceStatus(serviceName: string): Promise<string>;

  // Environment discovery
  detectJavaHome(javaVersion: string): Promise<string | undefined>;
  distributionName(): Promise<string | undefined>;
}

export type System = SystemInspector & SystemAdapter;
