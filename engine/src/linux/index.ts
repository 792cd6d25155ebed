/**
 * tcsetup Engine - Linux Layer (Barrel Export)
 */

export {
  SpawnCommandRunner,
  runChecked,
  formatCommand,
  type SpawnRunnerOptions,
} from "./command";

export { LinuxSystem } from "./system";

export { ensurePrivileges, startKeepAlive, KEEP_ALIVE_INTERVAL_MS } from "./elevate";

export {
  parseJavaAlternatives,
  parseGroupList,
  isWsl,
  windowsExplorerPath,
} from "./platform";

export type {
  CommandOptions,
  CommandResult,
  CommandRunner,
  OwnerSpec,
  System,
  SystemAdapter,
  SystemInspector,
} from "./types";
