/**
 * tcsetup Engine - Core Type Definitions
 *
 * Every value here is transient: built once per run, owned by the
 * Provisioner, never persisted by the tool itself.
 */

// ─── Versions ────────────────────────────────────────────────────

export interface VersionSpec {
  /** Release line, e.g. "10" */
  major: string;
  /** Full release, e.g. "10.1.50". Empty until resolved on the install path. */
  minor: string;
}

// ─── Release Assets ──────────────────────────────────────────────

export interface ReleaseAsset {
  downloadUrl: string;
  filename: string;
}

export interface DriverSource {
  /** Human-readable name used in messages, e.g. "PostgreSQL" */
  name: string;
  owner: string;
  repo: string;
  /** Regular expressions tried in order against each asset URL */
  patterns: string[];
}

// ─── Installation State ──────────────────────────────────────────

export interface InstallationRecord {
  major: string;
  installDir: string;
  serviceName: string;
  installExists: boolean;
  serviceActive: boolean;
  serviceEnabled: boolean;
  unitFileExists: boolean;
  userExists: boolean;
  groupExists: boolean;
}

export type RunMode = "interactive" | "automated";

export type ConflictOutcome =
  | { action: "continue"; reinstalled: boolean }
  | { action: "exit"; exitCode: number; message: string };

// ─── Run Configuration ───────────────────────────────────────────

export interface RunConfig {
  /** Major version from --version or the interactive prompt */
  targetVersion?: string;
  uninstallRequested: boolean;
  /** --debug: automated mode plus debug logging */
  debugMode: boolean;
  /** The human user who gets added to the service group */
  currentUser: string;
}

// ─── Step Pipeline ───────────────────────────────────────────────

export type StepStatus = "ok" | "warning" | "failed" | "skipped";

export interface StepResult {
  name: string;
  title: string;
  status: StepStatus;
  message?: string;
  durationMs: number;
}

// ─── Errors ──────────────────────────────────────────────────────

export type ErrorCategory =
  | "RESOLUTION_ERROR"
  | "VALIDATION_ERROR"
  | "PRIVILEGE_ERROR"
  | "NETWORK_ERROR"
  | "ASSET_NOT_FOUND"
  | "COMMAND_ERROR";

// ─── Outcomes ────────────────────────────────────────────────────

export interface UninstallReport {
  cancelled: boolean;
  /** What was actually done, in order */
  actions: string[];
}

export type RunAction = "install" | "uninstall" | "conflict" | "cancelled";

export interface RunOutcome {
  action: RunAction;
  exitCode: number;
  version?: VersionSpec;
  installDir?: string;
  serviceName?: string;
  steps: StepResult[];
  warnings: string[];
  message?: string;
  /** `systemctl status` output captured after start */
  serviceStatus?: string;
}

// ─── Events ──────────────────────────────────────────────────────

export type ProvisionerEventType =
  | "phase"
  | "step_start"
  | "step_done"
  | "progress"
  | "notice";

export interface PhaseEvent {
  type: "phase";
  timestamp: string;
  phase: string;
}

export interface StepStartEvent {
  type: "step_start";
  timestamp: string;
  step: string;
  title: string;
}

export interface StepDoneEvent {
  type: "step_done";
  timestamp: string;
  result: StepResult;
}

export interface ProgressEvent {
  type: "progress";
  timestamp: string;
  step: string;
  bytesDownloaded: number;
  bytesTotal: number;
  percent: number;
}

export interface NoticeEvent {
  type: "notice";
  timestamp: string;
  level: "info" | "warn";
  message: string;
}

export type ProvisionerEvent =
  | PhaseEvent
  | StepStartEvent
  | StepDoneEvent
  | ProgressEvent
  | NoticeEvent;

export type ProvisionerEventHandler = (event: ProvisionerEvent) => void;

// ─── Prompts ─────────────────────────────────────────────────────

/**
 * Asks the person at the terminal. The CLI supplies a readline-backed one.
 */
export interface Prompter {
  ask(question: string): Promise<string>;
}
