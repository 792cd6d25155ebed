/**
 * tcsetup Engine - Public API
 *
 * This is the single entry point for the engine package.
 * The CLI imports from here, never from internal modules.
 */

// Orchestrator
export { Provisioner } from "./provisioner";
export type { ProvisionerOptions } from "./provisioner";

// All types
export type {
  VersionSpec,
  ReleaseAsset,
  DriverSource,
  InstallationRecord,
  RunMode,
  ConflictOutcome,
  RunConfig,
  StepStatus,
  StepResult,
  ErrorCategory,
  UninstallReport,
  RunAction,
  RunOutcome,
  ProvisionerEventType,
  ProvisionerEvent,
  ProvisionerEventHandler,
  PhaseEvent,
  StepStartEvent,
  StepDoneEvent,
  ProgressEvent,
  NoticeEvent,
  Prompter,
} from "./types";

// Errors
export { ProvisionError, isProvisionError, errorMessage } from "./errors";

// Configuration
export {
  SettingsSchema,
  DEFAULT_SETTINGS,
  DEFAULT_CONFIG_PATH,
  loadSettings,
  installDirFor,
  serviceNameFor,
  unitFilePathFor,
  resolvePackages,
  archiveUrlFor,
} from "./config";
export type { Settings, LoadSettingsOptions } from "./config";

// Components (for direct use and testing)
export { VersionResolver, extractMajorVersions, extractReleases } from "./resolver";
export { AssetFetcher, selectAsset, latestReleaseUrl } from "./assets";
export type { AssetFetcherOptions, InstalledAsset } from "./assets";
export { HttpsClient } from "./downloader";
export type {
  HttpClient,
  HttpsClientOptions,
  DownloadProgress,
  DownloadResult,
  ProgressCallback,
} from "./downloader";
export { TempFileRegistry } from "./temp-files";
export { inspectInstallation, checkForExistingInstall } from "./state";
export { Uninstaller } from "./uninstaller";
export type { UninstallerOptions } from "./uninstaller";
export { INSTALL_STEPS, runPipeline } from "./installer";
export type { InstallContext, InstallStep, StepOutput, PipelineResult } from "./installer";
export { renderServiceUnit, renderSetenv } from "./templates";

// Linux system layer
export * from "./linux";

// Utilities
export { createLogger } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
export {
  compareVersions,
  sortVersions,
  latestVersion,
  parseVersion,
  normalizeVersion,
} from "./utils/version";
