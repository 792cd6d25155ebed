/**
 * tcsetup CLI -- Output Helpers
 *
 * Centralized formatting for all CLI output: colors, spinners, tables.
 * Uses chalk (v4, CommonJS compatible) for ANSI colors,
 * ora for spinners, and cli-table3 for the step summary.
 */

import chalk from "chalk";
import ora, { Ora } from "ora";
import Table from "cli-table3";
import type { StepResult, StepStatus } from "@tcsetup/engine";

// ─── Debug Mode ─────────────────────────────────────────────

let _debugMode = false;

export function setDebugMode(enabled: boolean): void {
  _debugMode = enabled;
}

export function isDebugMode(): boolean {
  return _debugMode;
}

// ─── Color Shortcuts ────────────────────────────────────────

export const colors = {
  success: chalk.green,
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.cyan,
  dim: chalk.gray,
  bold: chalk.bold,
  version: chalk.cyan,
  path: chalk.bold.white,
};

export const symbols = {
  success: chalk.green("\u2714"), // ✔
  error: chalk.red("\u2716"), // ✖
  warn: chalk.yellow("\u26A0"), // ⚠
  info: chalk.cyan("\u2139"), // ℹ
};

// ─── Print Helpers ──────────────────────────────────────────

export function printSuccess(msg: string): void {
  console.log(`${symbols.success} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${symbols.error} ${msg}`);
}

export function printWarn(msg: string): void {
  console.log(`${symbols.warn}  ${msg}`);
}

export function printInfo(msg: string): void {
  console.log(`${symbols.info} ${msg}`);
}

/**
 * Print a debug message. Only visible with --debug flag.
 */
export function printDebug(msg: string): void {
  if (_debugMode) {
    console.log(colors.dim(`  [debug] ${msg}`));
  }
}

export function printBlank(): void {
  console.log();
}

export function printDetail(label: string, value: string): void {
  console.log(`  ${colors.dim(label + ":")} ${value}`);
}

// ─── Stage Output ───────────────────────────────────────────

export function printStageSuccess(msg: string): void {
  console.log(`  ${symbols.success} ${msg}`);
}

export function printStageError(msg: string): void {
  console.log(`  ${symbols.error} ${msg}`);
}

export function printStageWarn(msg: string): void {
  console.log(`  ${symbols.warn}  ${msg}`);
}

export function printStageInfo(msg: string): void {
  console.log(`  ${symbols.info} ${colors.dim(msg)}`);
}

// ─── Spinner ────────────────────────────────────────────────

export function createSpinner(text: string): Ora {
  return ora({ text, color: "cyan", stream: process.stdout });
}

// ─── Step Summary ───────────────────────────────────────────

const STATUS_LABELS: Record<StepStatus, string> = {
  ok: "done",
  warning: "warning",
  failed: "failed",
  skipped: "skipped",
};

const STATUS_COLORS: Record<StepStatus, chalk.Chalk> = {
  ok: chalk.green,
  warning: chalk.yellow,
  failed: chalk.red,
  skipped: chalk.gray,
};

export function formatStatus(status: StepStatus): string {
  return STATUS_COLORS[status](STATUS_LABELS[status]);
}

/**
 * Detect whether to use ASCII-only box drawing characters.
 * A dumb terminal (or none at all) garbles the Unicode borders.
 */
export function shouldUseAsciiBorders(env: NodeJS.ProcessEnv = process.env): boolean {
  return !env.TERM || env.TERM === "dumb";
}

const ASCII_CHARS = {
  top: "-",
  "top-mid": "+",
  "top-left": "+",
  "top-right": "+",
  bottom: "-",
  "bottom-mid": "+",
  "bottom-left": "+",
  "bottom-right": "+",
  left: "|",
  "left-mid": "+",
  mid: "-",
  "mid-mid": "+",
  right: "|",
  "right-mid": "+",
  middle: "|",
};

/**
 * Render the per-step table printed at the end of an install.
 *
 *   Step                                   Status   Time
 *   Installed system packages              done     41.2s
 *   Installed JDBC drivers                 warning  1.3s
 *   Registered and started the service     skipped  -
 */
export function renderStepTable(results: readonly StepResult[]): string {
  const ascii = shouldUseAsciiBorders();
  const table = new Table({
    head: ["Step", "Status", "Time"].map((h) => chalk.bold.cyan(h)),
    style: { head: [], border: ascii ? [] : ["gray"] },
    wordWrap: false,
    ...(ascii ? { chars: ASCII_CHARS } : {}),
  });

  for (const r of results) {
    table.push([
      r.title,
      formatStatus(r.status),
      r.status === "skipped" ? "-" : formatDuration(r.durationMs),
    ]);
  }
  return table.toString();
}

export function printStepTable(results: readonly StepResult[]): void {
  if (results.length === 0) return;
  console.log(renderStepTable(results));
}

// ─── Error Category Labels ──────────────────────────────────

const ERROR_LABELS: Record<string, string> = {
  RESOLUTION_ERROR: "Could not determine the Tomcat version",
  VALIDATION_ERROR: "Invalid arguments or configuration",
  PRIVILEGE_ERROR: "Insufficient privileges",
  NETWORK_ERROR: "Network or download failure",
  ASSET_NOT_FOUND: "Release asset not found",
  COMMAND_ERROR: "System command failed",
};

export function formatErrorCategory(category: string): string {
  return ERROR_LABELS[category] || category;
}

// ─── Byte Formatting ────────────────────────────────────────

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 B";
  const units = ["B", "KB", "MB", "GB"];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), units.length - 1);
  return `${(bytes / Math.pow(1024, i)).toFixed(1)} ${units[i]}`;
}

// ─── Duration ───────────────────────────────────────────────

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  const mins = Math.floor(ms / 60_000);
  const secs = Math.round((ms % 60_000) / 1000);
  return `${mins}m ${secs}s`;
}
