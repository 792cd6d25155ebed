/**
 * tcsetup Engine - Platform Helpers
 *
 * Pure parsing of tool output and WSL detection.
 */

import * as fs from "fs";

/**
 * Pick the JDK home for a major Java version out of
 * `update-java-alternatives -l` output:
 *
 *   java-1.21.0-openjdk-amd64      2111       /usr/lib/jvm/java-1.21.0-openjdk-amd64
 */
export function parseJavaAlternatives(
  output: string,
  javaVersion: string,
): string | undefined {
  for (const line of output.split("\n")) {
    if (!line.startsWith(`java-1.${javaVersion}`)) continue;
    const columns = line.trim().split(/\s+/);
    if (columns[2]) return columns[2];
  }
  return undefined;
}

/**
 * Group names from `id -nG <user>` output.
 */
export function parseGroupList(output: string): string[] {
  return output.trim().split(/\s+/).filter(Boolean);
}

function readProcVersion(): string {
  try {
    return fs.readFileSync("/proc/version", "utf-8");
  } catch {
    return "";
  }
}

/**
 * True under Windows Subsystem for Linux.
 */
export function isWsl(
  env: NodeJS.ProcessEnv = process.env,
  procVersion: string = readProcVersion(),
): boolean {
  return Boolean(env.WSL_DISTRO_NAME) || /microsoft/i.test(procVersion);
}

/**
 * UNC path under which Windows Explorer sees a Linux directory.
 *
 *   ("Ubuntu", "/opt/tomcat10") → \\wsl.localhost\Ubuntu\opt\tomcat10\
 */
export function windowsExplorerPath(distro: string, linuxDir: string): string {
  const trimmed = linuxDir.replace(/\/+$/, "");
  return `\\\\wsl.localhost\\${distro}${trimmed.replace(/\//g, "\\")}\\`;
}
