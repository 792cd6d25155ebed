/**
 * In-memory stand-ins for the machine, the network and the terminal.
 */

import * as fs from "fs";
import * as path from "path";
import type { DownloadResult, HttpClient, ProgressCallback } from "../src/downloader";
import type { OwnerSpec, System } from "../src/linux/types";
import type { Prompter } from "../src/types";
import { createLogger } from "../src/utils/logger";

export const silentLogger = createLogger({ level: "silent" });

export const JAVA_HOME = "/usr/lib/jvm/java-1.21.0-openjdk-amd64";

function flag(recursive: boolean): string[] {
  return recursive ? ["-R"] : [];
}

interface ServiceState {
  active: boolean;
  enabled: boolean;
}

/**
 * Records every mutation in `calls` ("method arg1 arg2") and keeps enough
 * state for the predicates to answer consistently.
 */
export class FakeSystem implements System {
  readonly calls: string[] = [];
  readonly paths = new Set<string>();
  readonly files = new Map<string, string>();
  readonly services = new Map<string, ServiceState>();
  readonly users = new Set<string>();
  readonly groups = new Set<string>();
  readonly members = new Map<string, Set<string>>();

  privileged = true;
  canElevate = true;
  javaHome: string | undefined = JAVA_HOME;
  distro: string | undefined = "Ubuntu";
  /** Method name → error thrown when that method is called */
  readonly failures = new Map<string, Error>();

  private record(method: string, ...args: string[]): void {
    this.calls.push([method, ...args].join(" "));
    const failure = this.failures.get(method);
    if (failure) throw failure;
  }

  addPath(target: string): void {
    let current = target;
    while (current !== "/" && current !== ".") {
      this.paths.add(current);
      current = path.posix.dirname(current);
    }
  }

  addUserToGroupState(user: string, group: string): void {
    const set = this.members.get(group) ?? new Set<string>();
    set.add(user);
    this.members.set(group, set);
  }

  // ─── Inspection ──────────────────────────────────────────────

  async pathExists(target: string): Promise<boolean> {
    return this.paths.has(target);
  }

  async listDirectories(dir: string): Promise<string[]> {
    const prefix = dir.endsWith("/") ? dir : `${dir}/`;
    const names = new Set<string>();
    for (const p of this.paths) {
      if (!p.startsWith(prefix) || this.files.has(p)) continue;
      const rest = p.slice(prefix.length);
      if (rest && !rest.includes("/")) names.add(rest);
    }
    return Array.from(names).sort();
  }

  async serviceActive(serviceName: string): Promise<boolean> {
    return this.services.get(serviceName)?.active ?? false;
  }

  async serviceEnabled(serviceName: string): Promise<boolean> {
    return this.services.get(serviceName)?.enabled ?? false;
  }

  async userExists(user: string): Promise<boolean> {
    return this.users.has(user);
  }

  async groupExists(group: string): Promise<boolean> {
    return this.groups.has(group);
  }

  async userInGroup(user: string, group: string): Promise<boolean> {
    return this.members.get(group)?.has(user) ?? false;
  }

  // ─── Privileges ──────────────────────────────────────────────

  async hasPrivileges(): Promise<boolean> {
    return this.privileged;
  }

  async obtainPrivileges(): Promise<boolean> {
    this.record("obtainPrivileges");
    this.privileged = this.canElevate;
    return this.canElevate;
  }

  async refreshPrivileges(): Promise<void> {
    // not recorded: the keep-alive timer may or may not fire during a test
  }

  // ─── Packages ────────────────────────────────────────────────

  async updatePackages(): Promise<void> {
    this.record("updatePackages");
  }

  async installPackages(packages: string[]): Promise<void> {
    this.record("installPackages", ...packages);
  }

  // ─── Files ───────────────────────────────────────────────────

  async makeDirectory(target: string): Promise<void> {
    this.record("makeDirectory", target);
    this.addPath(target);
  }

  async extractArchive(archive: string, dest: string, stripComponents: number): Promise<void> {
    this.record("extractArchive", archive, dest, String(stripComponents));
    for (const sub of ["bin", "conf", "lib", "logs", "temp", "webapps", "work"]) {
      this.addPath(path.posix.join(dest, sub));
    }
  }

  async copyFile(source: string, dest: string): Promise<void> {
    this.record("copyFile", source, dest);
    this.addPath(dest);
    this.files.set(dest, fs.existsSync(source) ? fs.readFileSync(source, "utf-8") : "");
  }

  async writeFile(dest: string, content: string): Promise<void> {
    this.record("writeFile", dest);
    this.addPath(dest);
    this.files.set(dest, content);
  }

  async removePath(target: string): Promise<void> {
    this.record("removePath", target);
    for (const p of Array.from(this.paths)) {
      if (p === target || p.startsWith(`${target}/`)) {
        this.paths.delete(p);
        this.files.delete(p);
      }
    }
  }

  async setOwner(target: string, owner: OwnerSpec, recursive: boolean): Promise<void> {
    this.record("setOwner", ...flag(recursive), `${owner.user}:${owner.group}`, target);
  }

  async setMode(target: string, mode: string, recursive: boolean): Promise<void> {
    this.record("setMode", ...flag(recursive), mode, target);
  }

  async applyGroupAcl(target: string, group: string, inherit: boolean): Promise<void> {
    this.record("applyGroupAcl", target, group, inherit ? "default" : "access");
  }

  // ─── Accounts ────────────────────────────────────────────────

  async createSystemGroup(group: string): Promise<void> {
    this.record("createSystemGroup", group);
    this.groups.add(group);
  }

  async createSystemUser(user: string, group: string, homeDir: string): Promise<void> {
    this.record("createSystemUser", user, group, homeDir);
    this.users.add(user);
    this.addUserToGroupState(user, group);
  }

  async addUserToGroup(user: string, group: string): Promise<void> {
    this.record("addUserToGroup", user, group);
    this.addUserToGroupState(user, group);
  }

  async removeUserFromGroup(user: string, group: string): Promise<void> {
    this.record("removeUserFromGroup", user, group);
    this.members.get(group)?.delete(user);
  }

  async deleteUser(user: string): Promise<void> {
    this.record("deleteUser", user);
    this.users.delete(user);
  }

  async deleteGroup(group: string): Promise<void> {
    this.record("deleteGroup", group);
    this.groups.delete(group);
    this.members.delete(group);
  }

  // ─── Services ────────────────────────────────────────────────

  private service(name: string): ServiceState {
    const state = this.services.get(name) ?? { active: false, enabled: false };
    this.services.set(name, state);
    return state;
  }

  async reloadServices(): Promise<void> {
    this.record("reloadServices");
  }

  async enableService(serviceName: string): Promise<void> {
    this.record("enableService", serviceName);
    this.service(serviceName).enabled = true;
  }

  async startService(serviceName: string): Promise<void> {
    this.record("startService", serviceName);
    this.service(serviceName).active = true;
  }

  async stopService(serviceName: string): Promise<void> {
    this.record("stopService", serviceName);
    this.service(serviceName).active = false;
  }

  async disableService(serviceName: string): Promise<void> {
    this.record("disableService", serviceName);
    this.service(serviceName).enabled = false;
  }

  async serviceStatus(serviceName: string): Promise<string> {
    const active = this.services.get(serviceName)?.active ?? false;
    return `${serviceName} - Active: ${active ? "active (running)" : "inactive (dead)"}`;
  }

  // ─── Discovery ───────────────────────────────────────────────

  async detectJavaHome(): Promise<string | undefined> {
    return this.javaHome;
  }

  async distributionName(): Promise<string | undefined> {
    return this.distro;
  }

  /** Mark a full install of `major` as present */
  seedInstall(major: string, options: { active?: boolean; root?: string } = {}): void {
    const root = options.root ?? "/opt";
    const service = `tomcat${major}.service`;
    this.addPath(`${root}/tomcat${major}/bin`);
    this.addPath(`/etc/systemd/system/${service}`);
    this.files.set(`/etc/systemd/system/${service}`, "[Unit]\n");
    this.addPath("/opt/webtemp");
    this.services.set(service, { active: options.active ?? true, enabled: true });
    this.users.add("tomcat");
    this.groups.add("tomcat");
    this.addUserToGroupState("tomcat", "tomcat");
  }
}

/**
 * Serves canned bodies by exact URL. Downloads write `downloadBody` (or the
 * per-URL body) to the destination so temp-file handling is real.
 */
export class FakeHttp implements HttpClient {
  readonly requested: string[] = [];
  readonly downloaded: { url: string; dest: string }[] = [];
  readonly texts = new Map<string, string>();
  readonly downloads = new Map<string, string>();
  readonly failing = new Set<string>();

  async getText(url: string): Promise<string> {
    this.requested.push(url);
    if (this.failing.has(url)) throw new Error(`connect ECONNREFUSED ${url}`);
    const body = this.texts.get(url);
    if (body === undefined) throw new Error(`HTTP 404 for ${url}`);
    return body;
  }

  async download(
    url: string,
    destPath: string,
    onProgress?: ProgressCallback,
  ): Promise<DownloadResult> {
    this.downloaded.push({ url, dest: destPath });
    // The destination exists (partially written) before any failure
    fs.writeFileSync(destPath, "");
    if (this.failing.has(url)) throw new Error(`socket hang up ${url}`);

    const body = this.downloads.get(url) ?? "binary";
    fs.writeFileSync(destPath, body);
    onProgress?.({ bytes_downloaded: body.length, bytes_total: body.length, percent: 100 });
    return { file_path: destPath, bytes_downloaded: body.length, duration_ms: 1 };
  }
}

/**
 * Answers questions from a fixed script, in order. Running out of answers
 * is a test bug and throws.
 */
export class ScriptedPrompter implements Prompter {
  readonly asked: string[] = [];

  constructor(private readonly answers: string[] = []) {}

  async ask(question: string): Promise<string> {
    this.asked.push(question);
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`Unexpected prompt: ${question}`);
    return answer;
  }
}

// ─── Canned index pages ─────────────────────────────────────────

export const INDEX_URL = "https://dlcdn.apache.org/tomcat/";

export const INDEX_HTML = [
  "<html><body><h1>Index of /tomcat</h1><pre>",
  '<a href="tomcat-9/">tomcat-9/</a>',
  '<a href="tomcat-10/">tomcat-10/</a>',
  '<a href="tomcat-11/">tomcat-11/</a>',
  '<a href="tomcat-connectors/">tomcat-connectors/</a>',
  "</pre></body></html>",
].join("\n");

export function releaseIndexHtml(releases: string[]): string {
  return [
    "<html><body><pre>",
    ...releases.map((r) => `<a href="v${r}/">v${r}/</a>`),
    "</pre></body></html>",
  ].join("\n");
}

export function githubRelease(tag: string, urls: string[]): string {
  return JSON.stringify({
    tag_name: tag,
    assets: urls.map((u) => ({ name: u.split("/").pop(), browser_download_url: u })),
  });
}

export const MSSQL_JAR =
  "https://github.com/microsoft/mssql-jdbc/releases/download/v12.8.1/mssql-jdbc-12.8.1.jre11.jar";
export const PG_JAR =
  "https://github.com/pgjdbc/pgjdbc/releases/download/REL42.7.4/postgresql-42.7.4.jar";

/**
 * FakeHttp serving the index, one release line and both driver releases.
 */
export function standardHttp(major = "10", releases = ["10.1.48", "10.1.50", "10.1.9"]): FakeHttp {
  const http = new FakeHttp();
  http.texts.set(INDEX_URL, INDEX_HTML);
  http.texts.set(`${INDEX_URL}tomcat-${major}/`, releaseIndexHtml(releases));
  http.texts.set(
    "https://api.github.com/repos/microsoft/mssql-jdbc/releases/latest",
    githubRelease("v12.8.1", [
      MSSQL_JAR.replace(".jre11.jar", ".jre8.jar"),
      MSSQL_JAR,
    ]),
  );
  http.texts.set(
    "https://api.github.com/repos/pgjdbc/pgjdbc/releases/latest",
    githubRelease("REL42.7.4", [PG_JAR, PG_JAR.replace(".jar", "-sources.jar")]),
  );
  return http;
}
