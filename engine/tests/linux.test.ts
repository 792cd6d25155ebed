/**
 * Linux layer tests: output parsing, command formatting and the exact
 * commands LinuxSystem issues. Nothing is executed.
 */

import { describe, it, expect, vi } from "vitest";
import {
  LinuxSystem,
  ensurePrivileges,
  formatCommand,
  isWsl,
  parseGroupList,
  parseJavaAlternatives,
  runChecked,
  startKeepAlive,
  windowsExplorerPath,
} from "../src/linux";
import type { CommandOptions, CommandResult, CommandRunner } from "../src/linux";
import { isProvisionError } from "../src/errors";
import { FakeSystem, silentLogger } from "./fakes";

interface Invocation {
  command: string;
  args: string[];
  options?: CommandOptions;
}

class RecordingRunner implements CommandRunner {
  readonly invocations: Invocation[] = [];
  readonly results = new Map<string, CommandResult>();

  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.invocations.push({ command, args, options });
    return this.results.get(command) ?? { code: 0, stdout: "", stderr: "" };
  }

  lines(): string[] {
    return this.invocations.map((i) => formatCommand(i.command, i.args));
  }
}

const ALTERNATIVES = [
  "java-1.17.0-openjdk-amd64      1711       /usr/lib/jvm/java-1.17.0-openjdk-amd64",
  "java-1.21.0-openjdk-amd64      2111       /usr/lib/jvm/java-1.21.0-openjdk-amd64",
].join("\n");

describe("parsing helpers", () => {
  it("finds the JDK home for a Java version", () => {
    expect(parseJavaAlternatives(ALTERNATIVES, "21")).toBe("/usr/lib/jvm/java-1.21.0-openjdk-amd64");
    expect(parseJavaAlternatives(ALTERNATIVES, "11")).toBeUndefined();
  });

  it("splits id -nG output", () => {
    expect(parseGroupList("alice adm sudo tomcat\n")).toEqual(["alice", "adm", "sudo", "tomcat"]);
    expect(parseGroupList("")).toEqual([]);
  });

  it("detects WSL from the environment or the kernel string", () => {
    expect(isWsl({ WSL_DISTRO_NAME: "Ubuntu" }, "")).toBe(true);
    expect(isWsl({}, "Linux version 5.15.153.1-microsoft-standard-WSL2")).toBe(true);
    expect(isWsl({}, "Linux version 6.8.0-45-generic")).toBe(false);
  });

  it("builds the Explorer path for a Linux directory", () => {
    expect(windowsExplorerPath("Ubuntu", "/opt/tomcat10")).toBe("\\\\wsl.localhost\\Ubuntu\\opt\\tomcat10\\");
    expect(windowsExplorerPath("Debian", "/opt/tomcat9/")).toBe("\\\\wsl.localhost\\Debian\\opt\\tomcat9\\");
  });
});

describe("formatCommand / runChecked", () => {
  it("quotes arguments that need it", () => {
    expect(formatCommand("setfacl", ["-R", "-m", "g:tomcat:rwx", "/opt/tomcat10/conf"])).toBe(
      "setfacl -R -m g:tomcat:rwx /opt/tomcat10/conf",
    );
    expect(formatCommand("echo", ["it's here"])).toBe("echo 'it'\\''s here'");
  });

  it("throws COMMAND_ERROR with the command line and stderr", async () => {
    const runner = new RecordingRunner();
    runner.results.set("useradd", { code: 9, stdout: "", stderr: "useradd: user 'tomcat' already exists\n" });

    const err = await runChecked(runner, "useradd", ["tomcat"]).catch((e: unknown) => e);

    expect(isProvisionError(err) && err.category).toBe("COMMAND_ERROR");
    expect(err instanceof Error && err.message).toBe(
      "Command failed (exit 9): useradd tomcat\nuseradd: user 'tomcat' already exists",
    );
  });
});

describe("LinuxSystem", () => {
  function setup() {
    const runner = new RecordingRunner();
    return { runner, system: new LinuxSystem(runner, silentLogger) };
  }

  it("issues the package, file and ACL commands privileged", async () => {
    const { runner, system } = setup();

    await system.updatePackages();
    await system.installPackages(["openjdk-21-jdk", "acl"]);
    await system.extractArchive("/tmp/a.tar.gz", "/opt/tomcat10", 1);
    await system.setOwner("/opt/tomcat10", { user: "tomcat", group: "tomcat" }, true);
    await system.setMode("/opt/tomcat10/bin/setenv.sh", "755", false);
    await system.applyGroupAcl("/opt/webtemp", "tomcat", false);
    await system.applyGroupAcl("/opt/webtemp", "tomcat", true);

    expect(runner.lines()).toEqual([
      "apt-get update",
      "apt-get upgrade -y",
      "apt-get install -y openjdk-21-jdk acl",
      "tar xzf /tmp/a.tar.gz -C /opt/tomcat10 --strip-components=1",
      "chown -R tomcat:tomcat /opt/tomcat10",
      "chmod 755 /opt/tomcat10/bin/setenv.sh",
      "setfacl -R -m g:tomcat:rwx /opt/webtemp",
      "setfacl -Rdm g:tomcat:rwx /opt/webtemp",
    ]);
    expect(runner.invocations.every((i) => i.options?.privileged === true)).toBe(true);
  });

  it("writes files through tee with the content on stdin", async () => {
    const { runner, system } = setup();

    await system.writeFile("/etc/systemd/system/tomcat10.service", "[Unit]\n");

    expect(runner.invocations[0]).toEqual({
      command: "tee",
      args: ["/etc/systemd/system/tomcat10.service"],
      options: { privileged: true, input: "[Unit]\n" },
    });
  });

  it("manages accounts with the shadow tools", async () => {
    const { runner, system } = setup();

    await system.createSystemGroup("tomcat");
    await system.createSystemUser("tomcat", "tomcat", "/opt/tomcat10");
    await system.addUserToGroup("alice", "tomcat");
    await system.removeUserFromGroup("alice", "tomcat");
    await system.deleteUser("tomcat");
    await system.deleteGroup("tomcat");

    expect(runner.lines()).toEqual([
      "groupadd --system --force tomcat",
      "useradd -d /opt/tomcat10 --system -g tomcat -s /bin/false tomcat",
      "usermod -aG tomcat alice",
      "gpasswd -d alice tomcat",
      "userdel tomcat",
      "groupdel tomcat",
    ]);
  });

  it("answers predicates from exit codes without throwing", async () => {
    const { runner, system } = setup();
    runner.results.set("systemctl", { code: 3, stdout: "", stderr: "" });
    runner.results.set("id", { code: 0, stdout: "alice adm tomcat\n", stderr: "" });

    expect(await system.serviceActive("tomcat10.service")).toBe(false);
    expect(await system.userInGroup("alice", "tomcat")).toBe(true);
    expect(await system.userInGroup("alice", "docker")).toBe(false);
    expect(runner.lines()[0]).toBe("systemctl is-active --quiet tomcat10.service");
  });

  it("returns status text even for an inactive service", async () => {
    const { runner, system } = setup();
    runner.results.set("systemctl", { code: 3, stdout: "inactive (dead)\n", stderr: "" });

    expect(await system.serviceStatus("tomcat10.service")).toBe("inactive (dead)\n");
  });

  it("detects JAVA_HOME and the distribution", async () => {
    const { runner, system } = setup();
    runner.results.set("update-java-alternatives", { code: 0, stdout: ALTERNATIVES, stderr: "" });
    runner.results.set("lsb_release", { code: 0, stdout: "Ubuntu\n", stderr: "" });

    expect(await system.detectJavaHome("21")).toBe("/usr/lib/jvm/java-1.21.0-openjdk-amd64");
    expect(await system.distributionName()).toBe("Ubuntu");
  });

  it("asks sudo for credentials on the terminal", async () => {
    const { runner, system } = setup();

    await system.obtainPrivileges();

    expect(runner.invocations[0]).toEqual({
      command: "sudo",
      args: ["-v"],
      options: { interactive: true },
    });
  });
});

describe("privileges", () => {
  it("does not prompt when credentials are cached", async () => {
    const system = new FakeSystem();
    await ensurePrivileges(system, silentLogger);
    expect(system.calls).toEqual([]);
  });

  it("prompts once when credentials are missing", async () => {
    const system = new FakeSystem();
    system.privileged = false;
    await ensurePrivileges(system, silentLogger);
    expect(system.calls).toEqual(["obtainPrivileges"]);
  });

  it("throws PRIVILEGE_ERROR when sudo refuses", async () => {
    const system = new FakeSystem();
    system.privileged = false;
    system.canElevate = false;

    const err = await ensurePrivileges(system, silentLogger).catch((e: unknown) => e);
    expect(isProvisionError(err) && err.category).toBe("PRIVILEGE_ERROR");
  });

  it("refreshes on an interval until stopped", () => {
    vi.useFakeTimers();
    try {
      const system = new FakeSystem();
      const refresh = vi.spyOn(system, "refreshPrivileges");

      const stop = startKeepAlive(system, silentLogger, 1000);
      vi.advanceTimersByTime(3500);
      stop();
      vi.advanceTimersByTime(5000);

      expect(refresh).toHaveBeenCalledTimes(3);
    } finally {
      vi.useRealTimers();
    }
  });
});
