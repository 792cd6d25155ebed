/**
 * tcsetup Engine - Generated Files
 */

export interface ServiceUnitParams {
  major: string;
  installDir: string;
  javaHome: string;
  user: string;
  group: string;
}

/**
 * systemd unit for a Tomcat release line. startup.sh daemonizes,
 * hence Type=forking with a PID file under temp/.
 */
export function renderServiceUnit(p: ServiceUnitParams): string {
  return [
    "[Unit]",
    `Description=Apache Tomcat ${p.major} Web Application Server`,
    "After=network.target",
    "",
    "[Service]",
    "Type=forking",
    `User=${p.user}`,
    `Group=${p.group}`,
    `Environment="JAVA_HOME=${p.javaHome}"`,
    `Environment="CATALINA_HOME=${p.installDir}"`,
    `Environment="CATALINA_BASE=${p.installDir}"`,
    `Environment="CATALINA_PID=${p.installDir}/temp/tomcat.pid"`,
    `ExecStart=${p.installDir}/bin/startup.sh`,
    `ExecStop=${p.installDir}/bin/shutdown.sh`,
    "RestartSec=10",
    "Restart=always",
    "",
    "[Install]",
    "WantedBy=multi-user.target",
    "",
  ].join("\n");
}

export interface SetenvParams {
  heapMin: string;
  heapMax: string;
}

/**
 * bin/setenv.sh, sourced by catalina.sh on start.
 */
export function renderSetenv(p: SetenvParams): string {
  return `export JAVA_OPTS="-Djava.awt.headless=true -Xms${p.heapMin} -Xmx${p.heapMax}"\n`;
}
