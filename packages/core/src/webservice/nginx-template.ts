import * as path from "node:path";

/** Prefix of every artifact this agent owns in the proxy's conf dir */
export const ARTIFACT_PREFIX = "boardlink_";

export interface ProxyRoute {
  name: string;
  local_port: number;
  public_port: number;
  domain: string;
}

export function artifactPath(confDir: string, name: string): string {
  return path.join(confDir, `${ARTIFACT_PREFIX}${name}.conf`);
}

/** Name encoded in an artifact file name, or null for foreign files */
export function artifactName(fileName: string): string | null {
  if (!fileName.startsWith(ARTIFACT_PREFIX) || !fileName.endsWith(".conf")) {
    return null;
  }
  const name = fileName.slice(ARTIFACT_PREFIX.length, -".conf".length);
  return name.length > 0 ? name : null;
}

export function renderNginxConf(route: ProxyRoute): string {
  const serverName = route.domain === "" ? "_" : route.domain;
  return [
    `# Managed by boardlink: webservice ${route.name}`,
    "server {",
    `    listen ${route.public_port};`,
    `    server_name ${serverName};`,
    "",
    "    location / {",
    `        proxy_pass http://127.0.0.1:${route.local_port};`,
    "        proxy_set_header Host $host;",
    "        proxy_set_header X-Real-IP $remote_addr;",
    "        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;",
    "        proxy_set_header X-Forwarded-Proto $scheme;",
    "    }",
    "}",
    "",
  ].join("\n");
}
