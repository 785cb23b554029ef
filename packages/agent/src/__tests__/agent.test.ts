/**
 * Tests for the agent orchestrator, wired to an in-process control plane,
 * a fake tunnel spawner and a fake reverse proxy.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { CAPABILITY_VERBS } from "@boardlink/shared";
import {
  BOARD_UUID,
  FakeProxy,
  FakeSpawner,
  FakeTransport,
  defaultSettings,
  makeTempHome,
  silentLogger,
  writeSettings,
} from "@boardlink/core/testing";
import { Agent } from "../agent.js";
import { parseConfig, type AgentConfig } from "../config.js";

let home: string;
let transport: FakeTransport;
let spawner: FakeSpawner;
let proxy: FakeProxy;
const agents: Agent[] = [];

function agentConfig(statusApi = false): AgentConfig {
  return parseConfig({
    agent: { home, log_level: "silent" },
    control_plane: { connection_timer: 1 },
    services: { reconcile_interval: 0 },
    webservices: { conf_dir: path.join(home, "conf.d") },
    status_api: { enabled: statusApi, host: "127.0.0.1", port: 0 },
  });
}

function createAgent(statusApi = false): Agent {
  const agent = new Agent(agentConfig(statusApi), silentLogger(), { transport, spawner, proxy });
  agents.push(agent);
  return agent;
}

function procedure(sessionId: string, verb: string): string {
  return `iotronic.${sessionId}.${BOARD_UUID}.${verb}`;
}

beforeEach(() => {
  home = makeTempHome("boardlink-agent-");
  fs.mkdirSync(path.join(home, "conf.d"));
  transport = new FakeTransport();
  spawner = new FakeSpawner();
  proxy = new FakeProxy();
});

afterEach(async () => {
  await Promise.all(agents.splice(0).map((agent) => agent.stop()));
  fs.rmSync(home, { recursive: true, force: true });
});

describe("Agent.start", () => {
  it("connects and advertises every capability under the session id", async () => {
    writeSettings(home, defaultSettings());
    const agent = createAgent();

    await agent.start();

    expect(agent.session.state).toBe("connected");
    expect(agent.board.sessionId).toBe("1001");
    expect([...transport.current.procedures.keys()].sort()).toEqual(
      CAPABILITY_VERBS.map((verb) => procedure("1001", verb)).sort(),
    );
  });

  it("serves capabilities end to end", async () => {
    writeSettings(home, defaultSettings());
    const agent = createAgent();
    await agent.start();

    const result = await transport.current.invoke(procedure("1001", "ExposeService"), [
      "web",
      8080,
    ]);

    expect(result).toMatchObject({ result: "SUCCESS" });
    expect(spawner.spawned).toHaveLength(1);
    expect(spawner.spawned[0]?.args).toEqual([
      "client",
      "-s",
      "wss://cp.example.test:8080",
      "-t",
      "127.0.0.1:8080",
    ]);
  });

  it("retries the first connection until the control plane answers", async () => {
    writeSettings(home, defaultSettings());
    transport.failNext = 1;
    const agent = createAgent();

    await agent.start();

    expect(transport.opens).toHaveLength(2);
    expect(agent.session.sessionId).toBe("1001");
  });

  it("fails fast on missing board settings and opens nothing", async () => {
    const agent = createAgent(true);

    await expect(agent.start()).rejects.toMatchObject({ code: "CONFIG_NOT_FOUND" });

    expect(transport.opens).toHaveLength(0);
    expect(agent.statusAddress).toBeNull();
  });

  it("serves the status API once started", async () => {
    writeSettings(home, defaultSettings());
    const agent = createAgent(true);
    await agent.start();

    const port = agent.statusAddress?.port;
    expect(port).toBeGreaterThan(0);
    const body = await (await fetch(`http://127.0.0.1:${port}/api/info`)).json();

    expect(body).toMatchObject({ wamp: { connected: true, session_id: "1001" } });
  });
});

describe("reconnect", () => {
  it("re-advertises every capability under the new session id", async () => {
    writeSettings(home, defaultSettings());
    const agent = createAgent();
    await agent.start();

    transport.current.drop();
    expect(agent.session.state).toBe("disconnected");
    await agent.session.connect();

    expect(transport.current.id).toBe("1002");
    await vi.waitFor(() => {
      expect(transport.current.procedures.size).toBe(CAPABILITY_VERBS.length);
    });
    expect(transport.current.procedures.has(procedure("1002", "DevicePing"))).toBe(true);
  });

  it("completes the advertisement when the router refuses a verb once", async () => {
    writeSettings(home, defaultSettings());
    const agent = createAgent();
    await agent.start();

    transport.refuseRegisterOnce.add("DevicePing");
    transport.current.drop();
    await agent.session.connect();

    await vi.waitFor(
      () => {
        expect([...transport.current.procedures.keys()].sort()).toEqual(
          CAPABILITY_VERBS.map((verb) => procedure("1002", verb)).sort(),
        );
      },
      { timeout: 3000 },
    );
  });
});

describe("Agent.stop", () => {
  it("terminates tunnels and closes the session", async () => {
    writeSettings(home, defaultSettings());
    const agent = createAgent(true);
    await agent.start();
    await transport.current.invoke(procedure("1001", "ExposeService"), ["web", 8080]);

    await agent.stop();

    expect(spawner.terminated).toEqual([4000]);
    expect(transport.current.closed).toBe(true);
    expect(agent.session.state).toBe("disconnected");
    expect(agent.statusAddress).toBeNull();
  });

  it("is safe to call twice", async () => {
    writeSettings(home, defaultSettings());
    const agent = createAgent();
    await agent.start();

    await Promise.all([agent.stop(), agent.stop()]);

    expect(transport.current.closed).toBe(true);
  });
});
