/**
 * Tests for the capability registrar: naming, wrapping, and
 * re-registration on reconnect.
 */

import * as fs from "node:fs";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  DEFAULT_PROCEDURE_NAMESPACE,
  exposeServiceArgsSchema,
  failure,
  parseCapabilityArgs,
  success,
} from "@boardlink/shared";
import type { Board } from "../board.js";
import { CapabilityRegistrar, type CapabilityTable } from "../registrar.js";
import { SessionManager } from "../session/session-manager.js";
import {
  BOARD_UUID,
  FakeTransport,
  createBoard,
  makeTempHome,
  silentLogger,
} from "./helpers.js";

let home: string;
let board: Board;
let transport: FakeTransport;
let session: SessionManager;
let registrar: CapabilityRegistrar;

const table: CapabilityTable = {
  DevicePing: async () => success("pong"),
  ExposeService: async (args) => {
    const { name } = parseCapabilityArgs("ExposeService", exposeServiceArgsSchema, args);
    return success(`exposed ${name}`);
  },
  ServicesList: async () => {
    throw new Error("registry unavailable");
  },
};

beforeEach(async () => {
  home = makeTempHome();
  board = createBoard(home);
  transport = new FakeTransport();
  session = new SessionManager(board, transport, silentLogger());
  registrar = new CapabilityRegistrar(
    session,
    board,
    silentLogger(),
    DEFAULT_PROCEDURE_NAMESPACE,
    20,
  );
  registrar.start();
  await session.connect();
});

afterEach(async () => {
  registrar.stop();
  await session.stop();
  fs.rmSync(home, { recursive: true, force: true });
});

describe("attach", () => {
  test("registers every verb under the session-bound name", async () => {
    await registrar.attach("test", table);

    expect([...transport.current.procedures.keys()].sort()).toEqual([
      `iotronic.1001.${BOARD_UUID}.DevicePing`,
      `iotronic.1001.${BOARD_UUID}.ExposeService`,
      `iotronic.1001.${BOARD_UUID}.ServicesList`,
    ]);
    expect(registrar.procedureFor("DevicePing")).toBe(
      `iotronic.1001.${BOARD_UUID}.DevicePing`,
    );
  });

  test("uses a custom namespace", async () => {
    const custom = new CapabilityRegistrar(session, board, silentLogger(), "lab");
    await custom.attach("test", { DevicePing: table.DevicePing });
    expect(transport.current.procedures.has(`lab.1001.${BOARD_UUID}.DevicePing`)).toBe(
      true,
    );
  });

  test("registers the remaining verbs when one is refused", async () => {
    transport.refuseRegisterOnce.add("DevicePing");

    await expect(
      registrar.attach("test", { DevicePing: table.DevicePing, ServicesList: table.ServicesList }),
    ).rejects.toMatchObject({
      code: "NETWORK_REGISTER_FAILED",
      message: "Failed to register capabilities for test: wamp.error.not_authorized",
    });
    expect([...transport.current.procedures.keys()]).toEqual([
      `iotronic.1001.${BOARD_UUID}.ServicesList`,
    ]);
  });

  test("fails fast when the session is down", async () => {
    await session.disconnect();
    await expect(registrar.attach("test", table)).rejects.toMatchObject({
      code: "NETWORK_NOT_CONNECTED",
    });
  });
});

describe("wrapped handlers", () => {
  test("pass results through", async () => {
    await registrar.attach("test", table);
    await expect(
      transport.current.invoke(registrar.procedureFor("DevicePing")),
    ).resolves.toEqual(success("pong"));
  });

  test("turn thrown errors into ERROR results", async () => {
    await registrar.attach("test", table);
    await expect(
      transport.current.invoke(registrar.procedureFor("ServicesList")),
    ).resolves.toEqual(failure("registry unavailable"));
  });

  test("turn argument validation failures into ERROR results", async () => {
    await registrar.attach("test", table);
    const result = await transport.current.invoke(
      registrar.procedureFor("ExposeService"),
      ["web"],
    );
    expect(result).toEqual({
      result: "ERROR",
      message: expect.stringMatching(/^Invalid arguments for ExposeService: /),
    });
  });
});

describe("re-registration", () => {
  test("re-advertises every table under the new session id", async () => {
    await registrar.attach("a", { DevicePing: table.DevicePing });
    await registrar.attach("b", { ServicesList: table.ServicesList });

    await session.disconnect();
    await session.connect();

    await vi.waitFor(() =>
      expect([...transport.current.procedures.keys()].sort()).toEqual([
        `iotronic.1002.${BOARD_UUID}.DevicePing`,
        `iotronic.1002.${BOARD_UUID}.ServicesList`,
      ]),
    );
    expect(registrar.registeredProcedures.sort()).toEqual([
      `iotronic.1002.${BOARD_UUID}.DevicePing`,
      `iotronic.1002.${BOARD_UUID}.ServicesList`,
    ]);
  });

  test("re-advertises after the router drops the session", async () => {
    await registrar.attach("a", { DevicePing: table.DevicePing });
    transport.current.drop();
    expect(registrar.registeredProcedures).toEqual([]);

    await session.connect();
    await vi.waitFor(() =>
      expect(
        transport.current.procedures.has(`iotronic.1002.${BOARD_UUID}.DevicePing`),
      ).toBe(true),
    );
  });

  test("retries a refused verb while the session stays up", async () => {
    await registrar.attach("device", {
      DevicePing: table.DevicePing,
      ServicesList: table.ServicesList,
    });
    transport.refuseRegisterOnce.add("DevicePing");

    transport.current.drop();
    await session.connect();

    await vi.waitFor(() =>
      expect([...transport.current.procedures.keys()].sort()).toEqual([
        `iotronic.1002.${BOARD_UUID}.DevicePing`,
        `iotronic.1002.${BOARD_UUID}.ServicesList`,
      ]),
    );
    expect(transport.refuseRegisterOnce.size).toBe(0);
    expect(registrar.registeredProcedures.sort()).toEqual([
      `iotronic.1002.${BOARD_UUID}.DevicePing`,
      `iotronic.1002.${BOARD_UUID}.ServicesList`,
    ]);
  });

  test("detached tables are not re-advertised", async () => {
    await registrar.attach("a", { DevicePing: table.DevicePing });
    await registrar.detach("a");
    expect(transport.current.procedures.size).toBe(0);

    await session.disconnect();
    await session.connect();
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(transport.current.procedures.size).toBe(0);
  });
});
