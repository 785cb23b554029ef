/**
 * Tests for Board: settings loading, first-boot detection, endpoint
 * selection, and write-through persistence.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import {
  ConfigError,
  StorageError,
  ValidationError,
  boardSettingsSchema,
  type BoardSettings,
} from "@boardlink/shared";
import { Board } from "../board.js";
import { FileSettingsStore, type SettingsStore } from "../settings-store.js";
import {
  BOARD_UUID,
  createBoard,
  defaultSettings,
  makeTempHome,
  readJson,
  silentLogger,
  writeSettings,
} from "./helpers.js";

const REGISTRATION = { url: "ws://registration.example.test:8181", realm: "s4t" };

let home: string;

beforeEach(() => {
  home = makeTempHome();
});

afterEach(() => {
  fs.rmSync(home, { recursive: true, force: true });
});

function settingsFile(): string {
  return path.join(home, "settings.json");
}

describe("load and endpoint selection", () => {
  test("selects main-agent when configured", () => {
    const board = createBoard(home);
    expect(board.uuid).toBe(BOARD_UUID);
    expect(board.status).toBe("online");
    expect(board.selectedEndpoint()).toEqual({
      kind: "main-agent",
      url: "wss://cp.example.test:8181/",
      realm: "s4t",
    });
  });

  test("falls back to registration-agent for a fresh board", () => {
    const board = createBoard(home, {
      iotronic: {
        board: { uuid: BOARD_UUID, code: "c1", status: "" },
        wamp: { "registration-agent": REGISTRATION },
      },
    });
    expect(board.selectedEndpoint().kind).toBe("registration-agent");
  });

  test("registration token forces first_boot before selection", () => {
    const board = createBoard(home, {
      iotronic: {
        board: { code: "<REGISTRATION-TOKEN>", status: "online" },
        wamp: { "registration-agent": REGISTRATION },
      },
    });
    expect(board.status).toBe("first_boot");
    expect(board.isFirstBoot).toBe(true);
    expect(board.selectedEndpoint().url).toBe(REGISTRATION.url);
  });

  test("no usable endpoint forces and persists first_boot, then raises", () => {
    writeSettings(home, {
      iotronic: {
        board: { uuid: BOARD_UUID, code: "c1", status: "online" },
        wamp: { "registration-agent": REGISTRATION },
      },
    });
    const board = unloadedBoard();

    expect(() => board.load()).toThrow(ConfigError);
    expect(board.status).toBe("first_boot");
    expect(() => board.selectedEndpoint()).toThrow(
      "No usable control-plane endpoint in board settings",
    );
    const persisted = boardSettingsSchema.parse(readJson(settingsFile()));
    expect(persisted.iotronic.board.status).toBe("first_boot");
  });

  test("the raised error carries CONFIG_ENDPOINT_INVALID", () => {
    writeSettings(home, { iotronic: { board: { status: "error" } } });
    const board = unloadedBoard();
    try {
      board.load();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).code).toBe("CONFIG_ENDPOINT_INVALID");
    }
  });

  test("an unwritable first_boot still raises CONFIG_ENDPOINT_INVALID", () => {
    const settings: BoardSettings = boardSettingsSchema.parse({
      iotronic: { board: { uuid: BOARD_UUID, code: "c1", status: "online" } },
    });
    const store: SettingsStore = {
      location: "read-only",
      read: () => settings,
      write: () => {
        throw new StorageError("disk full", "STORAGE_WRITE_FAILED");
      },
    };
    const board = new Board(store, silentLogger());

    try {
      board.load();
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      expect((err as ConfigError).code).toBe("CONFIG_ENDPOINT_INVALID");
    }
    expect(board.status).toBe("first_boot");
  });

  test("missing settings file is CONFIG_NOT_FOUND", () => {
    const board = unloadedBoard();
    try {
      board.load();
      expect.unreachable();
    } catch (err) {
      expect((err as ConfigError).code).toBe("CONFIG_NOT_FOUND");
    }
  });

  test("unparseable settings file is CONFIG_CORRUPTED", () => {
    fs.writeFileSync(settingsFile(), "{ not json");
    const board = unloadedBoard();
    try {
      board.load();
      expect.unreachable();
    } catch (err) {
      expect((err as ConfigError).code).toBe("CONFIG_CORRUPTED");
    }
  });
});

describe("write-through persistence", () => {
  test("updateStatus persists immediately and keeps unknown keys", () => {
    const board = createBoard(home, {
      ...defaultSettings({ status: "registered" }),
      vendor: { keep: true },
    });
    board.updateStatus("online");

    const persisted = readJson(settingsFile());
    expect(persisted).toMatchObject({
      iotronic: { board: { status: "online", uuid: BOARD_UUID } },
      vendor: { keep: true },
    });
  });

  test("touchUpdatedTime writes the microsecond local timestamp", () => {
    const board = createBoard(home);
    const stamp = board.touchUpdatedTime(new Date(2024, 0, 2, 3, 4, 5, 6));
    expect(stamp).toBe("2024-01-02T03:04:05.006000");
    expect(board.updatedAt).toBe(stamp);
    expect(readJson(settingsFile())).toMatchObject({
      iotronic: { board: { updated_at: "2024-01-02T03:04:05.006000" } },
    });
  });

  test("a failed write propagates and the in-memory status stays changed", () => {
    const settings: BoardSettings = boardSettingsSchema.parse(defaultSettings());
    const store: SettingsStore = {
      location: "read-only",
      read: () => settings,
      write: () => {
        throw new StorageError("disk full", "STORAGE_WRITE_FAILED");
      },
    };
    const board = new Board(store, silentLogger());
    board.load();

    expect(() => board.updateStatus("error")).toThrow(StorageError);
    expect(board.status).toBe("error");
  });

  test("replaceSettings validates, persists and reloads", () => {
    const board = createBoard(home);
    board.replaceSettings({
      iotronic: {
        board: { uuid: BOARD_UUID, code: "c2", status: "registered" },
        wamp: { "registration-agent": REGISTRATION },
      },
    });
    expect(board.code).toBe("c2");
    expect(board.selectedEndpoint().kind).toBe("registration-agent");
    expect(readJson(settingsFile())).toMatchObject({
      iotronic: { board: { code: "c2" } },
    });
  });

  test("replaceSettings rejects an invalid document without writing", () => {
    const board = createBoard(home);
    const before = fs.readFileSync(settingsFile(), "utf-8");
    expect(() =>
      board.replaceSettings({ iotronic: { board: { status: "asleep" } } }),
    ).toThrow(ValidationError);
    expect(fs.readFileSync(settingsFile(), "utf-8")).toBe(before);
  });
});

describe("snapshot", () => {
  test("includes the session id and selected endpoint", () => {
    const board = createBoard(home);
    board.setSessionId("5081");
    const snapshot = board.snapshot();
    expect(snapshot.session_id).toBe("5081");
    expect(snapshot.endpoint?.kind).toBe("main-agent");
    expect(snapshot.name).toBe("bench-board");
    expect(snapshot.location).toEqual({});
  });

  test("getters throw before load", () => {
    const board = unloadedBoard();
    expect(() => board.uuid).toThrow(ConfigError);
  });
});

function unloadedBoard(): Board {
  return new Board(new FileSettingsStore(home), silentLogger());
}
