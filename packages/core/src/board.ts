/**
 * Board identity, status and control-plane endpoint selection.
 *
 * The Board is the agent's view of the settings document. Identity (uuid,
 * code) is never mutated here. Status changes are written through to the
 * store immediately; a failed write propagates and the in-memory value
 * stays changed.
 *
 * Endpoint selection, evaluated on every (re)load:
 *   1. `main-agent` when configured
 *   2. otherwise `registration-agent`, when status is "", registered or first_boot
 *   3. otherwise no endpoint: status is forced to first_boot, persisted, and
 *      ConfigError CONFIG_ENDPOINT_INVALID is raised
 *
 * All operations are synchronous, so callers on the event loop never see a
 * half-applied update.
 */

import type { Logger } from "pino";
import {
  ConfigError,
  REGISTRATION_TOKEN_CODE,
  ValidationError,
  boardSettingsSchema,
  type BoardSettings,
  type BoardSnapshot,
  type BoardStatus,
  type SelectedEndpoint,
} from "@boardlink/shared";
import type { SettingsStore } from "./settings-store.js";
import { formatTimestamp } from "./lib/timestamp.js";

const REGISTRATION_STATUSES: ReadonlySet<BoardStatus> = new Set<BoardStatus>([
  "",
  "registered",
  "first_boot",
]);

export class Board {
  private settings: BoardSettings | null = null;
  private endpoint: SelectedEndpoint | null = null;
  private currentSessionId: string | null = null;

  constructor(
    private readonly store: SettingsStore,
    private readonly logger: Logger,
  ) {}

  /**
   * Read the settings document and evaluate endpoint selection.
   *
   * @throws ConfigError: unreadable settings, or no usable endpoint
   */
  load(): void {
    this.apply(this.store.read());
  }

  /** Set the status and persist it */
  updateStatus(status: BoardStatus): void {
    const settings = this.requireSettings();
    settings.iotronic.board.status = status;
    this.logger.info({ status }, "Board status updated");
    this.store.write(settings);
  }

  /** Stamp updated_at with the current local time and persist it */
  touchUpdatedTime(now: Date = new Date()): string {
    const settings = this.requireSettings();
    const timestamp = formatTimestamp(now);
    settings.iotronic.board.updated_at = timestamp;
    this.store.write(settings);
    return timestamp;
  }

  /**
   * Replace the whole settings document: validate, persist, then reload
   * from the persisted copy.
   *
   * @throws ValidationError VALIDATION_SETTINGS: document rejected, nothing written
   */
  replaceSettings(next: unknown): void {
    const result = boardSettingsSchema.safeParse(next);
    if (!result.success) {
      throw new ValidationError(
        "Board settings document failed validation",
        "VALIDATION_SETTINGS",
        { zodErrors: result.error.issues },
      );
    }
    this.store.write(result.data);
    this.load();
  }

  /** Written by the session manager only */
  setSessionId(sessionId: string | null): void {
    this.currentSessionId = sessionId;
  }

  /**
   * The endpoint the session must connect to.
   *
   * @throws ConfigError CONFIG_ENDPOINT_INVALID: nothing selectable
   */
  selectedEndpoint(): SelectedEndpoint {
    if (this.endpoint === null) {
      throw new ConfigError(
        "No usable control-plane endpoint in board settings",
        "CONFIG_ENDPOINT_INVALID",
        { status: this.settings?.iotronic.board.status, path: this.store.location },
      );
    }
    return this.endpoint;
  }

  get uuid(): string {
    return this.requireSettings().iotronic.board.uuid;
  }

  get code(): string {
    return this.requireSettings().iotronic.board.code;
  }

  get name(): string {
    return this.requireSettings().iotronic.board.name;
  }

  get status(): BoardStatus {
    return this.requireSettings().iotronic.board.status;
  }

  get type(): string {
    return this.requireSettings().iotronic.board.type;
  }

  get updatedAt(): string {
    return this.requireSettings().iotronic.board.updated_at;
  }

  get sessionId(): string | null {
    return this.currentSessionId;
  }

  get isFirstBoot(): boolean {
    return this.status === "first_boot";
  }

  snapshot(): BoardSnapshot {
    const board = this.requireSettings().iotronic.board;
    return {
      uuid: board.uuid,
      code: board.code,
      name: board.name,
      status: board.status,
      type: board.type,
      mobile: board.mobile,
      agent: board.agent,
      created_at: board.created_at,
      updated_at: board.updated_at,
      location: { ...board.location },
      extra: { ...board.extra },
      session_id: this.currentSessionId,
      endpoint: this.endpoint === null ? null : { ...this.endpoint },
    };
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private apply(settings: BoardSettings): void {
    this.settings = settings;
    const board = settings.iotronic.board;

    this.logger.info(
      { code: board.code, uuid: board.uuid, status: board.status },
      "Board settings loaded",
    );

    if (board.code === REGISTRATION_TOKEN_CODE) {
      this.logger.info("FIRST BOOT procedure started");
      board.status = "first_boot";
    }

    const wamp = settings.iotronic.wamp;
    const main = wamp["main-agent"];
    const registration = wamp["registration-agent"];

    if (main !== undefined) {
      this.endpoint = { kind: "main-agent", url: main.url, realm: main.realm };
    } else if (REGISTRATION_STATUSES.has(board.status) && registration !== undefined) {
      this.endpoint = {
        kind: "registration-agent",
        url: registration.url,
        realm: registration.realm,
      };
    } else {
      this.endpoint = null;
      this.logger.error(
        { status: board.status, path: this.store.location },
        "Control-plane endpoint configuration is wrong, please check settings",
      );
      board.status = "first_boot";
      try {
        this.store.write(settings);
      } catch (err) {
        this.logger.error(
          { err, path: this.store.location },
          "Failed to persist first_boot status",
        );
      }
      throw new ConfigError(
        "No usable control-plane endpoint in board settings",
        "CONFIG_ENDPOINT_INVALID",
        { path: this.store.location },
      );
    }

    this.logger.info(
      { kind: this.endpoint.kind, url: this.endpoint.url, realm: this.endpoint.realm },
      "Control-plane endpoint selected",
    );
  }

  private requireSettings(): BoardSettings {
    if (this.settings === null) {
      throw new ConfigError("Board settings have not been loaded", "CONFIG_NOT_LOADED");
    }
    return this.settings;
  }
}
