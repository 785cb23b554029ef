/**
 * File-backed store for the board settings document (`<home>/settings.json`).
 */

import * as path from "node:path";
import {
  ConfigError,
  boardSettingsSchema,
  type BoardSettings,
} from "@boardlink/shared";
import { readJsonDocument, writeJsonAtomic } from "./lib/json-file.js";

/** Where the Board reads and persists its settings */
export interface SettingsStore {
  /** Human-readable location, for log lines */
  readonly location: string;
  /**
   * @throws ConfigError CONFIG_NOT_FOUND | CONFIG_CORRUPTED | CONFIG_INVALID
   */
  read(): BoardSettings;
  /** @throws StorageError STORAGE_WRITE_FAILED */
  write(settings: BoardSettings): void;
}

export const SETTINGS_FILENAME = "settings.json";

export class FileSettingsStore implements SettingsStore {
  readonly location: string;

  constructor(home: string) {
    this.location = path.join(home, SETTINGS_FILENAME);
  }

  read(): BoardSettings {
    const result = readJsonDocument(this.location, boardSettingsSchema);
    switch (result.status) {
      case "ok":
        return result.value;
      case "missing":
        throw new ConfigError(
          `Board settings not found at ${this.location}`,
          "CONFIG_NOT_FOUND",
          { path: this.location },
        );
      case "corrupted":
        throw new ConfigError(
          `Board settings at ${this.location} are not valid JSON: ${result.error}`,
          "CONFIG_CORRUPTED",
          { path: this.location },
        );
      case "invalid":
        throw new ConfigError(
          `Board settings at ${this.location} failed validation`,
          "CONFIG_INVALID",
          { path: this.location, zodErrors: result.issues },
        );
    }
  }

  write(settings: BoardSettings): void {
    writeJsonAtomic(this.location, settings);
  }
}
