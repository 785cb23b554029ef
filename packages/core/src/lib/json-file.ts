/**
 * JSON document persistence: zod-validated reads and atomic writes.
 *
 * Writes go to a temporary file in the same directory and are renamed over
 * the target, so a reader never observes a half-written document.
 */

import * as crypto from "node:crypto";
import * as fs from "node:fs";
import * as path from "node:path";
import type { z } from "zod";
import { StorageError, errorMessage } from "@boardlink/shared";

/** Outcome of reading a JSON document from disk */
export type JsonReadResult<T> =
  | { status: "missing" }
  | { status: "ok"; value: T }
  | { status: "corrupted"; error: string }
  | { status: "invalid"; issues: z.ZodIssue[] };

/**
 * Read and validate a JSON document. Never throws for a missing, unparseable
 * or invalid file; the caller decides which of those is fatal.
 */
export function readJsonDocument<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S,
): JsonReadResult<z.output<S>> {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return { status: "missing" };
    }
    return { status: "corrupted", error: errorMessage(err) };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    return { status: "corrupted", error: errorMessage(err) };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    return { status: "invalid", issues: result.error.issues };
  }
  return { status: "ok", value: result.data };
}

/**
 * Write `value` as pretty-printed JSON via tmp file + rename.
 *
 * @throws StorageError STORAGE_WRITE_FAILED
 */
export function writeJsonAtomic(filePath: string, value: unknown): void {
  const dir = path.dirname(filePath);
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.tmp.${crypto.randomBytes(4).toString("hex")}`,
  );

  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(tmpPath, JSON.stringify(value, null, 2) + "\n", "utf-8");
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    fs.rmSync(tmpPath, { force: true });
    throw new StorageError(
      `Failed to write ${filePath}: ${errorMessage(err)}`,
      "STORAGE_WRITE_FAILED",
      { path: filePath },
    );
  }
}

/** Narrow an unknown thrown value to a Node system error */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
