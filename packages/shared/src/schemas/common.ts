/**
 * Field schemas shared by the registry documents and capability arguments.
 */

import { z } from "zod";

/**
 * Service / webservice name. Names become file names and URL path segments,
 * so they are restricted to a conservative character set.
 */
export const resourceNameSchema = z
  .string()
  .regex(
    /^[A-Za-z0-9][A-Za-z0-9_-]{0,62}$/,
    "name must be 1-63 characters of letters, digits, '_' or '-'",
  );

/** TCP port */
export const portSchema = z.number().int().min(1).max(65535);

/** Reverse-proxy server_name; empty means catch-all */
export const domainSchema = z
  .string()
  .regex(/^[A-Za-z0-9*][A-Za-z0-9.*-]{0,252}$/, "invalid domain")
  .or(z.literal(""));

/** An object map that older settings files may carry as null */
export const looseMapSchema = z
  .record(z.unknown())
  .nullish()
  .transform((value) => value ?? {});
