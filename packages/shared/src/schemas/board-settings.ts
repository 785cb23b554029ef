/**
 * Zod schema for the board settings document (settings.json).
 *
 * The document is written by the orchestrator during registration and
 * rewritten by the agent on every status change. Unknown keys are preserved
 * so the agent never drops fields it does not understand.
 */

import { z } from "zod";
import { looseMapSchema } from "./common.js";

/** One control-plane router address */
export const controlPlaneEndpointSchema = z.object({
  url: z.string().min(1),
  realm: z.string().min(1),
});

/** Board identity and status */
export const boardConfigSchema = z
  .object({
    uuid: z.string().default(""),
    code: z.string().default(""),
    name: z.string().default(""),
    status: z
      .enum(["", "first_boot", "registered", "online", "error"])
      .default(""),
    type: z.string().default(""),
    mobile: z.boolean().default(false),
    agent: z.string().default(""),
    created_at: z.string().default(""),
    updated_at: z.string().default(""),
    location: looseMapSchema,
    extra: looseMapSchema,
  })
  .passthrough();

/** Both endpoint variants; either may be absent */
export const wampConfigurationSchema = z
  .object({
    "main-agent": controlPlaneEndpointSchema.optional(),
    "registration-agent": controlPlaneEndpointSchema.optional(),
  })
  .passthrough();

/** The full settings document */
export const boardSettingsSchema = z
  .object({
    iotronic: z
      .object({
        board: boardConfigSchema,
        wamp: wampConfigurationSchema.default({}),
        extra: looseMapSchema,
      })
      .passthrough(),
  })
  .passthrough();

/** Parsed settings document */
export type BoardSettings = z.infer<typeof boardSettingsSchema>;

/** Settings document as accepted before defaults are applied */
export type BoardSettingsInput = z.input<typeof boardSettingsSchema>;
