/**
 * Zod schemas for positional capability arguments.
 *
 * The orchestrator sends arguments as a positional list. Each schema accepts
 * the list (extra trailing arguments are ignored) and produces a named
 * object for the manager. Verbs that take no arguments have no schema.
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { CapabilityVerb } from "../types/capability.js";
import { domainSchema, portSchema, resourceNameSchema } from "./common.js";

/** ExposeService(name, localPort) */
export const exposeServiceArgsSchema = z
  .tuple([resourceNameSchema, portSchema])
  .rest(z.unknown())
  .transform(([name, localPort]) => ({ name, localPort }));

/** UnexposeService(name) */
export const unexposeServiceArgsSchema = z
  .tuple([resourceNameSchema])
  .rest(z.unknown())
  .transform(([name]) => ({ name }));

/** EnableWebService(name, localPort, publicPort[, domain]) */
export const enableWebServiceArgsSchema = z
  .tuple([resourceNameSchema, portSchema, portSchema])
  .rest(z.unknown())
  .transform(([name, localPort, publicPort, ...rest], ctx) => {
    const domain = domainSchema.optional().safeParse(rest[0] ?? undefined);
    if (!domain.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [3],
        message: "domain must be a host name",
      });
      return z.NEVER;
    }
    return { name, localPort, publicPort, domain: domain.data ?? "" };
  });

/** DisableWebService(name) */
export const disableWebServiceArgsSchema = unexposeServiceArgsSchema;

export type ExposeServiceArgs = z.infer<typeof exposeServiceArgsSchema>;
export type UnexposeServiceArgs = z.infer<typeof unexposeServiceArgsSchema>;
export type EnableWebServiceArgs = z.infer<typeof enableWebServiceArgsSchema>;
export type DisableWebServiceArgs = z.infer<typeof disableWebServiceArgsSchema>;

/**
 * Validate the positional arguments of a capability invocation.
 *
 * @throws ValidationError VALIDATION_ARGS: with the zod issues in context
 */
export function parseCapabilityArgs<S extends z.ZodTypeAny>(
  verb: CapabilityVerb,
  schema: S,
  args: unknown[],
): z.output<S> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `argument ${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join(", ");
    throw new ValidationError(
      `Invalid arguments for ${verb}: ${detail}`,
      "VALIDATION_ARGS",
      { verb, zodErrors: result.error.issues },
    );
  }
  return result.data;
}
