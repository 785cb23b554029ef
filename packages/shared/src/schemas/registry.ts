/**
 * Zod schemas for the two registry documents:
 *   services.json     {"services": {name: ServiceInfo}}
 *   webservices.json  {"webservices": {name: WebServiceInfo}}
 */

import { z } from "zod";
import { domainSchema, portSchema, resourceNameSchema } from "./common.js";

/** Registry keys must match the `name` of their entry */
function keyedByName<T extends { name: string }>(
  entries: Record<string, T>,
  ctx: z.RefinementCtx,
): void {
  for (const [key, info] of Object.entries(entries)) {
    if (key !== info.name) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [key, "name"],
        message: `Entry "${key}" is named "${info.name}"`,
      });
    }
  }
}

export const serviceInfoSchema = z.object({
  name: resourceNameSchema,
  local_port: portSchema,
  public_url: z.string(),
  pid: z.number().int(),
  status: z.enum(["running", "stopped"]),
});

export const servicesDocumentSchema = z.object({
  services: z
    .record(serviceInfoSchema)
    .superRefine(keyedByName)
    .nullish()
    .transform((value) => value ?? {}),
});

export const webServiceInfoSchema = z.object({
  name: resourceNameSchema,
  local_port: portSchema,
  public_port: portSchema,
  domain: domainSchema.default(""),
  status: z.enum(["enabled", "disabled"]),
});

export const webServicesDocumentSchema = z.object({
  webservices: z
    .record(webServiceInfoSchema)
    .superRefine(keyedByName)
    .nullish()
    .transform((value) => value ?? {}),
});

export type ServicesDocument = z.infer<typeof servicesDocumentSchema>;
export type WebServicesDocument = z.infer<typeof webServicesDocumentSchema>;
