/**
 * Capability (remote procedure) type definitions.
 *
 * Every capability the agent exposes answers with a CapabilityResult as its
 * single positional result. Arguments arrive positionally, exactly as the
 * orchestrator sends them, and are validated per verb.
 */

/** Every verb the agent advertises on the control plane */
export const CAPABILITY_VERBS = [
  "DevicePing",
  "DeviceInfo",
  "DeviceStatus",
  "ExposeService",
  "UnexposeService",
  "ServicesList",
  "EnableWebService",
  "DisableWebService",
  "WebServicesList",
  "ProxyInfo",
] as const;

/** A capability verb */
export type CapabilityVerb = (typeof CAPABILITY_VERBS)[number];

/** Outcome marker carried by every capability response */
export type CapabilityOutcome = "SUCCESS" | "ERROR";

/** Structured response of every capability */
export interface CapabilityResult {
  result: CapabilityOutcome;
  message: string;
  data?: Record<string, unknown>;
}

/**
 * A handler as the session layer sees it: positional args in, structured
 * result out. Handlers never reject; failures are ERROR results.
 */
export type CapabilityHandler = (args: unknown[]) => Promise<CapabilityResult>;

/** Build a SUCCESS result */
export function success(
  message: string,
  data?: Record<string, unknown>,
): CapabilityResult {
  return data === undefined
    ? { result: "SUCCESS", message }
    : { result: "SUCCESS", message, data };
}

/** Build an ERROR result */
export function failure(message: string): CapabilityResult {
  return { result: "ERROR", message };
}
