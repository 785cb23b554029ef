/**
 * Capability procedure naming.
 *
 * A procedure name is derived from the current control-plane session id, so
 * every name changes when the session does:
 *
 *   <namespace>.<sessionId>.<boardUuid>.<Verb>
 *   e.g. iotronic.5081412736.0f4c...-b2.ExposeService
 */

import type { CapabilityVerb } from "./types/capability.js";

/** Namespace the orchestrator expects board procedures under */
export const DEFAULT_PROCEDURE_NAMESPACE = "iotronic";

export function procedureName(
  namespace: string,
  sessionId: string,
  boardUuid: string,
  verb: CapabilityVerb,
): string {
  return `${namespace}.${sessionId}.${boardUuid}.${verb}`;
}
