/**
 * Structured error hierarchy for boardlink.
 *
 * All boardlink errors extend BoardlinkError, which adds:
 *   - `code`: Machine-readable error code (e.g., "CONFIG_NOT_FOUND")
 *   - `context`: Arbitrary metadata for debugging (logged, not shown to the orchestrator)
 *   - JSON serialization via toJSON()
 *
 * Error categories:
 *   - ConfigError:     Agent config or board settings missing, corrupted, or unusable
 *   - NetworkError:    Control-plane failures (not connected, timeouts, transport errors)
 *   - ValidationError: Zod schema validation failures (capability arguments, documents)
 *   - StorageError:    Persisting settings or registries failed
 *   - CapabilityError: A capability was invoked against the wrong registry state
 *   - ProcessError:    External processes (tunnel binary, reverse proxy) misbehaved
 */

/**
 * Base error class for all boardlink errors.
 * Adds a machine-readable code and structured context for debugging.
 */
export class BoardlinkError extends Error {
  /** Machine-readable error code (e.g., "CONFIG_NOT_FOUND", "NETWORK_TIMEOUT") */
  readonly code: string;
  /** Structured debugging context */
  readonly context: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    context: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = "BoardlinkError";
    this.code = code;
    this.context = context;
  }

  /** Serialize to a plain object for JSON logging and API responses */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Configuration errors: agent config or board settings missing, corrupted,
 * or describing no usable control-plane endpoint.
 * Code prefix: CONFIG_*
 *
 * @example
 *   throw new ConfigError("Settings file not found", "CONFIG_NOT_FOUND", { path: "/var/lib/boardlink/settings.json" })
 */
export class ConfigError extends BoardlinkError {
  constructor(
    message: string,
    code: string = "CONFIG_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ConfigError";
  }
}

/**
 * Network errors: the control-plane session is down, a call timed out, or
 * the transport refused an operation.
 * Code prefix: NETWORK_*
 *
 * @example
 *   throw new NetworkError("Not connected to the control plane", "NETWORK_NOT_CONNECTED", { procedure })
 */
export class NetworkError extends BoardlinkError {
  constructor(
    message: string,
    code: string = "NETWORK_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "NetworkError";
  }
}

/**
 * Validation errors: Zod schema failures, invalid capability arguments.
 * Code prefix: VALIDATION_*
 */
export class ValidationError extends BoardlinkError {
  constructor(
    message: string,
    code: string = "VALIDATION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ValidationError";
  }
}

/**
 * Storage errors: settings or registry documents could not be written or read.
 * The in-memory mutation that triggered the write is NOT rolled back, so a
 * caller seeing STORAGE_WRITE_FAILED should treat the change as applied but
 * not durable.
 * Code prefix: STORAGE_*
 */
export class StorageError extends BoardlinkError {
  constructor(
    message: string,
    code: string = "STORAGE_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "StorageError";
  }
}

/**
 * Capability errors: the invocation conflicts with the manager's registry
 * (already exposed, not found, already enabled).
 * Code prefixes: SERVICE_*, WEBSERVICE_*
 */
export class CapabilityError extends BoardlinkError {
  constructor(
    message: string,
    code: string = "CAPABILITY_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "CapabilityError";
  }
}

/**
 * Process errors: spawning the tunnel binary failed, or the reverse proxy
 * rejected its configuration or refused to reload.
 * Code prefixes: PROCESS_*, PROXY_*
 */
export class ProcessError extends BoardlinkError {
  constructor(
    message: string,
    code: string = "PROCESS_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, context);
    this.name = "ProcessError";
  }
}

/** Render any thrown value as a message string */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
