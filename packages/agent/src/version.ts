/** Agent version reported by the CLI and the status API */
export const VERSION = "0.1.0";

/** Name reported by /api/info */
export const AGENT_NAME = "boardlink";
