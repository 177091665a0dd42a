/**
 * Polling constants for cloud operations.
 */

/** Interval between status checks while waiting for a port to leave DOWN */
export const PORT_ACTIVE_POLL_INTERVAL_MS = 2_000;

/** Number of status checks before the activation wait gives up (30 seconds in total) */
export const PORT_ACTIVE_MAX_RETRIES = 15;

/** Timeout for the networking apply command */
export const APPLY_COMMAND_TIMEOUT_MS = 120_000;

/** Timeout for a single cloud API request */
export const CLOUD_REQUEST_TIMEOUT_MS = 30_000;
