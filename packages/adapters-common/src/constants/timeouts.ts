/**
 * Timing constants for runner poll loops.
 */

/** Polling interval while waiting for an instance to reach "running" */
export const INSTANCE_POLL_INTERVAL_MS = 5_000;

/** Upper bound for the running-state wait (10 minutes) */
export const INSTANCE_RUNNING_TIMEOUT_MS = 600_000;

/** How long the SSM agent gets to report online before a command is refused */
export const AGENT_REGISTRATION_TIMEOUT_MS = 60_000;

/** Polling interval for SSM agent registration */
export const AGENT_POLL_INTERVAL_MS = 5_000;

/** Polling interval for command invocation status */
export const COMMAND_POLL_INTERVAL_MS = 5_000;

/** Default time to wait for a command invocation to finish */
export const DEFAULT_COMMAND_MAX_WAIT_SECS = 300;

/** Smallest accepted command wait; anything at or below 5s is raised to this */
export const MIN_COMMAND_MAX_WAIT_SECS = 6;

/** Pause after creating an instance profile so EC2 can see it */
export const PROFILE_PROPAGATION_DELAY_MS = 2_000;
