import { MIN_COMMAND_MAX_WAIT_SECS } from "../constants/timeouts";
import type { RunnerLogger } from "../types/logging";

/**
 * Apply the floor on how long a command invocation is waited for. Values of
 * five seconds or less are raised to six, with a warning.
 */
export function resolveCommandMaxWait(
  maxWaitSecs: number,
  logger: RunnerLogger
): number {
  if (maxWaitSecs < MIN_COMMAND_MAX_WAIT_SECS) {
    logger.warning(
      `command-max-wait-secs raised to minimum ${MIN_COMMAND_MAX_WAIT_SECS} seconds`
    );
    return MIN_COMMAND_MAX_WAIT_SECS;
  }
  return maxWaitSecs;
}
