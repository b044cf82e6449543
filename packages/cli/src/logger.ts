import * as core from "@actions/core";
import chalk from "chalk";
import type { RunnerLogger } from "@ec2-runner/adapters-common";
import type { RunnerOutputs } from "./dispatcher";

/**
 * RunnerLogger over the workflow command channel. Group output folds in the
 * Actions log; debug lines show only when step debugging is on.
 */
export function createActionLogger(): RunnerLogger {
  return {
    info: (message) => core.info(message),
    warning: (message) => core.warning(message),
    debug: (message) => core.debug(message),
    group: (name, fn) => core.group(name, fn),
  };
}

/** Set each output for later steps and echo it to the log */
export function writeOutputs(
  outputs: RunnerOutputs,
  logger: RunnerLogger
): void {
  for (const [name, value] of Object.entries(outputs)) {
    if (value === undefined) continue;
    core.setOutput(name, value);
    logger.info(`${chalk.cyan(name)}: ${chalk.bold(value)}`);
  }
}
