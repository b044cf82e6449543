import * as core from "@actions/core";
import chalk from "chalk";
import {
  type AwsClientContext,
  createAwsClients,
  createRunnerServices,
  destroyAwsClients,
} from "@ec2-runner/adapters-aws";
import { type RunnerLogger, describeError } from "@ec2-runner/adapters-common";
import { dispatch } from "../dispatcher";
import { type InputSource, actionInputSource, resolveInputs } from "../inputs";
import { createActionLogger, writeOutputs } from "../logger";

const STOP_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export interface RunDependencies {
  logger?: RunnerLogger;
  inputSource?: InputSource;
}

/**
 * Run one mode end to end. Failures never throw out of here: they are
 * reported through `core.setFailed`, which also sets exit code 1.
 */
export async function run(
  mode: string | undefined,
  flags: Record<string, unknown>,
  deps: RunDependencies = {}
): Promise<void> {
  const logger = deps.logger ?? createActionLogger();
  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    logger.warning(`Received ${signal}, abandoning the current wait`);
    controller.abort(new Error(`Interrupted by ${signal}`));
  };
  for (const signal of STOP_SIGNALS) process.once(signal, onSignal);

  let clients: AwsClientContext | undefined;
  try {
    const inputs = resolveInputs(
      mode,
      flags,
      deps.inputSource ?? actionInputSource
    );
    clients = createAwsClients({ region: inputs.awsRegion });
    const services = createRunnerServices(clients, logger);

    logger.info(`Running mode ${chalk.bold(inputs.mode || "(none)")}`);
    const outputs = await dispatch(inputs, services, logger, controller.signal);
    writeOutputs(outputs, logger);
  } catch (error: unknown) {
    core.setFailed(describeError(error));
  } finally {
    for (const signal of STOP_SIGNALS) process.off(signal, onSignal);
    if (clients) destroyAwsClients(clients);
  }
}
