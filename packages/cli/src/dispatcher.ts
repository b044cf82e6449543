/**
 * Mode dispatcher: validates what each mode needs and runs it against the
 * injected collaborators. Holds no state between calls.
 */

import {
  type ProvisionSpec,
  type RunnerLogger,
  type RunnerServices,
  MissingParameterError,
  UnsupportedModeError,
  parseTagSpecifications,
} from "@ec2-runner/adapters-common";
import type { RunnerInputs } from "./inputs";

export type RunnerMode = "start" | "command" | "stop";

export type OutputName =
  | "ec2-instance-id"
  | "command-id"
  | "command-status"
  | "command-response-code";

export type RunnerOutputs = Partial<Record<OutputName, string>>;

export async function dispatch(
  inputs: RunnerInputs,
  services: RunnerServices,
  logger: RunnerLogger,
  signal?: AbortSignal
): Promise<RunnerOutputs> {
  switch (inputs.mode) {
    case "start":
      return startInstance(inputs, services, signal);
    case "command":
      return runCommand(inputs, services, signal);
    case "stop":
      return stopInstance(inputs, services, logger);
    case "":
      throw new MissingParameterError(["mode"]);
    default:
      throw new UnsupportedModeError(inputs.mode);
  }
}

async function startInstance(
  inputs: RunnerInputs,
  { instances, profiles }: RunnerServices,
  signal?: AbortSignal
): Promise<RunnerOutputs> {
  requireInputs("start", {
    "ec2-image-id": inputs.imageId,
    "subnet-id": inputs.subnetId,
    "security-group-id": inputs.securityGroupIds,
  });

  const spec: ProvisionSpec = {
    imageId: inputs.imageId,
    subnetId: inputs.subnetId,
    securityGroupIds: inputs.securityGroupIds,
    instanceType: inputs.instanceType,
    userData: inputs.userData || undefined,
    tagSpecifications: parseTagSpecifications(inputs.tagSpecifications),
  };
  // A bad launch spec must fail before the profile or instance exists
  instances.validateProvisionSpec(spec);

  const instanceProfileName = inputs.iamRoleName
    ? await profiles.getOrCreate(inputs.iamRoleName)
    : undefined;

  const instanceId = await instances.provision({
    ...spec,
    instanceProfileName,
  });

  await instances.waitRunning(instanceId, {
    timeoutMs: inputs.instanceRunningTimeoutSecs * 1000,
    signal,
  });

  return { "ec2-instance-id": instanceId };
}

async function runCommand(
  inputs: RunnerInputs,
  { commands }: RunnerServices,
  signal?: AbortSignal
): Promise<RunnerOutputs> {
  requireInputs("command", {
    "ec2-instance-id": inputs.instanceId,
    command: inputs.command,
  });

  const invocation = await commands.execute(
    inputs.instanceId,
    inputs.command,
    inputs.commandMaxWaitSecs,
    signal
  );

  return {
    "command-id": invocation.commandId,
    "command-status": invocation.status,
    "command-response-code": String(invocation.responseCode),
  };
}

async function stopInstance(
  inputs: RunnerInputs,
  { instances }: RunnerServices,
  logger: RunnerLogger
): Promise<RunnerOutputs> {
  requireInputs("stop", { "ec2-instance-id": inputs.instanceId });

  await instances.terminate(inputs.instanceId);
  logger.debug(`Terminate request accepted for ${inputs.instanceId}`);
  return {};
}

function requireInputs(
  mode: RunnerMode,
  required: Record<string, string | string[]>
): void {
  const missing = Object.entries(required)
    .filter(([, value]) => value.length === 0)
    .map(([name]) => name);

  if (missing.length > 0) {
    throw new MissingParameterError(missing, mode);
  }
}
