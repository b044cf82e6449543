/**
 * SSM Run Command service. Delivers shell commands to the SSM agent on an
 * instance and retrieves the invocation result.
 *
 * Delivery and retrieval only: a script that exits non-zero is reported in the
 * log and returned to the caller, never raised.
 */

import {
  type SSMClient,
  type DescribeInstanceInformationCommandOutput,
  type GetCommandInvocationCommandOutput,
  type SendCommandCommandOutput,
  DescribeInstanceInformationCommand,
  GetCommandInvocationCommand,
  SendCommandCommand,
} from "@aws-sdk/client-ssm";
import {
  type CommandInvocation,
  type IRemoteCommandService,
  type RunnerLogger,
  type WaitOptions,
  AGENT_POLL_INTERVAL_MS,
  AGENT_REGISTRATION_TIMEOUT_MS,
  COMMAND_POLL_INTERVAL_MS,
  OUTPUT_DISPLAY_LIMIT,
  RUN_SHELL_SCRIPT_DOCUMENT,
  AgentNotRegisteredError,
  CommandInvocationError,
  DescribeError,
  DispatchError,
  POLL_PENDING,
  TimeoutError,
  awsErrorName,
  isTerminalCommandStatus,
  pollDone,
  pollUntil,
  resolveCommandMaxWait,
} from "@ec2-runner/adapters-common";

/** Returned by GetCommandInvocation until the invocation has been recorded */
const INVOCATION_NOT_FOUND = "InvocationDoesNotExist";

export interface SSMServiceOptions {
  agentTimeoutMs?: number;
  agentPollIntervalMs?: number;
  commandPollIntervalMs?: number;
}

export class SSMService implements IRemoteCommandService {
  private readonly agentTimeoutMs: number;
  private readonly agentPollIntervalMs: number;
  private readonly commandPollIntervalMs: number;

  constructor(
    private readonly ssm: SSMClient,
    private readonly logger: RunnerLogger,
    options: SSMServiceOptions = {}
  ) {
    this.agentTimeoutMs =
      options.agentTimeoutMs ?? AGENT_REGISTRATION_TIMEOUT_MS;
    this.agentPollIntervalMs =
      options.agentPollIntervalMs ?? AGENT_POLL_INTERVAL_MS;
    this.commandPollIntervalMs =
      options.commandPollIntervalMs ?? COMMAND_POLL_INTERVAL_MS;
  }

  async isAgentRegistered(
    instanceId: string,
    options: WaitOptions = {}
  ): Promise<boolean> {
    try {
      await pollUntil(
        async () => {
          if (await this.isAgentOnline(instanceId, options.signal)) {
            return pollDone(true);
          }
          this.logger.info(
            `SSM agent is not registered or not online for instance ${instanceId}. Waiting...`
          );
          return POLL_PENDING;
        },
        {
          intervalMs: options.intervalMs ?? this.agentPollIntervalMs,
          timeoutMs: options.timeoutMs ?? this.agentTimeoutMs,
          signal: options.signal,
          description: `SSM agent on ${instanceId}`,
        }
      );
    } catch (error: unknown) {
      if (error instanceof TimeoutError) {
        this.logger.info(
          `Timeout reached. SSM agent is not registered for instance ${instanceId}`
        );
        return false;
      }
      throw error;
    }

    this.logger.info(
      `SSM agent is registered and online for instance ${instanceId}`
    );
    return true;
  }

  async execute(
    instanceId: string,
    command: string,
    maxWaitSecs: number,
    signal?: AbortSignal
  ): Promise<CommandInvocation> {
    const waitSecs = resolveCommandMaxWait(maxWaitSecs, this.logger);

    const registered = await this.isAgentRegistered(instanceId, { signal });
    if (!registered) {
      throw new AgentNotRegisteredError(instanceId);
    }

    const commandId = await this.sendCommand(instanceId, command, signal);
    this.logger.info(
      `Command ${commandId} sent to instance ${instanceId}, waiting up to ${waitSecs}s for it to finish`
    );

    const invocation = await pollUntil(
      async () => {
        const current = await this.getInvocation(
          commandId,
          instanceId,
          signal
        );
        if (!current) {
          return POLL_PENDING;
        }
        this.logger.debug(`Command ${commandId} status: ${current.status}`);
        return isTerminalCommandStatus(current.status)
          ? pollDone(current)
          : POLL_PENDING;
      },
      {
        intervalMs: this.commandPollIntervalMs,
        timeoutMs: waitSecs * 1000,
        signal,
        description: `command ${commandId} to complete`,
      }
    );

    await this.report(invocation);
    return invocation;
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private async isAgentOnline(
    instanceId: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    let result: DescribeInstanceInformationCommandOutput;
    try {
      result = await this.ssm.send(
        new DescribeInstanceInformationCommand({
          Filters: [{ Key: "InstanceIds", Values: [instanceId] }],
        }),
        { abortSignal: signal }
      );
    } catch (error: unknown) {
      throw new DescribeError(
        `Error describing SSM instance information for ${instanceId}`,
        error
      );
    }

    return (result.InstanceInformationList ?? []).some(
      (info) => info.InstanceId === instanceId && info.PingStatus === "Online"
    );
  }

  private async sendCommand(
    instanceId: string,
    command: string,
    signal?: AbortSignal
  ): Promise<string> {
    let result: SendCommandCommandOutput;
    try {
      result = await this.ssm.send(
        new SendCommandCommand({
          InstanceIds: [instanceId],
          DocumentName: RUN_SHELL_SCRIPT_DOCUMENT,
          Parameters: { commands: [command] },
        }),
        { abortSignal: signal }
      );
    } catch (error: unknown) {
      throw new DispatchError(
        `Error sending command '${command}' to EC2 instance ${instanceId}`,
        error
      );
    }

    const commandId = result.Command?.CommandId;
    if (!commandId) {
      throw new DispatchError("SendCommand did not return a command ID");
    }
    return commandId;
  }

  private async getInvocation(
    commandId: string,
    instanceId: string,
    signal?: AbortSignal
  ): Promise<CommandInvocation | undefined> {
    let result: GetCommandInvocationCommandOutput;
    try {
      result = await this.ssm.send(
        new GetCommandInvocationCommand({
          CommandId: commandId,
          InstanceId: instanceId,
        }),
        { abortSignal: signal }
      );
    } catch (error: unknown) {
      if (awsErrorName(error) === INVOCATION_NOT_FOUND) return undefined;
      throw new CommandInvocationError(
        `Error getting command invocation details for ${commandId}`,
        error
      );
    }

    return {
      commandId,
      instanceId,
      status: result.Status ?? "Pending",
      responseCode: result.ResponseCode ?? -1,
      standardOutput: result.StandardOutputContent ?? "",
      standardError: result.StandardErrorContent ?? "",
      statusDetails: result.StatusDetails,
    };
  }

  private async report(invocation: CommandInvocation): Promise<void> {
    await this.logger.group("Command invocation details", async () => {
      this.logger.info(`ResponseCode: ${invocation.responseCode}`);
      this.logger.info(`Status: ${invocation.status}`);
      this.logger.info(`StdError: ${invocation.standardError}`);
      if (invocation.standardOutput.length < OUTPUT_DISPLAY_LIMIT) {
        this.logger.info(`StdOutput: ${invocation.standardOutput}`);
      } else {
        this.logger.info("(enable debug to see full output)");
        this.logger.debug(`StdOutput: ${invocation.standardOutput}`);
      }
    });

    if (invocation.status !== "Success") {
      const details = invocation.statusDetails
        ? ` (${invocation.statusDetails})`
        : "";
      this.logger.warning(
        `Command ${invocation.commandId} finished with status ${invocation.status}${details}`
      );
    }
  }
}
