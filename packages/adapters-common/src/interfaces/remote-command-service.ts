/**
 * Remote Command Service Interface
 *
 * Delivers shell commands to the agent running on an instance and retrieves
 * their results. Implemented by the AWS SSM run-command service.
 */

import type { CommandInvocation } from "../types/command";
import type { WaitOptions } from "../types/compute";

export interface IRemoteCommandService {
  /**
   * Whether the instance's agent reports online within the wait window.
   * A timeout yields false, not an error.
   *
   * @throws DescribeError on API failure
   */
  isAgentRegistered(
    instanceId: string,
    options?: WaitOptions
  ): Promise<boolean>;

  /**
   * Wait for the agent, dispatch `command`, then wait up to `maxWaitSecs`
   * for the invocation to reach a terminal status.
   *
   * A command that ran but failed on the instance is returned, not thrown.
   *
   * @throws AgentNotRegisteredError when the agent never comes online
   * @throws DispatchError when the command is rejected
   * @throws TimeoutError when the invocation does not finish in time
   */
  execute(
    instanceId: string,
    command: string,
    maxWaitSecs: number,
    signal?: AbortSignal
  ): Promise<CommandInvocation>;
}
