/**
 * Instance Lifecycle Service Interface
 *
 * Launches, observes and terminates the single compute instance a runner
 * manages. Implemented by the AWS EC2 instance service.
 */

import type {
  InstanceState,
  ProvisionSpec,
  WaitOptions,
} from "../types/compute";

export interface IInstanceLifecycleService {
  /**
   * Check a launch spec without calling the provider.
   *
   * @throws MalformedTagSpecError for a resource type the provider rejects
   */
  validateProvisionSpec(spec: ProvisionSpec): void;

  /**
   * Launch one instance.
   *
   * @returns The provider-assigned instance ID
   * @throws ProvisioningError when the provider rejects the request
   */
  provision(spec: ProvisionSpec): Promise<string>;

  /**
   * Current lifecycle state, or undefined while the instance is not yet
   * visible to the describe API.
   *
   * @throws DescribeError on API failure
   */
  describeState(
    instanceId: string,
    signal?: AbortSignal
  ): Promise<InstanceState | undefined>;

  /**
   * Block until the instance reports "running".
   *
   * @throws DescribeError on API failure
   * @throws ProvisioningError once the instance is in a state that cannot
   * lead to "running"
   * @throws TimeoutError when the deadline passes first
   */
  waitRunning(instanceId: string, options?: WaitOptions): Promise<void>;

  /**
   * Request termination. Resolves once the request is acknowledged, not
   * once the instance is gone.
   *
   * @throws TerminationError when the provider rejects the request
   */
  terminate(instanceId: string): Promise<void>;
}
