/**
 * Compute type definitions.
 *
 * Provider-neutral shapes for the single instance a runner manages.
 */

/**
 * Lifecycle state of an instance as reported by the provider.
 */
export type InstanceState =
  | "pending"
  | "running"
  | "shutting-down"
  | "terminated"
  | "stopping"
  | "stopped";

/**
 * A tag to apply to one resource type at launch.
 */
export interface InstanceTagSpecification {
  /** Provider resource type the tags apply to (e.g. "instance", "volume") */
  resourceType: string;
  tags: { key: string; value: string }[];
}

/**
 * Everything needed to launch one instance.
 */
export interface ProvisionSpec {
  /** Machine image ID (AMI) */
  imageId: string;
  subnetId: string;
  securityGroupIds: string[];
  /** Instance type (default: "t3.micro") */
  instanceType?: string;
  /** Raw boot script; encoded by the provider adapter before transmission */
  userData?: string;
  tagSpecifications?: InstanceTagSpecification[];
  /** Instance profile granting the instance a role */
  instanceProfileName?: string;
}

/**
 * Bounds for a poll loop. Omitted fields fall back to the operation's
 * documented defaults.
 */
export interface WaitOptions {
  intervalMs?: number;
  timeoutMs?: number;
  /** Aborting stops the loop early, including an in-progress sleep */
  signal?: AbortSignal;
}
