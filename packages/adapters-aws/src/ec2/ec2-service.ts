import {
  type EC2Client,
  type _InstanceType,
  type DescribeInstancesCommandOutput,
  type RunInstancesCommandInput,
  type RunInstancesCommandOutput,
  type TagSpecification,
  DescribeInstancesCommand,
  ResourceType,
  RunInstancesCommand,
  TerminateInstancesCommand,
} from "@aws-sdk/client-ec2";
import {
  type IInstanceLifecycleService,
  type InstanceState,
  type InstanceTagSpecification,
  type ProvisionSpec,
  type RunnerLogger,
  type WaitOptions,
  DEFAULT_INSTANCE_TYPE,
  INSTANCE_POLL_INTERVAL_MS,
  INSTANCE_RUNNING_TIMEOUT_MS,
  DescribeError,
  MalformedTagSpecError,
  POLL_PENDING,
  ProvisioningError,
  TerminationError,
  awsErrorName,
  pollDone,
  pollUntil,
} from "@ec2-runner/adapters-common";

/** EC2 reports freshly launched instances as unknown for a short while */
const INSTANCE_NOT_FOUND = "InvalidInstanceID.NotFound";

/** States an instance never leaves for "running" on its own */
const DEAD_END_STATES: ReadonlySet<InstanceState> = new Set([
  "shutting-down",
  "terminated",
  "stopping",
  "stopped",
]);

const RESOURCE_TYPES: ReadonlySet<string> = new Set(
  Object.values(ResourceType)
);

function isResourceType(value: string): value is ResourceType {
  return RESOURCE_TYPES.has(value);
}

export interface EC2ServiceOptions {
  /** Defaults for `waitRunning` when the caller passes none */
  pollIntervalMs?: number;
  runningTimeoutMs?: number;
}

/**
 * Lifecycle of the single runner instance: RunInstances, a DescribeInstances
 * poll until "running", and TerminateInstances.
 */
export class EC2Service implements IInstanceLifecycleService {
  private readonly pollIntervalMs: number;
  private readonly runningTimeoutMs: number;

  constructor(
    private readonly ec2: EC2Client,
    private readonly logger: RunnerLogger,
    options: EC2ServiceOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? INSTANCE_POLL_INTERVAL_MS;
    this.runningTimeoutMs =
      options.runningTimeoutMs ?? INSTANCE_RUNNING_TIMEOUT_MS;
  }

  validateProvisionSpec(spec: ProvisionSpec): void {
    for (const tagSpec of spec.tagSpecifications ?? []) {
      this.toTagSpecification(tagSpec);
    }
  }

  async provision(spec: ProvisionSpec): Promise<string> {
    const input = this.buildRunInstancesInput(spec);

    let result: RunInstancesCommandOutput;
    try {
      result = await this.ec2.send(new RunInstancesCommand(input));
    } catch (error: unknown) {
      throw new ProvisioningError("Error starting EC2 instance", error);
    }

    const instanceId = result.Instances?.[0]?.InstanceId;
    if (!instanceId) {
      throw new ProvisioningError("RunInstances did not return an instance ID");
    }

    this.logger.info(
      `Instance launched: ${instanceId} (${input.InstanceType})`
    );
    return instanceId;
  }

  async describeState(
    instanceId: string,
    signal?: AbortSignal
  ): Promise<InstanceState | undefined> {
    let result: DescribeInstancesCommandOutput;
    try {
      result = await this.ec2.send(
        new DescribeInstancesCommand({ InstanceIds: [instanceId] }),
        { abortSignal: signal }
      );
    } catch (error: unknown) {
      if (awsErrorName(error) === INSTANCE_NOT_FOUND) return undefined;
      throw new DescribeError(`Error describing instance ${instanceId}`, error);
    }

    return result.Reservations?.[0]?.Instances?.[0]?.State?.Name;
  }

  async waitRunning(
    instanceId: string,
    options: WaitOptions = {}
  ): Promise<void> {
    await pollUntil(
      async () => {
        const state = await this.describeState(instanceId, options.signal);
        this.logger.info(`Instance state: ${state ?? "not yet visible"}`);
        if (state && DEAD_END_STATES.has(state)) {
          throw new ProvisioningError(
            `Instance ${instanceId} entered state ${state} before running`
          );
        }
        return state === "running" ? pollDone(state) : POLL_PENDING;
      },
      {
        intervalMs: options.intervalMs ?? this.pollIntervalMs,
        timeoutMs: options.timeoutMs ?? this.runningTimeoutMs,
        signal: options.signal,
        description: `instance ${instanceId} to reach the running state`,
      }
    );
    this.logger.info(`Instance ${instanceId} is now running.`);
  }

  async terminate(instanceId: string): Promise<void> {
    try {
      await this.ec2.send(
        new TerminateInstancesCommand({ InstanceIds: [instanceId] })
      );
    } catch (error: unknown) {
      throw new TerminationError(
        `Error stopping EC2 instance ${instanceId}`,
        error
      );
    }
    this.logger.info(`Instance ${instanceId} is stopping...`);
  }

  // ── Private Helpers ──────────────────────────────────────────────────

  private buildRunInstancesInput(
    spec: ProvisionSpec
  ): RunInstancesCommandInput {
    return {
      ImageId: spec.imageId,
      InstanceType: (spec.instanceType ||
        DEFAULT_INSTANCE_TYPE) as _InstanceType,
      MinCount: 1,
      MaxCount: 1,
      Monitoring: { Enabled: false },
      SubnetId: spec.subnetId,
      SecurityGroupIds: spec.securityGroupIds,
      UserData: spec.userData
        ? Buffer.from(spec.userData, "utf8").toString("base64")
        : undefined,
      TagSpecifications: spec.tagSpecifications?.map((s) =>
        this.toTagSpecification(s)
      ),
      IamInstanceProfile: spec.instanceProfileName
        ? { Name: spec.instanceProfileName }
        : undefined,
    };
  }

  private toTagSpecification(
    spec: InstanceTagSpecification
  ): TagSpecification {
    if (!isResourceType(spec.resourceType)) {
      throw new MalformedTagSpecError(
        `unknown resource type "${spec.resourceType}"`
      );
    }
    return {
      ResourceType: spec.resourceType,
      Tags: spec.tags.map((tag) => ({ Key: tag.key, Value: tag.value })),
    };
  }
}
