import {
  type IAMClient,
  type ListInstanceProfilesCommandOutput,
  AddRoleToInstanceProfileCommand,
  CreateInstanceProfileCommand,
  ListInstanceProfilesCommand,
} from "@aws-sdk/client-iam";
import {
  type IInstanceProfileService,
  type RunnerLogger,
  PROFILE_PROPAGATION_DELAY_MS,
  InstanceProfileCreateError,
  InstanceProfileListError,
  RoleAttachError,
  sleep,
} from "@ec2-runner/adapters-common";

export interface IAMServiceOptions {
  /** Pause after creating a profile before EC2 may use it (default: 2s) */
  propagationDelayMs?: number;
}

/**
 * Instance profile lookup and creation for a named IAM role.
 *
 * Profiles created here are named after the role they carry, so the returned
 * profile name equals the role name unless an existing profile is reused.
 */
export class IAMService implements IInstanceProfileService {
  private readonly propagationDelayMs: number;

  constructor(
    private readonly iam: IAMClient,
    private readonly logger: RunnerLogger,
    options: IAMServiceOptions = {}
  ) {
    this.propagationDelayMs =
      options.propagationDelayMs ?? PROFILE_PROPAGATION_DELAY_MS;
  }

  async getOrCreate(roleName: string): Promise<string> {
    const existing = await this.findProfileForRole(roleName);
    if (existing) {
      this.logger.info(
        `Instance profile for IAM role ${roleName} already exists.`
      );
      return existing;
    }

    try {
      await this.iam.send(
        new CreateInstanceProfileCommand({ InstanceProfileName: roleName })
      );
    } catch (error: unknown) {
      throw new InstanceProfileCreateError(
        `Error creating instance profile ${roleName}`,
        error
      );
    }
    this.logger.info(`Created instance profile ${roleName}`);

    try {
      await this.iam.send(
        new AddRoleToInstanceProfileCommand({
          InstanceProfileName: roleName,
          RoleName: roleName,
        })
      );
    } catch (error: unknown) {
      throw new RoleAttachError(
        `Error attaching role ${roleName} to instance profile ${roleName}`,
        error
      );
    }
    this.logger.info(
      `Attached role ${roleName} to instance profile ${roleName}`
    );

    if (this.propagationDelayMs > 0) {
      await sleep(this.propagationDelayMs);
    }
    return roleName;
  }

  /**
   * Walk every page of instance profiles looking for one that carries the role.
   */
  private async findProfileForRole(
    roleName: string
  ): Promise<string | undefined> {
    let marker: string | undefined;

    do {
      let result: ListInstanceProfilesCommandOutput;
      try {
        result = await this.iam.send(
          new ListInstanceProfilesCommand({ Marker: marker })
        );
      } catch (error: unknown) {
        throw new InstanceProfileListError(
          "Error listing instance profiles",
          error
        );
      }

      for (const profile of result.InstanceProfiles ?? []) {
        const hasRole = (profile.Roles ?? []).some(
          (r) => r.RoleName === roleName
        );
        if (hasRole && profile.InstanceProfileName) {
          return profile.InstanceProfileName;
        }
      }

      marker = result.IsTruncated ? result.Marker : undefined;
    } while (marker);

    return undefined;
  }
}
