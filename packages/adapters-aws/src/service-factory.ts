/**
 * Factory for the AWS-backed runner services.
 */

import type {
  RunnerLogger,
  RunnerServices,
} from "@ec2-runner/adapters-common";
import type { AwsClientContext } from "./clients";
import { EC2Service, type EC2ServiceOptions } from "./ec2/ec2-service";
import { IAMService, type IAMServiceOptions } from "./iam/iam-service";
import { SSMService, type SSMServiceOptions } from "./ssm/ssm-service";

export interface RunnerServiceOptions {
  ec2?: EC2ServiceOptions;
  iam?: IAMServiceOptions;
  ssm?: SSMServiceOptions;
}

export function createRunnerServices(
  clients: AwsClientContext,
  logger: RunnerLogger,
  options: RunnerServiceOptions = {}
): RunnerServices {
  return {
    instances: new EC2Service(clients.ec2, logger, options.ec2),
    profiles: new IAMService(clients.iam, logger, options.iam),
    commands: new SSMService(clients.ssm, logger, options.ssm),
  };
}
