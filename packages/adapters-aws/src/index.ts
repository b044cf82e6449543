// Clients
export {
  createAwsClients,
  destroyAwsClients,
  type AwsClientConfig,
  type AwsClientContext,
} from "./clients";

// EC2
export { EC2Service, type EC2ServiceOptions } from "./ec2/ec2-service";

// IAM
export { IAMService, type IAMServiceOptions } from "./iam/iam-service";

// SSM
export { SSMService, type SSMServiceOptions } from "./ssm/ssm-service";

// Factory
export {
  createRunnerServices,
  type RunnerServiceOptions,
} from "./service-factory";
