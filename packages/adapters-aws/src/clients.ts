import { EC2Client } from "@aws-sdk/client-ec2";
import { IAMClient } from "@aws-sdk/client-iam";
import { SSMClient } from "@aws-sdk/client-ssm";

/**
 * Settings shared by every SDK client. Anything left unset falls through to
 * the SDK default chain (AWS_REGION, shared config, instance metadata).
 */
export interface AwsClientConfig {
  region?: string;
  /** SDK-level retry attempts per API call */
  maxAttempts?: number;
}

/**
 * The SDK clients one run needs, built once and handed to each service.
 */
export interface AwsClientContext {
  ec2: EC2Client;
  iam: IAMClient;
  ssm: SSMClient;
}

export function createAwsClients(
  config: AwsClientConfig = {}
): AwsClientContext {
  const clientConfig = {
    ...(config.region ? { region: config.region } : {}),
    ...(config.maxAttempts !== undefined
      ? { maxAttempts: config.maxAttempts }
      : {}),
  };

  return {
    ec2: new EC2Client(clientConfig),
    iam: new IAMClient(clientConfig),
    ssm: new SSMClient(clientConfig),
  };
}

export function destroyAwsClients(clients: AwsClientContext): void {
  clients.ec2.destroy();
  clients.iam.destroy();
  clients.ssm.destroy();
}
