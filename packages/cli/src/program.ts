import { Command, type OptionValues } from "commander";
import { RUNNER_VERSION } from "./version";

export type RunAction = (
  mode: string | undefined,
  flags: OptionValues
) => Promise<void>;

/**
 * Every flag mirrors the action input of the same name. Flags left out fall
 * back to the INPUT_* environment, so the same binary serves as a CLI and as
 * the action entrypoint.
 */
export function createProgram(action: RunAction): Command {
  const program = new Command();

  program
    .name("ec2-runner")
    .description(
      "Start, command and stop a single EC2 instance for a CI pipeline"
    )
    .version(RUNNER_VERSION)
    .argument("[mode]", "start | command | stop")
    // start
    .option("--ec2-image-id <id>", "AMI to launch")
    .option("--subnet-id <id>", "Subnet to launch into")
    .option(
      "--security-group-id <ids>",
      "Security group ID (comma-separated for several)"
    )
    .option(
      "--iam-role-name <name>",
      "IAM role to attach through an instance profile"
    )
    .option("--ec2-instance-type <type>", "Instance type (default: t3.micro)")
    .option("--user-data <script>", "Boot script, base64-encoded before launch")
    .option(
      "--tag-specifications <json>",
      "JSON array of {ResourceType, Tags:[{Key, Value}]}"
    )
    .option(
      "--instance-running-timeout-secs <secs>",
      "How long to wait for running (default: 600)"
    )
    // command / stop
    .option("--ec2-instance-id <id>", "Target instance")
    .option("--command <command>", "Shell command to run through SSM")
    .option(
      "--command-max-wait-secs <secs>",
      "How long to wait for the command (default: 300, minimum 6)"
    )
    // shared
    .option("--aws-region <region>", "AWS region (default: SDK region chain)")
    .action((mode: string | undefined, options: OptionValues) =>
      action(mode, options)
    );

  return program;
}
