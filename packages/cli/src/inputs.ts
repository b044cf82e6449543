import * as core from "@actions/core";
import { z } from "zod";
import {
  DEFAULT_COMMAND_MAX_WAIT_SECS,
  DEFAULT_INSTANCE_TYPE,
  INSTANCE_RUNNING_TIMEOUT_MS,
  InvalidInputError,
} from "@ec2-runner/adapters-common";

/** Every input the runner reads, by its action input name */
export const INPUT_NAMES = [
  "mode",
  "ec2-image-id",
  "subnet-id",
  "security-group-id",
  "iam-role-name",
  "ec2-instance-type",
  "user-data",
  "tag-specifications",
  "ec2-instance-id",
  "command",
  "command-max-wait-secs",
  "instance-running-timeout-secs",
  "aws-region",
] as const;

export type InputName = (typeof INPUT_NAMES)[number];

export type RawInputs = Partial<Record<InputName, string>>;

/** Looks up an input that was not given as a flag */
export type InputSource = (name: InputName) => string;

/** Action inputs arrive as INPUT_<NAME> environment variables */
export const actionInputSource: InputSource = (name) => core.getInput(name);

export interface RunnerInputs {
  mode: string;
  imageId: string;
  subnetId: string;
  securityGroupIds: string[];
  iamRoleName: string;
  instanceType: string;
  userData: string;
  tagSpecifications: string;
  instanceId: string;
  command: string;
  commandMaxWaitSecs: number;
  instanceRunningTimeoutSecs: number;
  awsRegion?: string;
}

const INTEGER_PATTERN = /^-?\d+$/;

const text = () => z.string().trim().default("");

function integer(fallback: number, { positive = false } = {}) {
  return text().transform((value, ctx) => {
    if (value === "") return fallback;
    if (!INTEGER_PATTERN.test(value)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected an integer, got "${value}"`,
      });
      return z.NEVER;
    }
    const parsed = Number.parseInt(value, 10);
    if (positive && parsed <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `expected a positive integer, got ${parsed}`,
      });
      return z.NEVER;
    }
    return parsed;
  });
}

export const RunnerInputsSchema = z
  .object({
    mode: text(),
    "ec2-image-id": text(),
    "subnet-id": text(),
    "security-group-id": text(),
    "iam-role-name": text(),
    "ec2-instance-type": text(),
    "user-data": text(),
    "tag-specifications": text(),
    "ec2-instance-id": text(),
    command: text(),
    "command-max-wait-secs": integer(DEFAULT_COMMAND_MAX_WAIT_SECS),
    "instance-running-timeout-secs": integer(
      INSTANCE_RUNNING_TIMEOUT_MS / 1000,
      { positive: true }
    ),
    "aws-region": text(),
  })
  .transform(
    (raw): RunnerInputs => ({
      mode: raw.mode,
      imageId: raw["ec2-image-id"],
      subnetId: raw["subnet-id"],
      securityGroupIds: raw["security-group-id"]
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
      iamRoleName: raw["iam-role-name"],
      instanceType: raw["ec2-instance-type"] || DEFAULT_INSTANCE_TYPE,
      userData: raw["user-data"],
      tagSpecifications: raw["tag-specifications"],
      instanceId: raw["ec2-instance-id"],
      command: raw.command,
      commandMaxWaitSecs: raw["command-max-wait-secs"],
      instanceRunningTimeoutSecs: raw["instance-running-timeout-secs"],
      awsRegion: raw["aws-region"] || undefined,
    })
  );

/** commander stores `--ec2-image-id` as `ec2ImageId` */
export function flagKey(name: InputName): string {
  return name.replace(/-([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Merge CLI flags over the fallback source. A flag wins whenever it was
 * given, even as an empty string.
 */
export function collectRawInputs(
  mode: string | undefined,
  flags: Record<string, unknown>,
  source: InputSource = actionInputSource
): RawInputs {
  const raw: RawInputs = {};
  for (const name of INPUT_NAMES) {
    const flag = name === "mode" ? mode : flags[flagKey(name)];
    raw[name] = typeof flag === "string" ? flag : source(name);
  }
  return raw;
}

/**
 * Validate raw inputs into typed runner inputs.
 *
 * @throws InvalidInputError naming the first input that fails validation
 */
export function parseInputs(raw: RawInputs): RunnerInputs {
  const result = RunnerInputsSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new InvalidInputError(
      String(issue?.path[0] ?? "(unknown)"),
      issue?.message ?? "invalid"
    );
  }
  return result.data;
}

export function resolveInputs(
  mode: string | undefined,
  flags: Record<string, unknown>,
  source: InputSource = actionInputSource
): RunnerInputs {
  return parseInputs(collectRawInputs(mode, flags, source));
}
