// Interfaces
export type { IInstanceLifecycleService } from "./interfaces/instance-lifecycle-service";
export type { IInstanceProfileService } from "./interfaces/instance-profile-service";
export type { IRemoteCommandService } from "./interfaces/remote-command-service";
export type { RunnerServices } from "./interfaces/runner-services";

// Types
export type {
  InstanceState,
  InstanceTagSpecification,
  ProvisionSpec,
  WaitOptions,
} from "./types/compute";
export type {
  CommandInvocationStatus,
  CommandInvocation,
} from "./types/command";
export {
  TERMINAL_COMMAND_STATUSES,
  isTerminalCommandStatus,
} from "./types/command";
export type { RunnerLogger } from "./types/logging";

// Errors
export * from "./errors";

// Constants
export * from "./constants";

// Utilities
export { pollUntil, pollDone, POLL_PENDING, sleep } from "./utils/wait";
export type { PollResult, PollOptions } from "./utils/wait";
export { resolveCommandMaxWait } from "./utils/command-wait";
export {
  parseTagSpecifications,
  TagSpecificationsSchema,
} from "./utils/tag-specifications";
