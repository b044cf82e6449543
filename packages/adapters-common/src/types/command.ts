/**
 * Remote command type definitions.
 */

/**
 * Status of one command invocation on one instance.
 */
export type CommandInvocationStatus =
  | "Pending"
  | "InProgress"
  | "Delayed"
  | "Success"
  | "Cancelled"
  | "TimedOut"
  | "Failed"
  | "Cancelling";

/** Statuses after which an invocation will not change again */
export const TERMINAL_COMMAND_STATUSES: readonly CommandInvocationStatus[] = [
  "Success",
  "Cancelled",
  "TimedOut",
  "Failed",
];

export function isTerminalCommandStatus(
  status: CommandInvocationStatus
): boolean {
  return TERMINAL_COMMAND_STATUSES.includes(status);
}

/**
 * A resolved command invocation.
 */
export interface CommandInvocation {
  commandId: string;
  instanceId: string;
  status: CommandInvocationStatus;
  /** Exit code of the remote script, -1 when the provider reports none */
  responseCode: number;
  standardOutput: string;
  standardError: string;
  statusDetails?: string;
}
