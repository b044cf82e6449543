/**
 * Error taxonomy for runner operations.
 *
 * Every failure surfaced by a collaborator or the mode dispatcher is a
 * RunnerError subclass carrying a stable code. Collaborators attach the SDK
 * error they caught as `originalError`.
 */

export enum RunnerErrorCode {
  MISSING_PARAMETER = "MISSING_PARAMETER",
  UNSUPPORTED_MODE = "UNSUPPORTED_MODE",
  INVALID_INPUT = "INVALID_INPUT",
  MALFORMED_TAG_SPEC = "MALFORMED_TAG_SPEC",
  PROVISIONING = "PROVISIONING",
  DESCRIBE = "DESCRIBE",
  TERMINATION = "TERMINATION",
  PROFILE_LIST = "PROFILE_LIST",
  PROFILE_CREATE = "PROFILE_CREATE",
  ROLE_ATTACH = "ROLE_ATTACH",
  AGENT_NOT_REGISTERED = "AGENT_NOT_REGISTERED",
  DISPATCH = "DISPATCH",
  COMMAND_INVOCATION = "COMMAND_INVOCATION",
  TIMEOUT = "TIMEOUT",
}

export class RunnerError extends Error {
  constructor(
    message: string,
    public readonly code: RunnerErrorCode,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = "RunnerError";
  }
}

export class MissingParameterError extends RunnerError {
  constructor(public readonly parameters: string[], context?: string) {
    super(
      `Required ${parameters.length === 1 ? "parameter" : "parameters"} ` +
        `(${parameters.join(", ")}) ` +
        `${parameters.length === 1 ? "is" : "are"} missing` +
        (context ? ` for mode '${context}'.` : "."),
      RunnerErrorCode.MISSING_PARAMETER
    );
    this.name = "MissingParameterError";
  }
}

export class UnsupportedModeError extends RunnerError {
  constructor(public readonly mode: string) {
    super(
      `Unsupported mode: ${mode}. Supported modes are 'start', 'command', and 'stop'.`,
      RunnerErrorCode.UNSUPPORTED_MODE
    );
    this.name = "UnsupportedModeError";
  }
}

export class InvalidInputError extends RunnerError {
  constructor(public readonly input: string, detail: string) {
    super(
      `Invalid value for input '${input}': ${detail}`,
      RunnerErrorCode.INVALID_INPUT
    );
    this.name = "InvalidInputError";
  }
}

export class MalformedTagSpecError extends RunnerError {
  constructor(detail: string, originalError?: unknown) {
    super(
      `Error parsing tag specifications: ${detail}`,
      RunnerErrorCode.MALFORMED_TAG_SPEC,
      originalError
    );
    this.name = "MalformedTagSpecError";
  }
}

export class ProvisioningError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.PROVISIONING, originalError);
    this.name = "ProvisioningError";
  }
}

export class DescribeError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.DESCRIBE, originalError);
    this.name = "DescribeError";
  }
}

export class TerminationError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.TERMINATION, originalError);
    this.name = "TerminationError";
  }
}

export class InstanceProfileListError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.PROFILE_LIST, originalError);
    this.name = "InstanceProfileListError";
  }
}

export class InstanceProfileCreateError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.PROFILE_CREATE, originalError);
    this.name = "InstanceProfileCreateError";
  }
}

export class RoleAttachError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.ROLE_ATTACH, originalError);
    this.name = "RoleAttachError";
  }
}

export class AgentNotRegisteredError extends RunnerError {
  constructor(public readonly instanceId: string) {
    super(
      `SSM agent is not registered or online for instance ${instanceId}`,
      RunnerErrorCode.AGENT_NOT_REGISTERED
    );
    this.name = "AgentNotRegisteredError";
  }
}

export class DispatchError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.DISPATCH, originalError);
    this.name = "DispatchError";
  }
}

export class CommandInvocationError extends RunnerError {
  constructor(message: string, originalError?: unknown) {
    super(message, RunnerErrorCode.COMMAND_INVOCATION, originalError);
    this.name = "CommandInvocationError";
  }
}

export class TimeoutError extends RunnerError {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message, RunnerErrorCode.TIMEOUT);
    this.name = "TimeoutError";
  }
}

/**
 * Name of an SDK error (`InvalidInstanceID.NotFound`, `AccessDenied`, ...).
 * AWS SDK v3 exceptions carry the service error code in `name`.
 */
export function awsErrorName(error: unknown): string {
  if (error instanceof Error) return error.name;
  return "";
}

/**
 * Render any thrown value as a single log line.
 */
export function describeError(error: unknown): string {
  if (!(error instanceof Error)) return String(error);
  if (error instanceof RunnerError && error.originalError instanceof Error) {
    const cause = error.originalError;
    return `${error.message}: ${cause.name}: ${cause.message}`;
  }
  return error.message;
}
