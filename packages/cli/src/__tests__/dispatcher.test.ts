import { dispatch } from "../dispatcher";
import { parseInputs, type RawInputs } from "../inputs";
import {
  MalformedTagSpecError,
  MissingParameterError,
  UnsupportedModeError,
  type CommandInvocation,
  type InstanceState,
  type ProvisionSpec,
  type RunnerLogger,
  type RunnerServices,
  type WaitOptions,
} from "@ec2-runner/adapters-common";

function createLogger() {
  return {
    info: jest.fn<void, [string]>(),
    warning: jest.fn<void, [string]>(),
    debug: jest.fn<void, [string]>(),
    group<T>(_name: string, fn: () => Promise<T>): Promise<T> {
      return fn();
    },
  } satisfies RunnerLogger;
}

function createServices() {
  const invocation: CommandInvocation = {
    commandId: "cmd-1",
    instanceId: "i-1",
    status: "Success",
    responseCode: 0,
    standardOutput: "hi\n",
    standardError: "",
  };

  return {
    instances: {
      validateProvisionSpec: jest.fn<void, [ProvisionSpec]>(),
      provision: jest
        .fn<Promise<string>, [ProvisionSpec]>()
        .mockResolvedValue("i-0abc"),
      describeState: jest.fn<Promise<InstanceState | undefined>, [string]>(),
      waitRunning: jest
        .fn<Promise<void>, [string, WaitOptions?]>()
        .mockResolvedValue(undefined),
      terminate: jest
        .fn<Promise<void>, [string]>()
        .mockResolvedValue(undefined),
    },
    profiles: {
      getOrCreate: jest
        .fn<Promise<string>, [string]>()
        .mockImplementation(async (role) => role),
    },
    commands: {
      isAgentRegistered: jest.fn<Promise<boolean>, [string, WaitOptions?]>(),
      execute: jest
        .fn<
          Promise<CommandInvocation>,
          [string, string, number, AbortSignal?]
        >()
        .mockResolvedValue(invocation),
    },
  } satisfies RunnerServices;
}

const START: RawInputs = {
  mode: "start",
  "ec2-image-id": "ami-1",
  "subnet-id": "subnet-1",
  "security-group-id": "sg-1",
};

describe("dispatch", () => {
  let services: ReturnType<typeof createServices>;
  let logger: ReturnType<typeof createLogger>;

  const totalCalls = () =>
    [
      services.instances.provision,
      services.instances.describeState,
      services.instances.waitRunning,
      services.instances.terminate,
      services.profiles.getOrCreate,
      services.commands.isAgentRegistered,
      services.commands.execute,
      services.instances.validateProvisionSpec,
    ].reduce((sum, fn) => sum + fn.mock.calls.length, 0);

  beforeEach(() => {
    services = createServices();
    logger = createLogger();
  });

  // ── start ───────────────────────────────────────────────────────────

  describe("start", () => {
    it("provisions once, waits for running and emits the instance id", async () => {
      const outputs = await dispatch(parseInputs(START), services, logger);

      expect(outputs).toEqual({ "ec2-instance-id": "i-0abc" });
      expect(services.instances.provision).toHaveBeenCalledTimes(1);
      expect(services.instances.provision).toHaveBeenCalledWith({
        imageId: "ami-1",
        subnetId: "subnet-1",
        securityGroupIds: ["sg-1"],
        instanceType: "t3.micro",
        userData: undefined,
        tagSpecifications: undefined,
        instanceProfileName: undefined,
      });
      expect(services.instances.waitRunning).toHaveBeenCalledWith("i-0abc", {
        timeoutMs: 600_000,
        signal: undefined,
      });
      expect(services.profiles.getOrCreate).not.toHaveBeenCalled();
    });

    it("waits for running only after provisioning", async () => {
      const order: string[] = [];
      services.instances.provision.mockImplementation(async () => {
        order.push("provision");
        return "i-0abc";
      });
      services.instances.waitRunning.mockImplementation(async () => {
        order.push("waitRunning");
      });

      await dispatch(parseInputs(START), services, logger);

      expect(order).toEqual(["provision", "waitRunning"]);
    });

    it("resolves the instance profile before provisioning when a role is given", async () => {
      services.profiles.getOrCreate.mockResolvedValue("shared-profile");

      await dispatch(
        parseInputs({ ...START, "iam-role-name": "ci-runner" }),
        services,
        logger
      );

      expect(services.profiles.getOrCreate).toHaveBeenCalledWith("ci-runner");
      expect(services.instances.provision).toHaveBeenCalledWith(
        expect.objectContaining({ instanceProfileName: "shared-profile" })
      );
    });

    it("passes instance type, user data, tags and timeout through", async () => {
      const signal = new AbortController().signal;
      const inputs = parseInputs({
        ...START,
        "ec2-instance-type": "c6i.large",
        "user-data": "#!/bin/bash\necho hello",
        "tag-specifications":
          '[{"ResourceType":"instance","Tags":[{"Key":"Name","Value":"ci"}]}]',
        "instance-running-timeout-secs": "120",
      });

      await dispatch(inputs, services, logger, signal);

      expect(services.instances.provision).toHaveBeenCalledWith(
        expect.objectContaining({
          instanceType: "c6i.large",
          userData: "#!/bin/bash\necho hello",
          tagSpecifications: [
            { resourceType: "instance", tags: [{ key: "Name", value: "ci" }] },
          ],
        })
      );
      expect(services.instances.waitRunning).toHaveBeenCalledWith("i-0abc", {
        timeoutMs: 120_000,
        signal,
      });
    });

    it("rejects malformed tag specifications before any call", async () => {
      const inputs = parseInputs({
        ...START,
        "iam-role-name": "ci-runner",
        "tag-specifications": "[{",
      });

      await expect(dispatch(inputs, services, logger)).rejects.toBeInstanceOf(
        MalformedTagSpecError
      );
      expect(totalCalls()).toBe(0);
    });

    it("validates the launch spec before touching the instance profile", async () => {
      services.instances.validateProvisionSpec.mockImplementation(() => {
        throw new MalformedTagSpecError('unknown resource type "instnce"');
      });
      const inputs = parseInputs({
        ...START,
        "iam-role-name": "ci-runner",
        "tag-specifications": '[{"ResourceType":"instnce","Tags":[]}]',
      });

      await expect(dispatch(inputs, services, logger)).rejects.toBeInstanceOf(
        MalformedTagSpecError
      );
      expect(services.instances.validateProvisionSpec).toHaveBeenCalledWith(
        expect.objectContaining({
          tagSpecifications: [{ resourceType: "instnce", tags: [] }],
        })
      );
      expect(services.profiles.getOrCreate).not.toHaveBeenCalled();
      expect(services.instances.provision).not.toHaveBeenCalled();
    });

    it("lists every missing start parameter", async () => {
      const inputs = parseInputs({ mode: "start", "ec2-image-id": "ami-1" });

      await expect(dispatch(inputs, services, logger)).rejects.toThrow(
        "Required parameters (subnet-id, security-group-id) are missing for mode 'start'."
      );
      expect(totalCalls()).toBe(0);
    });
  });

  // ── command ─────────────────────────────────────────────────────────

  describe("command", () => {
    const COMMAND: RawInputs = {
      mode: "command",
      "ec2-instance-id": "i-1",
      command: "echo hi",
      "command-max-wait-secs": "60",
    };

    it("executes once and emits the invocation outputs", async () => {
      const signal = new AbortController().signal;

      const outputs = await dispatch(
        parseInputs(COMMAND),
        services,
        logger,
        signal
      );

      expect(services.commands.execute).toHaveBeenCalledTimes(1);
      expect(services.commands.execute).toHaveBeenCalledWith(
        "i-1",
        "echo hi",
        60,
        signal
      );
      expect(outputs).toEqual({
        "command-id": "cmd-1",
        "command-status": "Success",
        "command-response-code": "0",
      });
    });

    it("emits a failed command without raising", async () => {
      services.commands.execute.mockResolvedValue({
        commandId: "cmd-2",
        instanceId: "i-1",
        status: "Failed",
        responseCode: 127,
        standardOutput: "",
        standardError: "command not found",
      });

      const outputs = await dispatch(parseInputs(COMMAND), services, logger);

      expect(outputs).toEqual({
        "command-id": "cmd-2",
        "command-status": "Failed",
        "command-response-code": "127",
      });
    });

    it("uses the default wait when none is given", async () => {
      await dispatch(
        parseInputs({
          mode: "command",
          "ec2-instance-id": "i-1",
          command: "uptime",
        }),
        services,
        logger
      );

      expect(services.commands.execute).toHaveBeenCalledWith(
        "i-1",
        "uptime",
        300,
        undefined
      );
    });

    it("requires the command text", async () => {
      const inputs = parseInputs({ mode: "command", "ec2-instance-id": "i-1" });

      await expect(dispatch(inputs, services, logger)).rejects.toThrow(
        new MissingParameterError(["command"], "command")
      );
      expect(services.commands.execute).not.toHaveBeenCalled();
    });

    it("propagates collaborator errors unchanged", async () => {
      const failure = new Error("boom");
      services.commands.execute.mockRejectedValue(failure);

      await expect(
        dispatch(parseInputs(COMMAND), services, logger)
      ).rejects.toBe(failure);
    });
  });

  // ── stop ────────────────────────────────────────────────────────────

  describe("stop", () => {
    it("terminates once without polling", async () => {
      const outputs = await dispatch(
        parseInputs({ mode: "stop", "ec2-instance-id": "i-1" }),
        services,
        logger
      );

      expect(outputs).toEqual({});
      expect(services.instances.terminate).toHaveBeenCalledTimes(1);
      expect(services.instances.terminate).toHaveBeenCalledWith("i-1");
      expect(totalCalls()).toBe(1);
    });

    it("requires the instance id", async () => {
      await expect(
        dispatch(parseInputs({ mode: "stop" }), services, logger)
      ).rejects.toThrow(
        "Required parameter (ec2-instance-id) is missing for mode 'stop'."
      );
      expect(totalCalls()).toBe(0);
    });
  });

  // ── other modes ─────────────────────────────────────────────────────

  it("rejects an unsupported mode by name before any call", async () => {
    const promise = dispatch(parseInputs({ mode: "bogus" }), services, logger);

    await expect(promise).rejects.toBeInstanceOf(UnsupportedModeError);
    await expect(promise).rejects.toThrow(
      "Unsupported mode: bogus. Supported modes are 'start', 'command', and 'stop'."
    );
    expect(totalCalls()).toBe(0);
  });

  it("treats an empty mode as a missing parameter", async () => {
    await expect(dispatch(parseInputs({}), services, logger)).rejects.toThrow(
      "Required parameter (mode) is missing."
    );
  });
});
