import type { OptionValues } from "commander";
import { createProgram } from "../program";

describe("createProgram", () => {
  let action: jest.Mock<Promise<void>, [string | undefined, OptionValues]>;

  beforeEach(() => {
    action = jest
      .fn<Promise<void>, [string | undefined, OptionValues]>()
      .mockResolvedValue(undefined);
  });

  it("passes the mode and flags to the action", async () => {
    const program = createProgram(action);

    await program.parseAsync(
      ["start", "--ec2-image-id", "ami-1", "--security-group-id", "sg-1,sg-2"],
      { from: "user" }
    );

    expect(action).toHaveBeenCalledTimes(1);
    expect(action.mock.calls[0][0]).toBe("start");
    expect(action.mock.calls[0][1]).toEqual({
      ec2ImageId: "ami-1",
      securityGroupId: "sg-1,sg-2",
    });
  });

  it("leaves the mode undefined when it is not given", async () => {
    const program = createProgram(action);

    await program.parseAsync(["--ec2-instance-id", "i-1"], { from: "user" });

    expect(action.mock.calls[0][0]).toBeUndefined();
    expect(action.mock.calls[0][1]).toEqual({ ec2InstanceId: "i-1" });
  });

  it("stores --command under its own key", async () => {
    const program = createProgram(action);

    await program.parseAsync(
      ["command", "--command", "echo hi", "--command-max-wait-secs", "60"],
      { from: "user" }
    );

    expect(action.mock.calls[0][1]).toEqual({
      command: "echo hi",
      commandMaxWaitSecs: "60",
    });
  });

  it("rejects unknown flags", async () => {
    const program = createProgram(action);
    program.exitOverride();
    program.configureOutput({ writeErr: () => undefined });

    await expect(
      program.parseAsync(["stop", "--bogus"], { from: "user" })
    ).rejects.toMatchObject({ code: "commander.unknownOption" });
    expect(action).not.toHaveBeenCalled();
  });
});
