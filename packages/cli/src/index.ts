#!/usr/bin/env node

import { CommanderError } from "commander";
import chalk from "chalk";
import { describeError } from "@ec2-runner/adapters-common";
import { run } from "./commands/run";
import { createProgram } from "./program";

const program = createProgram((mode, flags) => run(mode, flags));

// commander has already printed usage errors, help and the version
program.exitOverride();

program.parseAsync().catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }
  console.error(chalk.red("Error:"), describeError(error));
  process.exitCode = 1;
});
