export const RUNNER_VERSION = "1.0.0";
