/**
 * Default values for runner operations.
 */

// The action metadata declares t3.micro; the same value is the fallback
// when the input is left empty.
export const DEFAULT_INSTANCE_TYPE = "t3.micro";

// SSM
export const RUN_SHELL_SCRIPT_DOCUMENT = "AWS-RunShellScript";

// Command output at or above this length is only printed at debug level
export const OUTPUT_DISPLAY_LIMIT = 1000;
