/**
 * Constants Module
 *
 * Re-exports poll timings and default values.
 */

export * from "./timeouts";
export * from "./defaults";
