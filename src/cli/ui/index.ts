/**
 * CLI UI module exports
 */

export { color, createConsoleOutput, VERSION } from "./output";
export { createLinePrompter, createStdinPrompter, isCancel, promptPassword } from "./prompts";
