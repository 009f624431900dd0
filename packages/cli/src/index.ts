/**
 * @tapir/cli
 *
 * The `tapir` command-line interface. Exposes the configured commander
 * program plus the command runners, which take an injectable context so
 * they can be driven without a process.
 */

export { program } from './commands/index.js';
export { computeCommand, filterFromFlags, runCompute } from './commands/compute.js';
export type { ComputeFlags } from './commands/compute.js';
export { runVerify, verifyCommand } from './commands/verify.js';
export type { VerifyFlags } from './commands/verify.js';
export type { CommandContext, CommonFlags } from './commands/shared.js';
export { EXIT, exitCodeFor } from './exit-codes.js';
export type { ExitCode } from './exit-codes.js';
export { BufferIO, processIO } from './output/io.js';
export type { CliIO } from './output/io.js';
