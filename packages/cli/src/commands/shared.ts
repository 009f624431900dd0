/**
 * Tapir CLI — shared command plumbing
 *
 * Pieces both commands need: the run context a test can override, config
 * resolution from flags, SIGINT wiring and the top-level error boundary.
 */

import { resolve } from 'node:path';
import { TapirError } from '@tapir/kernel';
import type { LogSink } from '@tapir/kernel';
import { FileLogSink, resolveTapirConfig } from '@tapir/runtime-host';
import type { TapirConfig } from '@tapir/runtime-host';
import { exitCodeFor } from '../exit-codes.js';
import type { ExitCode } from '../exit-codes.js';
import { processIO } from '../output/io.js';
import type { CliIO } from '../output/io.js';
import { errorJson, renderFatal } from '../output/render.js';

/** Everything a command reads from its process; overridable in tests. */
export interface CommandContext {
  readonly io: CliIO;
  readonly cwd: string;
  readonly env: Readonly<Record<string, string | undefined>>;
  /** Config file override; default is the OS location. */
  readonly configPath?: string | undefined;
  readonly signal?: AbortSignal | undefined;
  /** Clock for --changed-within-days, in milliseconds. */
  readonly now: number;
}

export function defaultContext(signal?: AbortSignal): CommandContext {
  return { io: processIO, cwd: process.cwd(), env: process.env, signal, now: Date.now() };
}

/** Flags every command takes. Commander hands them over as strings. */
export interface CommonFlags {
  concurrency?: string;
  chunkSize?: string;
  logFile?: string;
  json?: boolean;
}

export function resolveFromFlags(flags: CommonFlags, ctx: CommandContext): TapirConfig {
  return resolveTapirConfig({
    concurrency: flags.concurrency,
    chunkSize: flags.chunkSize,
    logFile: flags.logFile,
    env: ctx.env,
    configPath: ctx.configPath,
  });
}

/** A relative log file path is taken relative to the command's cwd. */
export function logSinkFor(config: TapirConfig, cwd: string): LogSink | undefined {
  return config.logFile !== null ? new FileLogSink(resolve(cwd, config.logFile)) : undefined;
}

/**
 * Report a TapirError that ended a run and pick the exit code. Anything
 * else is a bug and is re-thrown to commander.
 */
export function reportFailure(err: unknown, json: boolean, io: CliIO): ExitCode {
  if (!(err instanceof TapirError)) throw err;
  if (json) {
    io.stdout(errorJson(err));
  } else {
    io.stderr(renderFatal(err));
  }
  return exitCodeFor(err);
}

/**
 * Run `body` with an AbortSignal that fires on the first SIGINT. A second
 * SIGINT falls through to Node's default handler and kills the process.
 */
export async function withInterrupt(body: (signal: AbortSignal) => Promise<ExitCode>): Promise<void> {
  const controller = new AbortController();
  const onSigint = (): void => {
    process.removeListener('SIGINT', onSigint);
    controller.abort(new Error('SIGINT'));
  };
  process.on('SIGINT', onSigint);
  try {
    process.exitCode = await body(controller.signal);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}
