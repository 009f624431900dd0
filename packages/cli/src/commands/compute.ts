/**
 * tapir compute — hash files and directories into a manifest
 *
 * Usage:
 *   tapir compute <paths...> [-o <file>] [filters] [--json]
 *
 * Without --output the manifest text goes to stdout and the status line to
 * stderr, so the output can be redirected into a file. With --json the
 * records are printed as JSON instead of manifest text.
 */

import { Command } from 'commander';
import { ComputeFailedError, ConfigError, buildFileFilter } from '@tapir/kernel';
import type { PathPredicate } from '@tapir/kernel';
import { FileManifestSink, computeManifest, parseIntSetting } from '@tapir/runtime-host';
import { EXIT } from '../exit-codes.js';
import type { ExitCode } from '../exit-codes.js';
import { computeJson, renderComputeFailure, renderComputeSummary } from '../output/render.js';
import { defaultContext, logSinkFor, reportFailure, resolveFromFlags, withInterrupt } from './shared.js';
import type { CommandContext, CommonFlags } from './shared.js';

export interface ComputeFlags extends CommonFlags {
  output?: string;
  glob?: string;
  regex?: string;
  name?: string;
  minSize?: string;
  maxSize?: string;
  changedWithinDays?: string;
}

/**
 * Build the enumeration filter from the finder flags.
 *
 * @throws {ConfigError} If a size or day count is not a non-negative
 *   integer, or --regex does not compile
 */
export function filterFromFlags(flags: ComputeFlags, now: number): PathPredicate | null {
  const int = (value: string | undefined, flag: string): number | undefined =>
    value !== undefined ? parseIntSetting(value, flag, { min: 0 }) : undefined;

  const minSize = int(flags.minSize, '--min-size');
  const maxSize = int(flags.maxSize, '--max-size');
  const changedWithinDays = int(flags.changedWithinDays, '--changed-within-days');

  if (flags.regex !== undefined) {
    try {
      new RegExp(flags.regex);
    } catch (err: unknown) {
      throw new ConfigError(`--regex is not a valid regular expression: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  return buildFileFilter(
    { name: flags.name, glob: flags.glob, regex: flags.regex, minSize, maxSize, changedWithinDays },
    now,
  );
}

export async function runCompute(
  paths: ReadonlyArray<string>,
  flags: ComputeFlags,
  ctx: CommandContext = defaultContext(),
): Promise<ExitCode> {
  const json = flags.json === true;
  try {
    const config = resolveFromFlags(flags, ctx);
    const filter = filterFromFlags(flags, ctx.now);
    const sink = flags.output !== undefined ? new FileManifestSink(flags.output, ctx.cwd) : undefined;

    const result = await computeManifest({
      inputs: paths,
      sink,
      cwd: ctx.cwd,
      concurrency: config.concurrency,
      chunkSize: config.chunkSize,
      filter,
      signal: ctx.signal,
      logSink: logSinkFor(config, ctx.cwd),
    });

    if (json) {
      ctx.io.stdout(computeJson(result));
    } else {
      if (sink === undefined) ctx.io.stdout(result.text);
      ctx.io.stderr(renderComputeSummary(result));
    }
    return EXIT.OK;
  } catch (err: unknown) {
    if (err instanceof ComputeFailedError && !json) {
      ctx.io.stderr(renderComputeFailure(err));
      return EXIT.ISSUES;
    }
    return reportFailure(err, json, ctx.io);
  }
}

export const computeCommand = new Command('compute')
  .description('Hash files and directories into a SHA-256 manifest')
  .argument('<paths...>', 'Files and/or directories to hash, in manifest order')
  .option('-o, --output <file>', 'Write the manifest to this file instead of stdout')
  .option('--concurrency <n>', 'Files hashed in parallel')
  .option('--chunk-size <bytes>', 'Read size per hash chunk')
  .option('--glob <pattern>', 'Only files matching this glob (file name, or path if it contains /)')
  .option('--regex <pattern>', 'Only files whose name matches this regular expression')
  .option('--name <name>', 'Only files with exactly this name')
  .option('--min-size <bytes>', 'Only files at least this large')
  .option('--max-size <bytes>', 'Only files at most this large')
  .option('--changed-within-days <n>', 'Only files modified in the last n days')
  .option('--log-file <file>', 'Append a JSONL run log to this file')
  .option('--json', 'Output as JSON')
  .action(async (paths: string[], options: ComputeFlags) => {
    await withInterrupt((signal) => runCompute(paths, options, defaultContext(signal)));
  });
