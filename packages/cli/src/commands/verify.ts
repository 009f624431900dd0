/**
 * tapir verify — check the filesystem against a manifest
 *
 * Usage:
 *   tapir verify <manifest> [--root <dir>] [--json]
 *
 * Exits 0 when every entry matches, 1 on any drift or unreadable file,
 * 2 when the manifest itself cannot be used.
 */

import { Command } from 'commander';
import { verifyManifest } from '@tapir/runtime-host';
import { EXIT } from '../exit-codes.js';
import type { ExitCode } from '../exit-codes.js';
import { renderVerifyReport, verifyJson } from '../output/render.js';
import { defaultContext, logSinkFor, reportFailure, resolveFromFlags, withInterrupt } from './shared.js';
import type { CommandContext, CommonFlags } from './shared.js';

export interface VerifyFlags extends CommonFlags {
  root?: string;
}

export async function runVerify(
  manifest: string,
  flags: VerifyFlags,
  ctx: CommandContext = defaultContext(),
): Promise<ExitCode> {
  const json = flags.json === true;
  try {
    const config = resolveFromFlags(flags, ctx);
    const result = await verifyManifest({
      manifestPath: manifest,
      root: flags.root,
      cwd: ctx.cwd,
      concurrency: config.concurrency,
      chunkSize: config.chunkSize,
      signal: ctx.signal,
      logSink: logSinkFor(config, ctx.cwd),
    });

    ctx.io.stdout(json ? verifyJson(result) : renderVerifyReport(result));
    return result.clean ? EXIT.OK : EXIT.ISSUES;
  } catch (err: unknown) {
    return reportFailure(err, json, ctx.io);
  }
}

export const verifyCommand = new Command('verify')
  .description('Check files against a SHA-256 manifest and report drift')
  .argument('<manifest>', 'Manifest file written by `tapir compute`')
  .option('--root <dir>', 'Also scan this directory for files the manifest does not list')
  .option('--concurrency <n>', 'Files hashed in parallel')
  .option('--chunk-size <bytes>', 'Read size per hash chunk')
  .option('--log-file <file>', 'Append a JSONL run log to this file')
  .option('--json', 'Output as JSON')
  .action(async (manifest: string, options: VerifyFlags) => {
    await withInterrupt((signal) => runVerify(manifest, options, defaultContext(signal)));
  });
