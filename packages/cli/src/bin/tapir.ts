#!/usr/bin/env node
/**
 * bin/tapir.ts — entry point for the `tapir` CLI command.
 *
 * tapir compute ./photos -o photos.sha256
 * tapir verify photos.sha256 --root ./photos
 */

import { program } from '../commands/index.js'

await program.parseAsync()
