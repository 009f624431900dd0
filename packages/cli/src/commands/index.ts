/**
 * commands/index.ts — Commander program, configured and exported without .parse().
 *
 * Imported by:
 *   src/bin/tapir.ts   (executable entry point)
 *   src/index.ts       (package entry)
 */

import { program } from 'commander'
import { computeCommand } from './compute.js'
import { verifyCommand } from './verify.js'

program
  .name('tapir')
  .description(
    'Tapir — compute SHA-256 manifests of files and directories and verify\n' +
    'the filesystem against them.',
  )
  .version('0.1.0')

program.addCommand(computeCommand)
program.addCommand(verifyCommand)

export { program }
