/**
 * Where command output goes. Commands write through a CliIO so tests can
 * capture what a real run would print.
 *
 * stdout carries data (manifest text, verify report, JSON); stderr carries
 * status lines, so `tapir compute dir > dir.sha256` stays clean.
 */

export interface CliIO {
  stdout(text: string): void
  stderr(text: string): void
}

export const processIO: CliIO = {
  stdout: (text) => { process.stdout.write(text) },
  stderr: (text) => { process.stderr.write(text) },
}

/** Collects output in memory. */
export class BufferIO implements CliIO {
  out = ''
  err = ''

  stdout(text: string): void {
    this.out += text
  }

  stderr(text: string): void {
    this.err += text
  }
}
