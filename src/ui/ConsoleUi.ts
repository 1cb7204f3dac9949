import { Ui } from '../types/pipeline.types'

/** Anything lines can be written to, such as process.stdout */
export interface OutputStream {
  write (chunk: string): unknown
}

/**
 * Ui writing `==> <name>: <message>` lines.
 * Errors go to the error stream.
 */
export class ConsoleUi implements Ui {
  constructor (
    private readonly name: string,
    private readonly out: OutputStream = process.stdout,
    private readonly err: OutputStream = process.stderr
  ) {}

  say (message: string): void {
    this.out.write(`==> ${this.name}: ${message}\n`)
  }

  error (message: string): void {
    this.err.write(`==> ${this.name}: ${message}\n`)
  }
}
