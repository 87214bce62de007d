/**
 * Output channels used by commands. Commands never touch `process` directly so tests can
 * capture everything they print.
 */
export interface CliIo {
  readonly stdout: NodeJS.WritableStream;
  readonly stderr: NodeJS.WritableStream;

  writeOut(chunk: string): void;
  writeErr(chunk: string): void;
  exit(code: number): never;
}
