/**
 * Where CLI output goes. Commands never touch console or process directly,
 * so tests can capture both streams and the exit code.
 */
export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  exit(code: number): void;
}

export const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  exit: code => { process.exitCode = code; },
};
