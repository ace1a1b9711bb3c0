/**
 * Line-oriented output for the command-line tools.
 *
 * Report lines are the user-facing record of a run (one per file or album,
 * then a summary) and are kept apart from the pino diagnostics.
 */
export interface Reporter {
  info(line: string): void;
  error(line: string): void;
}

export const consoleReporter: Reporter = {
  info: line => console.log(line),
  error: line => console.error(line)
};

/**
 * Reporter that keeps every line in memory
 */
export class BufferedReporter implements Reporter {
  public readonly lines: string[] = [];
  public readonly errors: string[] = [];

  info(line: string): void {
    this.lines.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }
}
