import chalk from "chalk";

export interface Logger {
  title(message: string): void;
  notice(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  // Send every line to stderr, keeping stdout for machine-readable output.
  stderrOnly?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const debugEnabled = options.debug ?? false;
  const out = (line: string) =>
    options.stderrOnly ? console.error(line) : console.log(line);
  const err = (line: string) => console.error(line);

  return {
    title: (message) => out(chalk.bold(message)),
    notice: (message) => out(chalk.green(message)),
    info: (message) => out(message),
    warn: (message) => err(chalk.yellow(`⚠️  ${message}`)),
    error: (message) => err(chalk.red(`❌ ${message}`)),
    debug: (message) => {
      if (debugEnabled) {
        out(chalk.gray(message));
      }
    },
  };
}

/** Logger that records lines instead of printing them. */
export function createMemoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  const record = (level: string) => (message: string) => {
    lines.push(`${level}: ${message}`);
  };
  return {
    lines,
    title: record("title"),
    notice: record("notice"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    debug: record("debug"),
  };
}
