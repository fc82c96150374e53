import chalk from "chalk";

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  stdout?: LogSink;
  stderr?: LogSink;
  verbose?: boolean;
}

export interface Logger {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  fatal(message: string): void;
  debug(message: string): void;
  /** Plain output line on stdout, no prefix */
  print(line?: string): void;
  /** Plain line on stderr, for detail under an error */
  printError(line: string): void;
}

const writeStdout: LogSink = (line) => {
  process.stdout.write(`${line}\n`);
};

const writeStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

// Diagnostics go to stderr so that command output on stdout stays pipeable.
export function createLogger(options: LoggerOptions = {}): Logger {
  const stdout = options.stdout ?? writeStdout;
  const stderr = options.stderr ?? writeStderr;
  const verbose = options.verbose ?? false;

  return {
    info: (message) => stderr(chalk.blue(`ℹ️ INFO: ${message}`)),
    success: (message) => stdout(chalk.green(`✅ SUCCESS: ${message}`)),
    warn: (message) => stderr(chalk.yellow(`⚠️ WARN: ${message}`)),
    error: (message) => stderr(chalk.red(`❌ ERROR: ${message}`)),
    fatal: (message) => stderr(chalk.red(`💀 FATAL: ${message}`)),
    debug: (message) => {
      if (verbose) {
        stderr(chalk.dim(`[debug] ${message}`));
      }
    },
    print: (line = "") => stdout(line),
    printError: (line) => stderr(line),
  };
}

export const logger: Logger = createLogger();
