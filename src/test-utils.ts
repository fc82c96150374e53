import { createLogger, type Logger } from "./lib/logging.js";

export interface CapturedLogger {
  logger: Logger;
  stdout: string[];
  stderr: string[];
}

export function captureLogger(verbose = false): CapturedLogger {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const logger = createLogger({
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
    verbose,
  });
  return { logger, stdout, stderr };
}
