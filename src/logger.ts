// Node.js built-in modules
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

// Third-party dependencies
import chalk from 'chalk';

// Local imports
import { errorMessage } from './utils';

// Log levels
export enum LogLevel {
  INFO = 'INFO',
  SUCCESS = 'SUCCESS',
  WARNING = 'WARNING',
  ERROR = 'ERROR',
  DEBUG = 'DEBUG',
}

export interface LoggerOptions {
  container: string;
  bucket: string;
  verbose?: boolean;
  logFile?: string;
}

let options: LoggerOptions | null = null;
let logStream: fs.WriteStream | null = null;
let executionId = generateExecutionId();

/**
 * Generate a unique execution ID
 */
function generateExecutionId(): string {
  const timestamp = Date.now();
  const random = Math.floor(Math.random() * 10000);
  return `${timestamp}-${random}`;
}

/**
 * Default log file name, e.g. 2024-05-01_13-45-10_photos_to_photo-archive.log
 */
export function defaultLogFileName(container: string, bucket: string, date = new Date()): string {
  const pad = (value: number): string => value.toString().padStart(2, '0');
  const timestamp = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`
    + `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
  return `${timestamp}_${container}_to_${bucket}.log`;
}

/**
 * Initialize the logger for a transfer run
 */
export function initLogger(loggerOptions: LoggerOptions): void {
  options = loggerOptions;
  executionId = generateExecutionId();

  if (!options.logFile) {
    return;
  }

  try {
    const logDir = path.dirname(options.logFile);

    // Create directory if it doesn't exist
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    // Open log file for writing (append mode)
    logStream = fs.createWriteStream(options.logFile, { flags: 'a' });

    const timestamp = new Date().toISOString();
    const processInfo = `PID: ${process.pid}, User: ${process.env.USERNAME || process.env.USER || 'unknown'}`;
    const systemInfo = `OS: ${os.platform()} ${os.release()}, Hostname: ${os.hostname()}`;

    logStream.write('\n');
    logStream.write('='.repeat(80) + '\n');
    logStream.write(`== SWIFT TO S3 TRANSFER STARTED AT ${timestamp} ==\n`);
    logStream.write(`== Execution ID: ${executionId} ==\n`);
    logStream.write(`== ${processInfo} ==\n`);
    logStream.write(`== ${systemInfo} ==\n`);
    logStream.write('='.repeat(80) + '\n\n');

    log(LogLevel.INFO, `Source container: ${options.container}`, true);
    log(LogLevel.INFO, `Target bucket: ${options.bucket}`, true);
  } catch (error) {
    console.error(chalk.red(`Failed to open log file: ${errorMessage(error)}`));
    // Continue without file logging
  }
}

/**
 * Close the logger and release resources
 */
export function closeLogger(): void {
  if (logStream) {
    const timestamp = new Date().toISOString();

    logStream.write('\n');
    logStream.write('='.repeat(80) + '\n');
    logStream.write(`== SWIFT TO S3 TRANSFER COMPLETED AT ${timestamp} ==\n`);
    logStream.write(`== Execution ID: ${executionId} ==\n`);
    logStream.write('='.repeat(80) + '\n');

    logStream.end();
    logStream = null;
  }
  options = null;
}

/**
 * Log a message with the specified level
 */
export function log(level: LogLevel, message: string, skipConsole = false): void {
  const timestamp = new Date().toISOString();
  const logMessage = `[${timestamp}] [${level}] [${executionId}] ${message}`;

  if (logStream) {
    logStream.write(logMessage + '\n');
  }

  if (skipConsole) {
    return;
  }

  // Debug lines reach the console in verbose mode only
  if (level === LogLevel.DEBUG && !options?.verbose) {
    return;
  }

  let consoleMessage: string;

  switch (level) {
    case LogLevel.INFO:
      consoleMessage = chalk.blue(`[INFO] ${message}`);
      break;
    case LogLevel.SUCCESS:
      consoleMessage = chalk.green(`[SUCCESS] ${message}`);
      break;
    case LogLevel.WARNING:
      consoleMessage = chalk.yellow(`[WARNING] ${message}`);
      break;
    case LogLevel.ERROR:
      consoleMessage = chalk.red(`[ERROR] ${message}`);
      break;
    case LogLevel.DEBUG:
      consoleMessage = chalk.gray(`[DEBUG] ${message}`);
      break;
    default:
      consoleMessage = message;
  }

  console.log(consoleMessage);
}

/**
 * Log an error with optional error object details
 */
export function logError(message: string, error?: unknown): void {
  log(LogLevel.ERROR, message);

  if (!(error instanceof Error)) {
    return;
  }

  const errorDetails = `${error.name}: ${error.message}\n${error.stack || '(No stack trace)'}`;

  // Always log error details to file
  if (logStream) {
    logStream.write(`[${new Date().toISOString()}] [ERROR_DETAILS] [${executionId}] ${errorDetails}\n`);
  }

  if (options?.verbose) {
    console.log(chalk.red(errorDetails));
  }
}

export function logVerbose(message: string): void {
  log(LogLevel.DEBUG, message);
}

export function logSuccess(message: string): void {
  log(LogLevel.SUCCESS, message);
}

export function logWarning(message: string): void {
  log(LogLevel.WARNING, message);
}

/**
 * Log an info message, optionally printed in a custom color.
 * The log file always receives the plain text.
 */
export function logInfo(message: string, color?: (message: string) => string): void {
  if (!color) {
    log(LogLevel.INFO, message);
    return;
  }

  log(LogLevel.INFO, message, true);
  console.log(color(message));
}
