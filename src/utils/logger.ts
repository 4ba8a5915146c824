import chalk from 'chalk';
import * as fs from 'fs-extra';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

function parseLevel(value: string | undefined): LogLevel {
  const upper = (value || '').toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return LogLevel[upper];
  }
  return LogLevel.INFO;
}

class Logger {
  private logDir: string;
  private minLevel: LogLevel;
  private toFile: boolean;

  constructor() {
    this.logDir = process.env.LOG_DIR || path.join(process.cwd(), 'logs');
    this.minLevel = parseLevel(process.env.LOG_LEVEL);
    this.toFile = process.env.LOG_TO_FILE !== 'false';
    if (this.toFile) {
      fs.ensureDirSync(this.logDir);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
    const timestamp = new Date().toISOString();
    const formattedArgs = args.map(arg =>
      typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
    ).join(' ');
    return `[${timestamp}] [${level}] ${message} ${formattedArgs}`.trimEnd();
  }

  private writeToFile(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.toFile) return;
    const logFile = path.join(this.logDir, `${new Date().toISOString().split('T')[0]}.log`);
    const logMessage = this.formatMessage(level, message, ...args);
    fs.appendFileSync(logFile, logMessage + '\n');
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.DEBUG)) return;
    const formatted = this.formatMessage(LogLevel.DEBUG, message, ...args);
    console.log(chalk.gray(formatted));
    this.writeToFile(LogLevel.DEBUG, message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.INFO)) return;
    const formatted = this.formatMessage(LogLevel.INFO, message, ...args);
    console.log(chalk.blue(formatted));
    this.writeToFile(LogLevel.INFO, message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.enabled(LogLevel.WARN)) return;
    const formatted = this.formatMessage(LogLevel.WARN, message, ...args);
    console.log(chalk.yellow(formatted));
    this.writeToFile(LogLevel.WARN, message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    const formatted = this.formatMessage(LogLevel.ERROR, message, ...args);
    console.error(chalk.red(formatted));
    this.writeToFile(LogLevel.ERROR, message, ...args);
  }
}

export const logger = new Logger();
