/**
 * Section Scout Logger - structured component logging
 * Levels, colors, and optional session file output
 */

import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

interface LogEntry {
  timestamp: string;
  level: string;
  component: string;
  message: string;
  data?: unknown;
}

const LEVEL_STYLES: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.dim,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
};

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

class Logger {
  private minLevel: LogLevel;
  private logDir: string | null;
  private logFile: string | null = null;
  private logBuffer: LogEntry[] = [];

  constructor() {
    this.minLevel = parseLogLevel(process.env.LOG_LEVEL);
    this.logDir = process.env.LOG_DIR ? path.resolve(process.env.LOG_DIR) : null;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Start a new log session with a timestamped file.
   * No-op unless a log directory is configured.
   */
  startSession(name: string = 'session', logDir: string | null = this.logDir): void {
    this.logDir = logDir;
    if (!this.logDir) return;

    fs.mkdirSync(this.logDir, { recursive: true });
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
    this.logFile = path.join(this.logDir, `${name}-${timestamp}.log`);
    this.logBuffer = [];
    this.info('Logger', `Session started: ${this.logFile}`);
  }

  private formatTime(): string {
    return new Date().toISOString().substring(11, 23); // HH:MM:SS.mmm
  }

  private log(level: LogLevel, component: string, message: string, data?: unknown): void {
    if (level < this.minLevel) return;

    const timestamp = this.formatTime();
    const levelName = LEVEL_NAMES[level];
    const style = LEVEL_STYLES[level];

    const line = `${chalk.dim(timestamp)} ${style(levelName.padEnd(5))} ${chalk.cyan(`[${component}]`)} ${message}`;
    if (level >= LogLevel.WARN) {
      console.error(line);
    } else {
      console.log(line);
    }

    if (data !== undefined && this.minLevel === LogLevel.DEBUG) {
      console.log(chalk.dim(`  └─ ${JSON.stringify(data, null, 2).split('\n').join('\n     ')}`));
    }

    if (this.logFile) {
      this.logBuffer.push({ timestamp, level: levelName, component, message, data });
    }
  }

  debug(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, component, message, data);
  }

  info(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.INFO, component, message, data);
  }

  warn(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.WARN, component, message, data);
  }

  error(component: string, message: string, data?: unknown): void {
    this.log(LogLevel.ERROR, component, message, data);
  }

  /**
   * Log a summary table
   */
  summary(title: string, data: Record<string, number | string>): void {
    console.log(`\n${chalk.cyan(`╭${'─'.repeat(48)}╮`)}`);
    console.log(`${chalk.cyan('│')} ${chalk.green(title.padEnd(47))}${chalk.cyan('│')}`);
    console.log(chalk.cyan(`├${'─'.repeat(48)}┤`));

    for (const [key, value] of Object.entries(data)) {
      const valueStr = typeof value === 'number' ? value.toLocaleString() : value;
      console.log(`${chalk.cyan('│')}  ${key.padEnd(25)} ${String(valueStr).padStart(20)} ${chalk.cyan('│')}`);
    }

    console.log(`${chalk.cyan(`╰${'─'.repeat(48)}╯`)}\n`);
  }

  /**
   * Flush log buffer to file
   */
  flush(): void {
    if (this.logFile && this.logBuffer.length > 0) {
      const content = this.logBuffer
        .map(entry =>
          `${entry.timestamp} [${entry.level}] [${entry.component}] ${entry.message}${entry.data !== undefined ? ' ' + JSON.stringify(entry.data) : ''}`,
        )
        .join('\n');
      fs.appendFileSync(this.logFile, content + '\n');
      this.logBuffer = [];
    }
  }
}

// Singleton instance
export const logger = new Logger();
