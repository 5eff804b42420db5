import { appendFileSync, mkdirSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import chalk from 'chalk';

export type LogLevel = 'INFO' | 'SUCCESS' | 'WARNING' | 'ERROR';

export interface ConsoleSink {
  out(line: string): void;
  err(line: string): void;
}

export interface RunLoggerOptions {
  clock?: () => Date;
  sink?: ConsoleSink;
}

const LEVEL_COLOURS: Record<LogLevel, (text: string) => string> = {
  INFO: chalk.blue,
  SUCCESS: chalk.green,
  WARNING: chalk.yellow,
  ERROR: chalk.red
};

const defaultSink: ConsoleSink = {
  out: line => console.log(line),
  err: line => console.error(line)
};

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local time as `YYYY-MM-DD HH:mm:ss` */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatLine(date: Date, level: LogLevel, message: string): string {
  return `[${formatTimestamp(date)}] [${level}] ${message}`;
}

/**
 * Writes every status line to the console and appends it to the run log.
 * The log file is only ever appended to after `reset()`.
 */
export class RunLogger {
  private readonly clock: () => Date;
  private readonly sink: ConsoleSink;

  constructor(readonly logFile: string, options: RunLoggerOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.sink = options.sink ?? defaultSink;
  }

  /** Truncate the log artifact at the start of a run */
  reset(): void {
    mkdirSync(dirname(this.logFile), { recursive: true });
    writeFileSync(this.logFile, '');
  }

  info(message: string): void {
    this.log('INFO', message);
  }

  success(message: string): void {
    this.log('SUCCESS', message);
  }

  warning(message: string): void {
    this.log('WARNING', message);
  }

  error(message: string): void {
    this.log('ERROR', message);
  }

  section(title: string): void {
    this.info(`=== ${title} ===`);
  }

  rule(): void {
    this.info('='.repeat(42));
  }

  /**
   * Tee raw command output (tables from `docker images`, `kubectl get pods`)
   * without a level prefix.
   */
  raw(text: string): void {
    const body = text.replace(/\s+$/, '');
    if (!body) {
      return;
    }
    this.sink.out(body);
    appendFileSync(this.logFile, `${body}\n`);
  }

  private log(level: LogLevel, message: string): void {
    const line = formatLine(this.clock(), level, message);
    const coloured = LEVEL_COLOURS[level](line);

    if (level === 'ERROR') {
      this.sink.err(coloured);
    } else {
      this.sink.out(coloured);
    }

    appendFileSync(this.logFile, `${line}\n`);
  }
}
