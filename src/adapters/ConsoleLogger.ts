import chalk from 'chalk';
import { Logger, LogLevel } from '../ports/Logger';

const levelPriorities: Record<LogLevel, number> = {
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const colors: Record<LogLevel, (text: string) => string> = {
  debug: chalk.gray,
  info: chalk.blue,
  warn: chalk.yellow,
  error: chalk.red,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  scope?: string;
  write?: (line: string) => void;
}

// stderr, so command output on stdout stays clean.
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly write: (line: string) => void;

  constructor(private readonly options: ConsoleLoggerOptions = {}) {
    this.minLevel = options.level ?? 'info';
    this.write = options.write ?? ((line) => console.error(line));
  }

  private log(level: LogLevel, message: string, context?: object) {
    if (levelPriorities[level] < levelPriorities[this.minLevel]) {
      return;
    }

    const scope = this.options.scope ? `[${this.options.scope}] ` : '';
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    this.write(colors[level](`${level.toUpperCase()} ${scope}${message}${suffix}`));
  }

  debug(message: string, context?: object) { this.log('debug', message, context); }
  info(message: string, context?: object) { this.log('info', message, context); }
  warn(message: string, context?: object) { this.log('warn', message, context); }
  error(message: string, context?: object) { this.log('error', message, context); }

  child(scope: string): Logger {
    const nested = this.options.scope ? `${this.options.scope}:${scope}` : scope;
    return new ConsoleLogger({ ...this.options, scope: nested });
  }
}
