import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

let currentLevel: LogLevel = 'info';
let jsonMode = false;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function setJsonMode(enabled: boolean): void {
  jsonMode = enabled;
}

export function isJsonMode(): boolean {
  return jsonMode;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMessage(level: LogLevel, message: string, data?: Record<string, unknown>): string {
  if (jsonMode) {
    return JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...data,
    });
  }

  // Only debug lines carry the clock time
  const prefix = {
    debug: chalk.gray(`[${new Date().toLocaleTimeString()}] debug`),
    info: chalk.blue('info'),
    warn: chalk.yellow('warn'),
    error: chalk.red('error'),
  }[level];

  let output = `${prefix} ${message}`;
  if (data) {
    output += ` ${chalk.gray(JSON.stringify(data))}`;
  }
  return output;
}

export function debug(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('debug')) {
    console.log(formatMessage('debug', message, data));
  }
}

export function info(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('info')) {
    console.log(formatMessage('info', message, data));
  }
}

export function warn(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('warn')) {
    console.warn(formatMessage('warn', message, data));
  }
}

export function error(message: string, data?: Record<string, unknown>): void {
  if (shouldLog('error')) {
    console.error(formatMessage('error', message, data));
  }
}

// Per-row problems found while reading a workbook
export function row(kind: 'skipped' | 'invalid', rowNumber: number, message: string): void {
  if (jsonMode) {
    warn(message, { row: rowNumber, kind });
  } else if (shouldLog('warn')) {
    const marker = kind === 'skipped' ? chalk.yellow('•') : chalk.red('•');
    console.warn(`  ${marker} ${chalk.dim(`Row ${rowNumber}:`)} ${message}`);
  }
}

export const logger = {
  debug,
  info,
  warn,
  error,
  row,
};
