// Component-tagged console logger, optionally copied to a log file.
//   const logger = createLogger('Inventory API');
//   logger.info('Fetched 3 warehouses');   // → [Inventory API] Fetched 3 warehouses

import { format } from 'util';

export type LogLevel = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface Logger {
  debug: (msg: string, ...args: unknown[]) => void;
  info: (msg: string, ...args: unknown[]) => void;
  warn: (msg: string, ...args: unknown[]) => void;
  error: (msg: string, ...args: unknown[]) => void;
  critical: (msg: string, ...args: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
  CRITICAL: 50
};

let currentLevel: LogLevel = 'INFO';

export interface LogSink {
  write(line: string): void;
}

let fileSink: LogSink | undefined;

export function parseLogLevel(value: string): LogLevel | undefined {
  const upper = value.trim().toUpperCase();
  if (upper === 'WARN') return 'WARNING';
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARNING' || upper === 'ERROR' || upper === 'CRITICAL') {
    return upper;
  }
  return undefined;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function setLogFile(sink: LogSink | undefined): void {
  fileSink = sink;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function toFile(level: LogLevel, component: string, msg: string, args: unknown[]): void {
  fileSink?.write(`${new Date().toISOString()} - ${component} - ${level} - ${format(msg, ...args)}`);
}

export function createLogger(component: string): Logger {
  const tag = `[${component}]`;
  return {
    debug(msg, ...args) {
      if (!enabled('DEBUG')) return;
      console.debug(`${tag} ${msg}`, ...args);
      toFile('DEBUG', component, msg, args);
    },
    info(msg, ...args) {
      if (!enabled('INFO')) return;
      console.log(`${tag} ${msg}`, ...args);
      toFile('INFO', component, msg, args);
    },
    warn(msg, ...args) {
      if (!enabled('WARNING')) return;
      console.warn(`${tag} ${msg}`, ...args);
      toFile('WARNING', component, msg, args);
    },
    error(msg, ...args) {
      if (!enabled('ERROR')) return;
      console.error(`${tag} ${msg}`, ...args);
      toFile('ERROR', component, msg, args);
    },
    critical(msg, ...args) {
      if (!enabled('CRITICAL')) return;
      console.error(`${tag} CRITICAL: ${msg}`, ...args);
      toFile('CRITICAL', component, msg, args);
    }
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
