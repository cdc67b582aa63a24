/**
 * Logger configuration using Pino
 * Structured JSON logs, or a one-line pretty format for terminals
 */
import pino from 'pino';
import pretty from 'pino-pretty';
import { logLevelSchema } from '../config/schema.js';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

interface LoggerOptions {
  level: LogLevel;
  pretty: boolean;
}

const levelSymbols: Record<string, string> = {
  fatal: '💀',
  error: '❌',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🔍',
  trace: '📝',
};

export const symbols = {
  success: '✅',
  error: '❌',
  warning: '⚠️',
  dns: '🌐',
  spf: '🔗',
  registrar: '🔌',
  bulk: '📦',
  startup: '🚀',
};

// Shown first, in this order, when present
const CONTEXT_ORDER = ['domain', 'operation', 'status', 'name', 'type', 'attempt', 'delayMs', 'count'];
const HIDDEN_KEYS = new Set(['level', 'time', 'pid', 'app', 'service', 'err', 'error', 'stack']);
const MAX_CONTEXT_FIELDS = 6;

function parseLevel(raw: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(raw?.toLowerCase());
  return parsed.success ? parsed.data : 'info';
}

function shorten(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

/**
 * Inline form of a context value; nested objects are left to the JSON output
 */
function inline(key: string, value: unknown): string | undefined {
  // Registrar ids, batch ids and chain labels are long random strings
  const max = key === 'id' || key.endsWith('Id') || key === 'label' ? 12 : 48;

  switch (typeof value) {
    case 'string':
      return value.length > 0 ? shorten(value, max) : undefined;
    case 'number':
    case 'boolean':
      return String(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.length > 3 ? `${value.length} items` : value.map((v) => inline(key, v) ?? '').join(', ');
      }
      return undefined;
    default:
      return undefined;
  }
}

function contextSuffix(log: Record<string, unknown>, messageKey: string): string {
  const keys = Object.keys(log).filter((k) => k !== messageKey && !HIDDEN_KEYS.has(k));
  const rank = (key: string): number => {
    const index = CONTEXT_ORDER.indexOf(key);
    return index < 0 ? CONTEXT_ORDER.length : index;
  };

  const parts = keys
    .sort((a, b) => rank(a) - rank(b))
    .flatMap((key) => {
      const value = inline(key, log[key]);
      return value === undefined ? [] : [`${key}=${value}`];
    })
    .slice(0, MAX_CONTEXT_FIELDS);

  return parts.length > 0 ? ` (${parts.join(', ')})` : '';
}

function prettyStream() {
  return pretty({
    colorize: true,
    translateTime: 'HH:MM:ss',
    ignore: 'app',
    hideObject: true,
    messageFormat: (log: Record<string, unknown>, messageKey: string) => {
      const symbol = levelSymbols[String(log['level'])] ?? 'ℹ️';
      const service = typeof log['service'] === 'string' ? `[${log['service']}] ` : '';
      return `${symbol} ${service}${String(log[messageKey])}${contextSuffix(log, messageKey)}`;
    },
    customPrettifiers: {
      level: () => '',
    },
  });
}

function buildLogger(options: LoggerOptions): pino.Logger {
  const config: pino.LoggerOptions = {
    level: options.level,
    base: { app: 'bulk-dns-manager' },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  return options.pretty && options.level !== 'silent' ? pino(config, prettyStream()) : pino(config);
}

export const logger = buildLogger({
  level: parseLevel(process.env['LOG_LEVEL']),
  pretty: process.env['LOG_PRETTY'] !== 'false',
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}

/**
 * Child logger tagged with a service name and any other bindings
 */
export function createChildLogger(bindings: Record<string, unknown>): pino.Logger {
  return logger.child(bindings);
}

export default logger;
