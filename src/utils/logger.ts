// Minimal leveled logger; everything goes to stderr so stdout stays the rendered tree
import { LOGGING } from '../constants';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

type Primitive = string | number | boolean | undefined | null | bigint | symbol;
type SerializableObject = Record<string, unknown>;
type LogValue = Primitive | Error | SerializableObject | Array<Primitive | SerializableObject>;
type LogArg = LogValue;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function initialLevel(): LogLevel {
  const fromEnv = typeof process !== 'undefined' ? process.env[LOGGING.ENV_VAR] : undefined;
  return isLogLevel(fromEnv) ? fromEnv : LOGGING.DEFAULT_LEVEL;
}

let currentLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

const emit = (level: Exclude<LogLevel, 'silent'>) => (...args: LogArg[]): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
  console.error(`${LOGGING.PREFIX}[${level}]`, ...args);
};

export const logger = {
  debug: emit('debug'),
  info: emit('info'),
  warn: emit('warn'),
  error: emit('error'),
};
