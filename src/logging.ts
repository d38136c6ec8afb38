import pino, { type LevelWithSilent } from 'pino';

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function initialLevel(): LevelWithSilent {
  const fromEnv = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return LEVELS.find(l => l === fromEnv) ?? 'info';
}

// Log lines go to LOG_FILE when set so they don't interleave with the
// interactive prompts on stdout; otherwise to stderr.
const destination = process.env.LOG_FILE
  ? pino.destination({ dest: process.env.LOG_FILE, sync: true, mkdir: true })
  : pino.destination(2);

const logger = pino({ level: initialLevel(), base: null }, destination);

let runtimeLevel: LogLevel = (() => {
  const l = initialLevel();
  return l === 'debug' || l === 'warn' || l === 'error' ? l : 'info';
})();

export function setLogLevel(level: LogLevel) {
  runtimeLevel = level;
  logger.level = level;
}

export function getLogLevel() { return runtimeLevel; }

export function log(level: LogLevel, msg: string) {
  logger[level](msg);
}
