import ora from 'ora';

import type { ScoredProvider } from './types';

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const COLORS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};

const RESET = '\x1b[0m';

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

const write = (level: Exclude<LogLevel, 'silent'>, message: string) => {
  if (LEVELS[level] < LEVELS[currentLevel()]) return;
  const line = `${COLORS[level]}[${level}]${RESET} ${message}`;
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

export const log = {
  debug: (message: string) => write('debug', message),
  info: (message: string) => write('info', message),
  warn: (message: string) => write('warn', message),
  error: (message: string) => write('error', message),
};

export const showLoader = (text: string) => {
  const spinner = ora({
    text,
    color: 'cyan',
    isSilent: currentLevel() === 'silent',
  }).start();

  return {
    stop: () => spinner.stop(),
    succeed: (text?: string) => spinner.succeed(text),
    fail: (text?: string) => spinner.fail(text),
    update: (text: string) => (spinner.text = text),
  };
};

export const logProvider = (row: ScoredProvider) => {
  const colour = row.Status === 'ok' || row.Status === 'cached' ? '\x1b[32m' : '\x1b[33m';
  console.log(
    `${colour}#${row.Rank}${RESET} ${row.Name}  score=${row.Score}  type=${row.Type}  ` +
      `mandarin=${row.Mandarin} meals=${row.MealsProvided} diversity=${row.CulturalDiversity}  ` +
      `(${row.Status})`
  );
};
