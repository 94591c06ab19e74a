import winston from 'winston';
import chalk from 'chalk';
import { env } from '../config';

const { combine, timestamp, printf, errors } = winston.format;

type LevelName = 'error' | 'warn' | 'info' | 'http' | 'debug';
type Colorizer = (text: string) => string;

const isLevelName = (level: string): level is LevelName =>
  level === 'error' || level === 'warn' || level === 'info' || level === 'http' || level === 'debug';

// Color definitions for different log levels
const levelColors: Record<LevelName, Colorizer> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.blue,
  http: chalk.magenta,
  debug: chalk.cyan,
};

const levelBrightColors: Record<LevelName, Colorizer> = {
  error: chalk.redBright,
  warn: chalk.yellowBright,
  info: chalk.blueBright,
  http: chalk.magentaBright,
  debug: chalk.cyanBright,
};

const levelIcons: Record<LevelName, string> = {
  error: '❌',
  warn: '⚠️ ',
  info: 'ℹ️ ',
  http: '🌐',
  debug: '🔍',
};

// Custom colorized format for console output
const colorizedFormat = printf(({ level, message, timestamp: ts, stack }) => {
  const color: Colorizer = isLevelName(level) ? levelColors[level] : chalk.white;
  const brightColor: Colorizer = isLevelName(level) ? levelBrightColors[level] : chalk.whiteBright;
  const icon = isLevelName(level) ? levelIcons[level] : '📝';

  const timestampStr = chalk.gray(`[${String(ts)}]`);
  const levelStr = color(`[${level.toUpperCase()}]`);

  const formattedMessage = typeof message === 'string' ? brightColor(message) : String(message);

  // Include stack trace for errors
  return typeof stack === 'string'
    ? `${timestampStr} ${icon} ${levelStr}\n${chalk.red(stack)}`
    : `${timestampStr} ${icon} ${levelStr} ${formattedMessage}`;
});

// Simple format for file output (no colors)
const fileFormat = printf(({ level, message, timestamp: ts, stack }) => {
  return `${String(ts)} [${level.toUpperCase()}]: ${typeof stack === 'string' ? stack : String(message)}`;
});

const baseFormat = combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), errors({ stack: true }));

// Plain-text files written alongside the console in production
const fileTargets: ReadonlyArray<{ filename: string; level?: LevelName }> = [
  { filename: 'logs/error.log', level: 'error' },
  { filename: 'logs/combined.log' },
];

const logger = winston.createLogger({
  level: env.LOG_LEVEL,
  format: baseFormat,
  defaultMeta: { service: 'remittance-matching' },
  transports: [
    new winston.transports.Console({
      silent: env.NODE_ENV === 'test',
      format: combine(baseFormat, colorizedFormat),
    }),
  ],
});

if (env.NODE_ENV === 'production') {
  const fileOutput = combine(baseFormat, fileFormat);
  for (const { filename, level } of fileTargets) {
    logger.add(new winston.transports.File({ filename, level, format: fileOutput }));
  }
}

export default logger;
