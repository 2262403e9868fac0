import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const levelOrder: Record<Exclude<LogLevel, 'silent'>, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (text: string) => void;
  info: (text: string) => void;
  success: (text: string) => void;
  warn: (text: string) => void;
  error: (text: string) => void;
}

export function createLogger(level: LogLevel): Logger {
  const threshold = level === 'silent' ? Number.POSITIVE_INFINITY : levelOrder[level];
  const enabled = (l: Exclude<LogLevel, 'silent'>) => levelOrder[l] >= threshold;

  return {
    debug: (text) => {
      if (enabled('debug')) console.log(chalk.gray(text));
    },
    info: (text) => {
      if (enabled('info')) console.log(chalk.blue(text));
    },
    success: (text) => {
      if (enabled('info')) console.log(chalk.green(text));
    },
    warn: (text) => {
      if (enabled('warn')) console.warn(chalk.yellow(text));
    },
    error: (text) => {
      if (enabled('error')) console.error(chalk.red(text));
    },
  };
}

export const silentLogger: Logger = createLogger('silent');
