import chalk from 'chalk';

const getTimestamp = () => new Date().toISOString();
const isProduction = process.env.NODE_ENV === 'production';
const isDevelopment = process.env.NODE_ENV === 'development';
const isTest = process.env.NODE_ENV === 'test';

type Level = 'info' | 'warn' | 'error' | 'success';

const shouldLog = (level: Level) => {
  // Jest sets NODE_ENV=test; keep test output to failures only
  if (isTest) return level === 'error';
  if (isProduction) {
    return level === 'warn' || level === 'error' || level === 'success';
  }
  return true;
};

/**
 * Reduce a thrown value to a small loggable object.
 */
const simplifyError = (err: unknown): Record<string, unknown> => {
  if (err instanceof Error) {
    const kind = 'kind' in err && typeof err.kind === 'string' ? { kind: err.kind } : {};
    return {
      name: err.name,
      message: err.message,
      ...kind,
      ...(isDevelopment && err.stack ? { stack: err.stack.split('\n').slice(0, 3).join('\n') } : {}),
    };
  }
  if (typeof err === 'object' && err !== null) {
    return { type: typeof err, keys: Object.keys(err).slice(0, 10) };
  }
  return { message: String(err) };
};

export const logger = {
  info: (msg: string) => {
    if (shouldLog('info')) {
      console.log(`${chalk.blue('[INFO]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  success: (msg: string) => {
    if (shouldLog('success')) {
      console.log(`${chalk.green('[SUCCESS]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  warn: (msg: string) => {
    if (shouldLog('warn')) {
      console.log(`${chalk.yellow('[WARN]')} ${chalk.gray(getTimestamp())} → ${msg}`);
    }
  },

  error: (msg: string, err?: unknown) => {
    if (shouldLog('error')) {
      console.log(`${chalk.red('[ERROR]')} ${chalk.gray(getTimestamp())} → ${msg}`);
      if (err !== undefined) {
        console.error(chalk.red(JSON.stringify(simplifyError(err), null, isDevelopment ? 2 : 0)));
      }
    }
  },

  divider: () => {
    if (!isProduction) {
      console.log(chalk.cyan('----------------------------------------'));
    }
  },
};
