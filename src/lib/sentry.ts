import * as Sentry from '@sentry/node';
import { logWarn } from './appLogger';

export type SentryOptions = {
  sentryDsn?: string;
  sentryEnv?: string;
  release?: string;
};

let didInit = false;

const getRelease = (options: SentryOptions) => {
  if (options.release) return options.release;
  const name = process.env.npm_package_name || 'navtrack';
  const version = process.env.npm_package_version || '0.0.0';
  return `${name}@${version}`;
};

export const initSentry = (options: SentryOptions = {}) => {
  if (didInit) return true;
  const dsn = options.sentryDsn;
  if (!dsn) return false;
  Sentry.init({
    dsn,
    environment: options.sentryEnv || 'production',
    release: getRelease(options),
    tracesSampleRate: 0,
  });
  didInit = true;
  return true;
};

export const isSentryEnabled = () => didInit;

export const reportError = (error: unknown, extra?: Record<string, unknown>) => {
  if (!didInit) return;
  try {
    Sentry.withScope((scope) => {
      if (extra) scope.setExtras(extra);
      Sentry.captureException(error);
    });
  } catch (reportFailure) {
    logWarn('SENTRY_REPORT_FAILED', reportFailure);
  }
};
