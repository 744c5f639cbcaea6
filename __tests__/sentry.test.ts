import * as Sentry from '@sentry/node';
import { initSentry, isSentryEnabled, reportError } from '../src/lib/sentry';

describe('sentry wrapper', () => {
  test('stays off without a DSN and drops reports', () => {
    expect(initSentry({ sentryEnv: 'test' })).toBe(false);
    expect(isSentryEnabled()).toBe(false);
    reportError(new Error('ignored'));
    expect(Sentry.init).not.toHaveBeenCalled();
    expect(Sentry.captureException).not.toHaveBeenCalled();
  });

  test('initialises once with a DSN and forwards errors', () => {
    const options = { sentryDsn: 'https://public@sentry.example.test/1', sentryEnv: 'staging', release: 'navtrack@1.2.3' };
    expect(initSentry(options)).toBe(true);
    expect(initSentry(options)).toBe(true);
    expect(Sentry.init).toHaveBeenCalledTimes(1);
    expect(Sentry.init).toHaveBeenCalledWith({
      dsn: 'https://public@sentry.example.test/1',
      environment: 'staging',
      release: 'navtrack@1.2.3',
      tracesSampleRate: 0,
    });

    const error = new Error('route fetch failed');
    reportError(error, { path: '/route/v1/driving' });
    expect(Sentry.captureException).toHaveBeenCalledWith(error);
  });
});
