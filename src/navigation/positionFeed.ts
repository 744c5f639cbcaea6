import { logDebug, logWarn } from '../lib/appLogger';
import { describeError, NavigationError } from './errors';
import { PositionFix } from './navTypes';

export type PositionSubscription = { remove: () => void };

/**
 * Capability the host implements per platform (device GPS, replayed trace, simulator).
 * `watchPosition` must keep the subscription alive after reporting an error.
 */
export interface PositionSource {
  watchPosition(
    onFix: (fix: PositionFix) => void,
    onError: (error: unknown) => void,
  ): PositionSubscription;
  getLastKnownPosition(): Promise<PositionFix | null>;
  getCurrentPosition(options: { timeoutMs: number }): Promise<PositionFix>;
}

export type PositionFeedHandlers = {
  onFix: (fix: PositionFix) => void;
  onUnavailable: (error: NavigationError) => void;
};

export type PositionFeedOptions = {
  fixTimeoutMs?: number;
};

export const withTimeout = <T>(promise: Promise<T>, timeoutMs: number, label: string) =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      },
    );
  });

/**
 * Wraps a PositionSource for one navigation session. Fixes are handed to `onFix` one at a
 * time and in timestamp order; a stream error triggers a single fallback fetch (last known,
 * else a fresh fix bounded by `fixTimeoutMs`). A fallback that fails, or that returns a fix
 * older than the last delivered one, is reported through `onUnavailable`. Nothing is delivered
 * once `stop()` returns.
 */
export const createPositionFeed = (
  source: PositionSource,
  handlers: PositionFeedHandlers,
  options: PositionFeedOptions = {},
) => {
  const fixTimeoutMs = options.fixTimeoutMs ?? 30000;
  let subscription: PositionSubscription | null = null;
  let active = false;
  // bumped on every start/stop so late fallback results from an old run are dropped
  let generation = 0;
  let fallbackInFlight = false;
  let lastTimestamp = -Infinity;

  // false when the fix is older than the last one delivered
  const deliver = (fix: PositionFix, run: number) => {
    if (run !== generation || !active) return true;
    if (fix.timestamp < lastTimestamp) {
      logDebug('POSITION_STALE_DROPPED', { timestamp: fix.timestamp, lastTimestamp });
      return false;
    }
    lastTimestamp = fix.timestamp;
    handlers.onFix(fix);
    return true;
  };

  const reportUnavailable = (cause: unknown, fallback: string) => {
    logWarn('POSITION_UNAVAILABLE', { cause: describeError(cause), fallback });
    handlers.onUnavailable(
      new NavigationError('position_unavailable', 'No position fix from stream or fallback', {
        cause: describeError(cause),
        fallback,
      }),
    );
  };

  const fetchFallback = async () => {
    const lastKnown = await source.getLastKnownPosition();
    if (lastKnown) return lastKnown;
    return withTimeout(source.getCurrentPosition({ timeoutMs: fixTimeoutMs }), fixTimeoutMs, 'getCurrentPosition');
  };

  const runFallback = async (run: number, cause: unknown) => {
    if (fallbackInFlight) return;
    fallbackInFlight = true;
    try {
      const fix = await fetchFallback();
      if (!deliver(fix, run)) {
        reportUnavailable(cause, 'fallback fix older than the last delivered fix');
      }
    } catch (error) {
      if (run !== generation) return;
      reportUnavailable(cause, describeError(error));
    } finally {
      fallbackInFlight = false;
    }
  };

  const start = () => {
    if (active) return;
    active = true;
    generation += 1;
    lastTimestamp = -Infinity;
    const run = generation;
    const created = source.watchPosition(
      (fix) => deliver(fix, run),
      (error) => {
        if (run !== generation) return;
        logWarn('POSITION_STREAM_ERROR', { error: describeError(error) });
        void runFallback(run, error);
      },
    );
    // a handler may have stopped the feed while the source was emitting its first fix
    if (run !== generation) {
      created.remove();
      return;
    }
    subscription = created;
  };

  const stop = () => {
    active = false;
    generation += 1;
    const current = subscription;
    subscription = null;
    current?.remove();
  };

  return {
    start,
    stop,
    isActive: () => active,
  };
};

export type PositionFeed = ReturnType<typeof createPositionFeed>;
