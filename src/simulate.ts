#!/usr/bin/env node
import 'dotenv/config';
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { AppConfig, loadConfig, toNavigationOptions } from './config';
import { flushLogs, initAppLogger, logError } from './lib/appLogger';
import { parseRouteResponse } from './lib/routing';
import { initSentry } from './lib/sentry';
import { createNavigationSession } from './navigation/navigationSession';
import { RoutePlan, SessionSnapshot } from './navigation/navTypes';
import { createSimulatedPositionSource } from './navigation/simulatedSource';
import { formatDistance, formatDuration, formatInstruction } from './navigation/units';
import { pathLengthMeters } from './navigation/geo';

export type SimulationOptions = {
  config: AppConfig;
  speedMps?: number;
  intervalMs?: number;
};

export const formatSnapshotLine = (snapshot: SessionSnapshot) =>
  [
    formatDistance(snapshot.distanceToDestinationMeters),
    formatDuration(snapshot.estimatedTimeRemainingS),
    `${Math.round(snapshot.bearingDegrees)}°`,
    formatInstruction(snapshot),
  ].join(' | ');

/**
 * Drives a session along `route` with a simulated source, printing one line per accepted
 * fix. Resolves with the last active snapshot once the end of the route is reached.
 */
export const runSimulation = (
  route: RoutePlan,
  options: SimulationOptions,
  print: (line: string) => void,
) =>
  new Promise<SessionSnapshot>((resolve) => {
    const speedMps = options.speedMps ?? 8;
    const intervalMs = options.intervalMs ?? 1000;
    const session = createNavigationSession(toNavigationOptions(options.config));
    const source = createSimulatedPositionSource(route.points, { speedMps, intervalMs });
    const lastIndex = route.points.length - 1;
    let last = session.getSnapshot();
    let deadline: ReturnType<typeof setTimeout> | null = null;

    const finish = () => {
      if (deadline) clearTimeout(deadline);
      deadline = null;
      session.dispose();
      resolve(last);
    };

    session.subscribe((snapshot) => {
      if (snapshot.status !== 'active' || !snapshot.snappedPosition) return;
      last = snapshot;
      print(formatSnapshotLine(snapshot));
      if (snapshot.lastIndex === lastIndex) finish();
    });
    session.onNotice((notice) => print(`! ${notice.message}`));

    session.start(route, source);
    if (!session.isActive()) return;
    // the closing fix can fall under the movement filter; give up two ticks after the walk ends
    const walkMs = (pathLengthMeters(route.points) / speedMps) * 1000;
    deadline = setTimeout(finish, walkMs + intervalMs * 2);
  });

const readNumberArg = (value: string | undefined, name: string) => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`--${name} must be a positive number, got "${value}"`);
  }
  return parsed;
};

export const main = async (argv: string[] = process.argv.slice(2)) => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      interval: { type: 'string' },
      speed: { type: 'string' },
    },
  });
  const file = positionals[0];
  if (!file) {
    throw new Error('Usage: simulate <route.json> [--interval ms] [--speed mps]');
  }

  const config = loadConfig();
  initAppLogger({ filePath: config.logFile });
  initSentry(config);

  const route = parseRouteResponse(JSON.parse(await readFile(file, 'utf8')));
  if (!route.points.length) {
    throw new Error(`No usable route in ${file}`);
  }
  const final = await runSimulation(
    route,
    {
      config,
      intervalMs: readNumberArg(values.interval, 'interval'),
      speedMps: readNumberArg(values.speed, 'speed'),
    },
    (line) => console.log(line),
  );
  console.log(`Arrived: ${formatDistance(final.distanceToDestinationMeters)} remaining`);
  await flushLogs();
};

if (require.main === module) {
  main().catch(async (error: unknown) => {
    logError('SIMULATION_FAILED', error);
    console.error(error instanceof Error ? error.message : error);
    await flushLogs();
    process.exitCode = 1;
  });
}
