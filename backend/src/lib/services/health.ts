/**
 * Service health: one timed check per upstream source plus the published hierarchy.
 * ChEMBL is the one source no analysis can run without, so losing it makes the
 * service unhealthy; losing anything else only degrades it.
 */
import { SourceStatus, UNKNOWN_VERSION, type HealthStatus, type SourceHealth } from '@pathimpact/shared';
import { logger, type Logger } from '../logger.js';
import { compareIds } from '../stats.js';
import { readCurrentSnapshot } from './hierarchy.js';

const REQUIRED_SOURCE = 'chembl';

// Any settled promise counts as up
export type SourceCheck = () => Promise<unknown>;

export interface HealthDeps {
  sources: Readonly<Record<string, SourceCheck>>;
  log?: Logger;
  clock?: () => number;
}

export interface HealthReport {
  status: HealthStatus;
  hierarchyRelease: string;
  sources: Record<string, SourceHealth>;
}

async function checkSource(name: string, check: SourceCheck, clock: () => number, log: Logger): Promise<SourceHealth> {
  const started = clock();
  try {
    await check();
    return { status: SourceStatus.UP, latencyMs: clock() - started, error: null };
  } catch (error) {
    log.warn({ source: name, err: error }, 'Source health check failed');
    return {
      status: SourceStatus.DOWN,
      latencyMs: clock() - started,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

// Null when no usable hierarchy is published
async function publishedRelease(log: Logger): Promise<string | null> {
  try {
    const snapshot = await readCurrentSnapshot();
    return snapshot.size > 0 ? snapshot.release : null;
  } catch (error) {
    log.error({ err: error }, 'Hierarchy snapshot unreadable');
    return null;
  }
}

export async function checkHealth(deps: HealthDeps): Promise<HealthReport> {
  const log = deps.log ?? logger;
  const clock = deps.clock ?? Date.now;
  const names = Object.keys(deps.sources).sort(compareIds);

  const [release, results] = await Promise.all([
    publishedRelease(log),
    Promise.all(
      names.map(async (name): Promise<[string, SourceHealth]> => [
        name,
        await checkSource(name, deps.sources[name], clock, log),
      ])
    ),
  ]);

  const down = results.filter(([, health]) => health.status === SourceStatus.DOWN).map(([name]) => name);
  let status: HealthStatus = 'healthy';
  if (down.includes(REQUIRED_SOURCE)) {
    status = 'unhealthy';
  } else if (down.length > 0 || release === null) {
    status = 'degraded';
  }

  return {
    status,
    hierarchyRelease: release ?? UNKNOWN_VERSION,
    sources: Object.fromEntries(results),
  };
}
