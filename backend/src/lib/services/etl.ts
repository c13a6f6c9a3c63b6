/**
 * Hierarchy rebuild: pull the species event tree and accession mappings,
 * collapse them into a new snapshot and publish it behind the pointer.
 * Each run is tracked as a hierarchy_rebuild job.
 */
import { ulid } from 'ulid';
import { JobKind, JobStatus, UNKNOWN_VERSION } from '@pathimpact/shared';
import { flattenEvents, type EventNode } from '../clients/reactome.js';
import { config } from '../config.js';
import { DataIntegrityError, UpstreamUnavailableError } from '../errors.js';
import { logger, type Logger } from '../logger.js';
import { withRetry, type RetryOptions } from '../retry.js';
import { compareIds } from '../stats.js';
import { buildHierarchy, publishSnapshot, readCurrentSnapshot } from './hierarchy.js';
import { createJob, transitionJob } from './jobs.js';

export interface PathwaySource {
  releaseVersion(): Promise<string | null>;
  eventHierarchy(): Promise<EventNode[]>;
  pathwaysForAccession(accession: string): Promise<string[]>;
}

export interface EtlDeps {
  source: PathwaySource;
  retry?: RetryOptions;
  log?: Logger;
  now?: () => Date;
}

export interface EtlSummary {
  jobId: string;
  release: string;
  version: string;
  pathwayCount: number;
  geneCount: number;
  accessionCount: number;
  failedAccessions: string[];
  integrityIssues: number;
}

// Genes already served stay covered even when they are not reseeded.
// A broken current snapshot must not block the rebuild that replaces it.
async function currentGenes(log: Logger, jobId: string): Promise<string[]> {
  try {
    return (await readCurrentSnapshot()).genes();
  } catch (error) {
    log.error({ jobId, err: error }, 'Current hierarchy unreadable; rebuilding from seed accessions only');
    return [];
  }
}

async function rebuild(
  deps: EtlDeps,
  log: Logger,
  jobId: string,
  seedAccessions: readonly string[]
): Promise<EtlSummary> {
  const retry = deps.retry ?? {};
  const release = (await withRetry(() => deps.source.releaseVersion(), retry)) ?? UNKNOWN_VERSION;
  const flat = flattenEvents(await withRetry(() => deps.source.eventHierarchy(), retry));
  if (flat.pathways.length === 0) {
    throw new DataIntegrityError('HierarchySource', release, 'event hierarchy is empty');
  }

  const accessions = [...new Set([...seedAccessions, ...(await currentGenes(log, jobId))])]
    .sort(compareIds)
    .slice(0, config.etl.maxAccessions);

  const genes = new Map(
    flat.pathways.map((pathway): [string, Set<string>] => [pathway.pathwayId, new Set<string>()])
  );
  const failedAccessions: string[] = [];
  for (const accession of accessions) {
    let pathwayIds: string[];
    try {
      pathwayIds = await withRetry(() => deps.source.pathwaysForAccession(accession), retry);
    } catch (error) {
      if (!(error instanceof UpstreamUnavailableError)) throw error;
      log.warn({ jobId, accession, err: error }, 'Accession mapping failed; skipping');
      failedAccessions.push(accession);
      continue;
    }
    for (const pathwayId of pathwayIds) genes.get(pathwayId)?.add(accession);
  }

  const { snapshot, issues } = buildHierarchy(
    {
      release,
      pathways: flat.pathways.map((pathway) => ({
        ...pathway,
        geneProducts: [...(genes.get(pathway.pathwayId) ?? [])].sort(compareIds),
      })),
      relations: flat.relations,
    },
    { version: ulid(), builtAt: (deps.now?.() ?? new Date()).toISOString() }
  );

  await publishSnapshot(snapshot);

  return {
    jobId,
    release,
    version: snapshot.version,
    pathwayCount: snapshot.size,
    geneCount: snapshot.genes().length,
    accessionCount: accessions.length,
    failedAccessions,
    integrityIssues: issues.length,
  };
}

export async function runHierarchyEtl(
  deps: EtlDeps,
  input: { seedAccessions: readonly string[] }
): Promise<EtlSummary> {
  const log = deps.log ?? logger;
  const job = await createJob(JobKind.HIERARCHY_REBUILD, { seedCount: input.seedAccessions.length });
  await transitionJob(job.jobId, JobStatus.RUNNING);

  let summary: EtlSummary;
  try {
    summary = await rebuild(deps, log, job.jobId, input.seedAccessions);
  } catch (error) {
    log.error({ jobId: job.jobId, err: error }, 'Hierarchy rebuild failed');
    await transitionJob(job.jobId, JobStatus.FAILED, {
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }

  await transitionJob(job.jobId, JobStatus.SUCCEEDED, { result: { ...summary } });
  log.info(summary, 'Hierarchy rebuild succeeded');
  return summary;
}
