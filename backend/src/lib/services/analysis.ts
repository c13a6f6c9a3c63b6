/**
 * End-to-end analysis run for one compound query:
 * resolve, fetch activity, annotate, aggregate, score, graph and persist.
 *
 * Only two things abort a run: an unresolvable identity and activity data
 * that cannot be fetched at all. Everything else degrades into flags and
 * degraded messages on the stored result.
 */
import { ulid } from 'ulid';
import {
  EvidenceState,
  MappingStatus,
  ResolutionStatus,
  type ActivityRecord,
  type AnalysisFlags,
  type AnalysisParams,
  type AnalysisResult,
  type CompoundIdentity,
  type PathwayScore,
  type TargetAnnotation,
  type TargetAnnotationSet,
  type TargetSummary,
} from '@pathimpact/shared';
import { config } from '../config.js';
import { AmbiguousCompoundError, NotFoundError, UpstreamUnavailableError } from '../errors.js';
import { logger, type Logger } from '../logger.js';
import { withRetry, withTimeout, type RetryOptions } from '../retry.js';
import { compareIds } from '../stats.js';
import { fillMissingAccessions, type AccessionLookup } from './accessions.js';
import type { HierarchySnapshot } from './hierarchy.js';
import { buildAssociationGraph } from './graph.js';
import { scorePathways } from './pathways.js';
import { resolveCompound, type ResolverDeps } from './resolver.js';
import { captureVersionSnapshot, saveAnalysis } from './snapshots.js';
import { aggregateTargets, hierarchyMapper, selectVisibleTargets } from './targets.js';

const HIGH_VARIABILITY_IQR = 1.0;
const HIGH_VARIABILITY_MIN_RECORDS = 3;

export const DegradedMessage = {
  ANNOTATIONS_INCOMPLETE: 'Some target annotations may be incomplete. Direction information may be missing.',
  ACCESSIONS_INCOMPLETE: 'Some target accessions could not be looked up. Pathway mapping may be incomplete.',
  ALL_TARGETS_HIDDEN: 'All targets are below the confidence cutoff. Include low-confidence targets to see them.',
  HIERARCHY_UNAVAILABLE: 'Pathway data temporarily unavailable. Showing target binding data only.',
  PARTIAL_MAPPING: 'Some targets have limited pathway mapping coverage.',
  LIMITED_DATA: 'Limited target data available for this compound.',
} as const;

export interface ActivityProvider {
  fetchActivities(canonicalId: string): Promise<ActivityRecord[]>;
}

export interface AnnotationProvider {
  fetchTargetAnnotations(
    canonicalId: string,
    targetIds: readonly string[],
    signal?: AbortSignal
  ): Promise<TargetAnnotationSet>;
}

// Source name -> release lookup, stamped into the version snapshot
export type VersionSources = Readonly<Record<string, () => Promise<string | null>>>;

export interface AnalysisDeps extends ResolverDeps {
  activities: ActivityProvider;
  annotations: AnnotationProvider;
  // Fallback for targets the annotation source leaves without an accession
  accessions?: AccessionLookup;
  hierarchy: HierarchySnapshot;
  versionSources?: VersionSources;
  annotationBudgetMs?: number;
  accessionBudgetMs?: number;
  now?: () => Date;
}

export interface AnalysisRequest {
  query: string;
  params: AnalysisParams;
  resolutionChoice?: string;
}

function retryOptions(deps: AnalysisDeps, log: Logger, operation: string): RetryOptions {
  return {
    ...deps.retry,
    onRetry: (error, attempt, delayMs) => {
      log.warn({ operation, attempt, delayMs, err: error }, 'Upstream call failed; retrying');
      deps.retry?.onRetry?.(error, attempt, delayMs);
    },
  };
}

async function resolveIdentity(deps: AnalysisDeps, request: AnalysisRequest): Promise<CompoundIdentity> {
  const resolution = await resolveCompound(deps, request.query, { resolutionChoice: request.resolutionChoice });
  if (resolution.status === ResolutionStatus.AMBIGUOUS) {
    throw new AmbiguousCompoundError(request.query, resolution.candidates);
  }
  if (resolution.status === ResolutionStatus.NOT_FOUND || !resolution.identity) {
    throw new NotFoundError('Compound', request.query);
  }
  return resolution.identity;
}

async function fetchAnnotations(
  deps: AnalysisDeps,
  log: Logger,
  canonicalId: string,
  targetIds: string[]
): Promise<TargetAnnotationSet | null> {
  const budgetMs = deps.annotationBudgetMs ?? config.upstream.annotationBudgetMs;
  try {
    return await withTimeout(
      (signal) =>
        withRetry(() => deps.annotations.fetchTargetAnnotations(canonicalId, targetIds, signal), {
          ...retryOptions(deps, log, 'fetchTargetAnnotations'),
          signal,
        }),
      budgetMs,
      'annotations'
    );
  } catch (error) {
    if (!(error instanceof UpstreamUnavailableError)) throw error;
    log.warn({ canonicalId, targets: targetIds.length, err: error }, 'Target annotations unavailable; using defaults');
    return null;
  }
}

// Lookups still pending when the budget runs out are canceled and count as an outage
async function fillAccessions(
  deps: AnalysisDeps,
  log: Logger,
  targetIds: readonly string[],
  annotations: Map<string, TargetAnnotation>
): Promise<{ annotations: Map<string, TargetAnnotation>; sourceDown: boolean }> {
  if (!deps.accessions) return { annotations, sourceDown: false };
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), deps.accessionBudgetMs ?? config.upstream.accessionBudgetMs);
  try {
    return await fillMissingAccessions(deps.accessions, targetIds, annotations, { signal: controller.signal, log });
  } finally {
    clearTimeout(timer);
  }
}

async function lookupVersions(sources: VersionSources, log: Logger): Promise<Record<string, string | undefined>> {
  const versions: Record<string, string | undefined> = {};
  for (const [source, lookup] of Object.entries(sources)) {
    try {
      versions[source] = (await lookup()) ?? undefined;
    } catch (error) {
      if (!(error instanceof UpstreamUnavailableError)) throw error;
      log.warn({ source, err: error }, 'Source version unavailable');
    }
  }
  return versions;
}

// Positive when any target shows the issue, unknown when there was nothing to check
function evidence(targets: readonly TargetSummary[], present: (target: TargetSummary) => boolean): EvidenceState {
  if (targets.length === 0) return EvidenceState.UNKNOWN;
  return targets.some(present) ? EvidenceState.POSITIVE : EvidenceState.NEGATIVE;
}

export function computeFlags(
  targets: readonly TargetSummary[],
  pathways: readonly PathwayScore[],
  context: {
    limitedData: boolean;
    hierarchyAvailable: boolean;
    // Targets that survived aggregation, hidden ones included
    aggregatedCount: number;
    accessionSourceDown?: boolean;
  }
): AnalysisFlags {
  const variabilityChecked = targets.filter((target) => target.assayCount >= HIGH_VARIABILITY_MIN_RECORDS);

  let partialMapping: EvidenceState;
  if (pathways.length === 0 && context.aggregatedCount > 0) {
    partialMapping = EvidenceState.POSITIVE;
  } else if (targets.length === 0) {
    partialMapping = EvidenceState.UNKNOWN;
  } else if (
    !context.hierarchyAvailable ||
    context.accessionSourceDown ||
    targets.some((target) => target.mappingStatus !== MappingStatus.MAPPED)
  ) {
    partialMapping = EvidenceState.POSITIVE;
  } else {
    partialMapping = EvidenceState.NEGATIVE;
  }

  return {
    limitedData: context.limitedData ? EvidenceState.POSITIVE : EvidenceState.NEGATIVE,
    partialMapping,
    highVariability: evidence(variabilityChecked, (target) => target.potencyIqr >= HIGH_VARIABILITY_IQR),
    directionUnknown: evidence(targets, (target) => target.actionType === null),
  };
}

export async function runAnalysis(deps: AnalysisDeps, request: AnalysisRequest): Promise<AnalysisResult> {
  const log = deps.log ?? logger;
  const { params } = request;
  const degraded: string[] = [];

  const resolved = await resolveIdentity(deps, request);
  const { canonicalId } = resolved;

  // No partial result exists without activity data, so unavailability aborts here
  const records = await withRetry(
    () => deps.activities.fetchActivities(canonicalId),
    retryOptions(deps, log, 'fetchActivities')
  );
  if (records.length === 0) {
    throw new NotFoundError('Activity data', canonicalId);
  }

  const targetIds = [...new Set(records.map((record) => record.targetId))].sort(compareIds);
  const annotationSet = await fetchAnnotations(deps, log, canonicalId, targetIds);
  if (annotationSet === null) degraded.push(DegradedMessage.ANNOTATIONS_INCOMPLETE);
  const fetched = new Map(
    (annotationSet?.annotations ?? []).map((annotation): [string, TargetAnnotation] => [
      annotation.targetId,
      annotation,
    ])
  );
  const identity: CompoundIdentity = {
    ...resolved,
    mechanismOfAction: resolved.mechanismOfAction ?? annotationSet?.mechanismOfAction ?? null,
  };

  const filled = await fillAccessions(deps, log, targetIds, fetched);
  if (filled.sourceDown) degraded.push(DegradedMessage.ACCESSIONS_INCOMPLETE);
  const { annotations } = filled;

  const { hierarchy } = deps;
  const hierarchyAvailable = hierarchy.size > 0;
  if (!hierarchyAvailable) degraded.push(DegradedMessage.HIERARCHY_UNAVAILABLE);

  const aggregate = aggregateTargets({
    compoundId: canonicalId,
    records,
    annotations,
    params,
    mapTarget: hierarchyMapper(hierarchy),
  });
  if (aggregate.truncatedCount > 0) {
    degraded.push(`Showing top ${aggregate.targets.length} targets by potency for performance.`);
  }
  if (aggregate.excludedTargetIds.length > 0) {
    degraded.push(`Non-human targets excluded from scoring: ${aggregate.excludedTargetIds.length}.`);
  }

  const { visible, hiddenCount } = selectVisibleTargets(aggregate.targets, params.includeLowConfidence);
  if (visible.length === 0 && hiddenCount > 0) degraded.push(DegradedMessage.ALL_TARGETS_HIDDEN);
  const scored = scorePathways({ targets: visible, hierarchy, params, log });
  const graph = buildAssociationGraph(identity, visible, scored.pathways);

  const analysisFlags = computeFlags(visible, scored.pathways, {
    limitedData: aggregate.limitedData,
    hierarchyAvailable,
    aggregatedCount: aggregate.targets.length,
    accessionSourceDown: filled.sourceDown,
  });
  // Without a hierarchy the unavailable message already covers mapping
  if (hierarchyAvailable && analysisFlags.partialMapping === EvidenceState.POSITIVE) {
    degraded.push(DegradedMessage.PARTIAL_MAPPING);
  }
  if (analysisFlags.limitedData === EvidenceState.POSITIVE) degraded.push(DegradedMessage.LIMITED_DATA);

  const versionSnapshot = captureVersionSnapshot({
    ...(await lookupVersions(deps.versionSources ?? {}, log)),
    reactome: hierarchy.release,
  });

  const result: AnalysisResult = {
    analysisId: ulid(),
    createdAt: (deps.now?.() ?? new Date()).toISOString(),
    query: request.query,
    canonicalId,
    params: { ...params },
    resolution: identity,
    targets: visible,
    hiddenTargetCount: hiddenCount,
    excludedTargetIds: aggregate.excludedTargetIds,
    pathways: scored.pathways,
    graph,
    versionSnapshot,
    analysisFlags,
    degradedMessages: [...new Set(degraded)].sort(compareIds),
    attribution: config.attribution,
    exportManifest: {
      exportVersion: config.exportVersion,
      attributionText: config.attribution,
      parameterSnapshot: { ...params },
    },
  };

  await saveAnalysis(result);

  log.info(
    {
      analysisId: result.analysisId,
      canonicalId,
      records: records.length,
      targets: visible.length,
      hiddenTargets: hiddenCount,
      excludedTargets: aggregate.excludedTargetIds.length,
      pathways: scored.pathways.length,
      skippedPathways: scored.skipped.length,
      degraded: result.degradedMessages.length,
    },
    'Analysis completed'
  );

  return result;
}
