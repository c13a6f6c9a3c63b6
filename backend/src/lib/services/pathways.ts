import {
  MappingStatus,
  type AnalysisParams,
  type PathwayScore,
  type TargetSummary,
} from '@pathimpact/shared';
import { config } from '../config.js';
import { DataIntegrityError } from '../errors.js';
import { logger, type Logger } from '../logger.js';
import { compareIds, median, round6 } from '../stats.js';
import type { HierarchySnapshot } from './hierarchy.js';
import { compareTargets } from './targets.js';

export interface ScoreInput {
  targets: readonly TargetSummary[];
  hierarchy: HierarchySnapshot;
  params: Pick<AnalysisParams, 'topPathways' | 'minDepth' | 'maxDepth'>;
  log?: Logger;
}

export interface ScoreResult {
  pathways: PathwayScore[];
  skipped: DataIntegrityError[];
  // Pathways hit by at least one target, before depth filtering and dedup
  candidateCount: number;
}

interface Candidate {
  pathwayId: string;
  name: string;
  depth: number;
  size: number;
  hits: TargetSummary[];
  hitKey: string;
}

export function comparePathwayScores(a: PathwayScore, b: PathwayScore): number {
  return (
    b.score - a.score ||
    b.coverageRatio - a.coverageRatio ||
    compareIds(a.pathwayId, b.pathwayId)
  );
}

function participates(target: TargetSummary): boolean {
  return target.mappingStatus === MappingStatus.MAPPED || target.mappingStatus === MappingStatus.PARTIAL;
}

/**
 * Propagate target hits through the hierarchy into ranked pathway scores.
 *
 * score = (targetsHit / pathwaySize) * median(hit target potencies). Pathways
 * outside the depth band are dropped, then any retained pathway whose hit set
 * is repeated exactly by a retained descendant is collapsed into it.
 */
export function scorePathways(input: ScoreInput): ScoreResult {
  const { hierarchy, params } = input;
  const log = input.log ?? logger;
  const participants = input.targets.filter(participates);

  const skipped: DataIntegrityError[] = [];
  const candidates: Candidate[] = [];
  for (const pathwayId of hierarchy.pathwayIds()) {
    const geneSet = hierarchy.geneSet(pathwayId);
    if (geneSet.length === 0) {
      skipped.push(new DataIntegrityError('Pathway', pathwayId, 'pathway has no gene products'));
      continue;
    }
    const genes = new Set(geneSet);
    const hits = participants
      .filter((target) => target.mappedAccessions.some((accession) => genes.has(accession)))
      .sort(compareTargets);
    if (hits.length === 0) continue;

    candidates.push({
      pathwayId,
      name: hierarchy.node(pathwayId)?.name ?? pathwayId,
      depth: hierarchy.depth(pathwayId) ?? 0,
      size: geneSet.length,
      hits,
      hitKey: hits
        .map((target) => target.targetId)
        .sort(compareIds)
        .join('\u0000'),
    });
  }

  const retained = new Map(
    candidates
      .filter(
        (candidate) =>
          candidate.depth > 1 && candidate.depth >= params.minDepth && candidate.depth <= params.maxDepth
      )
      .map((candidate): [string, Candidate] => [candidate.pathwayId, candidate])
  );

  const collapsed = new Set<string>();
  for (const candidate of retained.values()) {
    for (const ancestorId of hierarchy.ancestorsOf(candidate.pathwayId)) {
      if (retained.get(ancestorId)?.hitKey === candidate.hitKey) collapsed.add(ancestorId);
    }
  }

  const pathways = [...retained.values()]
    .filter((candidate) => !collapsed.has(candidate.pathwayId))
    .map((candidate): PathwayScore => {
      const coverage = candidate.hits.length / candidate.size;
      const medianPotency = median(candidate.hits.map((target) => target.medianPotency));
      return {
        pathwayId: candidate.pathwayId,
        pathwayName: candidate.name,
        depth: candidate.depth,
        pathwaySize: candidate.size,
        targetsHit: candidate.hits.length,
        medianPotency,
        score: round6(coverage * medianPotency),
        coverageRatio: round6(coverage),
        targetIds: candidate.hits.map((target) => target.targetId),
        ancestorPathwayIds: hierarchy
          .ancestorsOf(candidate.pathwayId)
          .filter((id) => collapsed.has(id) && retained.get(id)?.hitKey === candidate.hitKey),
        url: `${config.upstream.pathwayUrlBase}${candidate.pathwayId}`,
      };
    })
    .sort(comparePathwayScores)
    .slice(0, params.topPathways);

  if (skipped.length > 0) {
    log.warn(
      { count: skipped.length, pathwayIds: skipped.slice(0, 20).map((issue) => issue.entityId) },
      'Skipped pathways without gene products'
    );
  }
  log.debug(
    {
      participants: participants.length,
      candidates: candidates.length,
      retained: retained.size,
      collapsed: collapsed.size,
      returned: pathways.length,
    },
    'Scored pathways'
  );

  return { pathways, skipped, candidateCount: candidates.length };
}
