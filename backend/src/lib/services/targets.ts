import {
  ConfidenceTier,
  EvidenceState,
  MappingNote,
  MappingStatus,
  type ActivityRecord,
  type AnalysisParams,
  type TargetAnnotation,
  type TargetSummary,
} from '@pathimpact/shared';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { compareIds, spread } from '../stats.js';
import { evaluateConfidence } from './confidence.js';
import type { HierarchySnapshot } from './hierarchy.js';

const MAX_SOURCE_ASSAY_IDS = 50;

export interface TargetMapping {
  status: MappingStatus;
  accessions: string[];
}

export type TargetMapper = (annotation: TargetAnnotation | undefined) => TargetMapping;

/**
 * Map a target onto hierarchy gene products.
 * The primary accession wins outright; secondary accessions only yield a partial mapping.
 */
export function hierarchyMapper(hierarchy: HierarchySnapshot): TargetMapper {
  return (annotation) => {
    if (annotation?.accession && hierarchy.hasGene(annotation.accession)) {
      return { status: MappingStatus.MAPPED, accessions: [annotation.accession] };
    }
    const secondary = [...new Set(annotation?.secondaryAccessions ?? [])]
      .filter((accession) => hierarchy.hasGene(accession))
      .sort(compareIds);
    if (secondary.length > 0) {
      return { status: MappingStatus.PARTIAL, accessions: secondary };
    }
    return { status: MappingStatus.UNMAPPED, accessions: [] };
  };
}

export interface AggregateInput {
  compoundId: string;
  records: readonly ActivityRecord[];
  annotations: ReadonlyMap<string, TargetAnnotation>;
  params: Pick<AnalysisParams, 'potencyThreshold' | 'minAssays'>;
  mapTarget: TargetMapper;
  maxTargets?: number;
}

export interface AggregateResult {
  targets: TargetSummary[];
  excludedTargetIds: string[];
  truncatedCount: number;
  limitedData: boolean;
}

function isUsable(record: ActivityRecord): record is ActivityRecord & { potency: number } {
  return (
    record.relation === '=' &&
    record.valid &&
    typeof record.potency === 'number' &&
    Number.isFinite(record.potency)
  );
}

function isNonHuman(annotation: TargetAnnotation | undefined): boolean {
  return !!annotation?.organism && annotation.organism !== config.scoring.humanOrganism;
}

export function compareTargets(a: TargetSummary, b: TargetSummary): number {
  return b.medianPotency - a.medianPotency || compareIds(a.targetId, b.targetId);
}

export function aggregateTargets(input: AggregateInput): AggregateResult {
  const { compoundId, records, annotations, params, mapTarget } = input;
  const maxTargets = input.maxTargets ?? config.scoring.maxTargets;

  const grouped = new Map<string, Array<ActivityRecord & { potency: number }>>();
  const excluded = new Set<string>();
  for (const record of records) {
    if (!isUsable(record)) continue;
    if (isNonHuman(annotations.get(record.targetId))) {
      excluded.add(record.targetId);
      continue;
    }
    const group = grouped.get(record.targetId) ?? [];
    group.push(record);
    grouped.set(record.targetId, group);
  }

  const summaries: TargetSummary[] = [];
  for (const [targetId, group] of grouped) {
    const annotation = annotations.get(targetId);
    const values = group.map((record) => record.potency);
    const { min, median, max, iqr } = spread(values);
    const priorConfidence = annotation?.priorConfidence ?? config.scoring.defaultTargetConfidence;
    const assayCount = group.length;

    const outcome = evaluateConfidence({
      assayCount,
      medianPotency: median,
      priorConfidence,
      potencyThreshold: params.potencyThreshold,
    });
    const belowMinAssays = assayCount < params.minAssays;
    const mapping = mapTarget(annotation);
    const actionType = annotation?.actionType ?? null;

    summaries.push({
      targetId,
      targetName: annotation?.name ?? targetId,
      geneSymbol: annotation?.geneSymbol ?? null,
      accession: annotation?.accession ?? null,
      medianPotency: median,
      assayCount,
      potencyMin: min,
      potencyMax: max,
      potencyIqr: iqr,
      priorConfidence,
      confidenceTier: outcome.tier,
      confidenceReasons: belowMinAssays ? [...outcome.reasons, 'min_assays_not_met'] : outcome.reasons,
      lowConfidence: belowMinAssays || outcome.tier === ConfidenceTier.LOW,
      mappingStatus: mapping.status,
      mappedAccessions: mapping.accessions,
      mappingNotes:
        mapping.status === MappingStatus.UNMAPPED
          ? [...(annotation?.mappingNotes ?? []), MappingNote.UNMAPPED_TARGET]
          : [...(annotation?.mappingNotes ?? [])],
      actionType,
      directionEvidence: actionType ? EvidenceState.POSITIVE : EvidenceState.UNKNOWN,
      sourceAssayIds: [...new Set(group.map((record) => record.assayId))].slice(0, MAX_SOURCE_ASSAY_IDS),
    });
  }

  summaries.sort(compareTargets);
  const targets = summaries.slice(0, maxTargets);
  const totalAssays = targets.reduce((sum, target) => sum + target.assayCount, 0);

  logger.debug(
    { compoundId, records: records.length, targets: summaries.length, excluded: excluded.size },
    'Aggregated activity records'
  );

  return {
    targets,
    excludedTargetIds: [...excluded].sort(compareIds),
    truncatedCount: summaries.length - targets.length,
    limitedData: targets.length < 3 || totalAssays < 10,
  };
}

// Low-confidence targets are kept but hidden from default views
export function selectVisibleTargets(
  targets: readonly TargetSummary[],
  includeLowConfidence: boolean
): { visible: TargetSummary[]; hiddenCount: number } {
  const visible = includeLowConfidence ? [...targets] : targets.filter((target) => !target.lowConfidence);
  return { visible, hiddenCount: targets.length - visible.length };
}
