import type {
  AnalysisParams,
  AnalysisResult,
  CompareMetrics,
  CompareResult,
  PathwayComparisonRow,
  PathwayScore,
} from '@pathimpact/shared';
import { ConfigurationError } from '../errors.js';
import { compareIds, round6 } from '../stats.js';

const PARAM_KEYS: ReadonlyArray<keyof AnalysisParams> = [
  'potencyThreshold',
  'minAssays',
  'includeLowConfidence',
  'topPathways',
  'minDepth',
  'maxDepth',
];

export function parameterDifferences(a: AnalysisParams, b: AnalysisParams): string[] {
  return PARAM_KEYS.filter((key) => a[key] !== b[key]);
}

export function compareMetrics(
  targetsA: readonly string[],
  targetsB: readonly string[],
  pathwaysA: ReadonlyMap<string, number>,
  pathwaysB: ReadonlyMap<string, number>
): CompareMetrics {
  const setA = new Set(targetsA);
  const setB = new Set(targetsB);
  const targetUnion = new Set([...setA, ...setB]);
  const targetShared = [...setA].filter((id) => setB.has(id)).length;

  // Absent from a top-N list scores 0; it is not missing data
  const pathwayUnion = [...new Set([...pathwaysA.keys(), ...pathwaysB.keys()])].sort(compareIds);
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (const id of pathwayUnion) {
    const a = pathwaysA.get(id) ?? 0;
    const b = pathwaysB.get(id) ?? 0;
    dot += a * b;
    normA += a * a;
    normB += b * b;
  }
  const cosine = normA === 0 || normB === 0 ? 0 : dot / (Math.sqrt(normA) * Math.sqrt(normB));
  const shared = pathwayUnion.filter((id) => pathwaysA.has(id) && pathwaysB.has(id)).length;

  return {
    targetJaccard: targetUnion.size === 0 ? 0 : round6(targetShared / targetUnion.size),
    pathwayCosineSimilarity: round6(cosine),
    sharedPathwayCount: shared,
    uniquePathwayCountA: pathwaysA.size - shared,
    uniquePathwayCountB: pathwaysB.size - shared,
  };
}

export function compareRows(
  pathwaysA: readonly PathwayScore[],
  pathwaysB: readonly PathwayScore[]
): PathwayComparisonRow[] {
  const byIdA = new Map(pathwaysA.map((pathway): [string, PathwayScore] => [pathway.pathwayId, pathway]));
  const byIdB = new Map(pathwaysB.map((pathway): [string, PathwayScore] => [pathway.pathwayId, pathway]));
  const ids = new Set([...byIdA.keys(), ...byIdB.keys()]);

  const rows: PathwayComparisonRow[] = [];
  for (const pathwayId of ids) {
    const a = byIdA.get(pathwayId);
    const b = byIdB.get(pathwayId);
    const scoreA = a?.score ?? null;
    const scoreB = b?.score ?? null;
    rows.push({
      pathwayId,
      pathwayName: a?.pathwayName ?? b?.pathwayName ?? pathwayId,
      scoreA,
      scoreB,
      delta: scoreA === null || scoreB === null ? null : round6(scoreA - scoreB),
      shared: a !== undefined && b !== undefined,
    });
  }

  return rows.sort(
    (x, y) => Math.abs(y.delta ?? 0) - Math.abs(x.delta ?? 0) || compareIds(x.pathwayId, y.pathwayId)
  );
}

/**
 * Compare two completed analyses. Both must have been run with the same
 * parameters; anything else is rejected before computing a metric.
 */
export function compareAnalyses(a: AnalysisResult, b: AnalysisResult): CompareResult {
  const differences = parameterDifferences(a.params, b.params);
  if (differences.length > 0) {
    throw new ConfigurationError('Analyses were run with different parameters', { differences });
  }

  return {
    analysisA: a,
    analysisB: b,
    metrics: compareMetrics(
      a.targets.map((target) => target.targetId),
      b.targets.map((target) => target.targetId),
      new Map(a.pathways.map((pathway): [string, number] => [pathway.pathwayId, pathway.score])),
      new Map(b.pathways.map((pathway): [string, number] => [pathway.pathwayId, pathway.score]))
    ),
    rows: compareRows(a.pathways, b.pathways),
  };
}
