import type { AnalysisResult, ExportMetadata, JsonExport, PathwayScore } from '@pathimpact/shared';
import { ValidationError } from '../errors.js';
import { compareIds } from '../stats.js';
import { formatIssues, jsonExportSchema } from '../validation.js';

export const CSV_COLUMNS = [
  'pathway_id',
  'pathway_name',
  'score',
  'targets_hit',
  'coverage_ratio',
  'depth',
  'pathway_size',
  'median_potency',
  'url',
] as const;

// Shared by both formats so a value reads the same in CSV and JSON
export function formatNumber(value: number): string {
  return Number.isFinite(value) ? String(value) : '';
}

// JSON with object keys in code-unit order at every level
export function stableStringify(value: unknown): string {
  return JSON.stringify(value, (_key, inner: unknown) => {
    if (inner === null || typeof inner !== 'object' || Array.isArray(inner)) return inner;
    return Object.fromEntries(Object.entries(inner).sort(([a], [b]) => compareIds(a, b)));
  });
}

export function csvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function commentValue(value: string): string {
  return value.replace(/\r?\n/g, ' ');
}

function csvRow(pathway: PathwayScore): string {
  return [
    pathway.pathwayId,
    pathway.pathwayName,
    formatNumber(pathway.score),
    formatNumber(pathway.targetsHit),
    formatNumber(pathway.coverageRatio),
    formatNumber(pathway.depth),
    formatNumber(pathway.pathwaySize),
    formatNumber(pathway.medianPotency),
    pathway.url,
  ]
    .map(csvField)
    .join(',');
}

export function exportMetadata(analysis: AnalysisResult): ExportMetadata {
  return {
    analysisId: analysis.analysisId,
    createdAt: analysis.createdAt,
    params: analysis.params,
    versionSnapshot: analysis.versionSnapshot,
    analysisFlags: analysis.analysisFlags,
    attribution: analysis.attribution,
    exportVersion: analysis.exportManifest.exportVersion,
  };
}

export function renderCsvExport(analysis: AnalysisResult): string {
  const metadata = exportMetadata(analysis);
  const lines = [
    `# export_version: ${formatNumber(metadata.exportVersion)}`,
    `# analysis_id: ${metadata.analysisId}`,
    `# created_at: ${metadata.createdAt}`,
    `# params: ${stableStringify(metadata.params)}`,
    `# version_snapshot: ${stableStringify(metadata.versionSnapshot)}`,
    `# analysis_flags: ${stableStringify(metadata.analysisFlags)}`,
    `# attribution: ${commentValue(metadata.attribution)}`,
    CSV_COLUMNS.join(','),
    ...analysis.pathways.map(csvRow),
  ];
  return lines.join('\n');
}

export function csvFileName(analysisId: string): string {
  return `${analysisId}-pathways.csv`;
}

export function buildJsonExport(analysis: AnalysisResult): JsonExport {
  return { metadata: exportMetadata(analysis), analysis };
}

export function renderJsonExport(analysis: AnalysisResult): string {
  return JSON.stringify(buildJsonExport(analysis));
}

/** Re-read a JSON export, validating it back into the analysis it was made from. */
export function parseJsonExport(text: string): AnalysisResult {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ValidationError('Export is not valid JSON');
  }

  const result = jsonExportSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError('Export does not match the expected format', {
      issues: formatIssues(result.error),
    });
  }
  const { metadata, analysis } = result.data;
  if (metadata.analysisId !== analysis.analysisId) {
    throw new ValidationError('Export metadata names a different analysis', {
      metadataAnalysisId: metadata.analysisId,
      analysisId: analysis.analysisId,
    });
  }
  return analysis;
}
