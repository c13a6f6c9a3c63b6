import type { CompoundIdentity } from './compounds.js';
import type { EvidenceState } from './enums.js';
import type { AssociationGraph } from './graph.js';
import type { PathwayScore } from './pathways.js';
import type { AnalysisParams, TargetSummary } from './targets.js';

// Source name -> release/version string; missing versions are the literal "unknown"
export type VersionSnapshot = Record<string, string>;

// Quality signals: positive = issue present, negative = checked and absent
export interface AnalysisFlags {
  limitedData: EvidenceState;
  partialMapping: EvidenceState;
  highVariability: EvidenceState;
  directionUnknown: EvidenceState;
}

export interface ExportManifest {
  exportVersion: number;
  attributionText: string;
  parameterSnapshot: AnalysisParams;
}

export interface AnalysisResult {
  analysisId: string;
  createdAt: string;
  query: string;
  canonicalId: string;
  params: AnalysisParams;
  resolution: CompoundIdentity;
  targets: TargetSummary[];
  hiddenTargetCount: number;
  // Non-human targets dropped before aggregation
  excludedTargetIds: string[];
  pathways: PathwayScore[];
  graph: AssociationGraph;
  versionSnapshot: VersionSnapshot;
  analysisFlags: AnalysisFlags;
  degradedMessages: string[];
  attribution: string;
  exportManifest: ExportManifest;
}

// Frozen, read-only copy of an analysis referenced by an opaque id
export interface ShareSnapshot {
  shareId: string;
  analysisId: string;
  createdAt: string;
  analysis: AnalysisResult;
}

export interface CompareMetrics {
  targetJaccard: number;
  pathwayCosineSimilarity: number;
  sharedPathwayCount: number;
  uniquePathwayCountA: number;
  uniquePathwayCountB: number;
}

export interface PathwayComparisonRow {
  pathwayId: string;
  pathwayName: string;
  scoreA: number | null;
  scoreB: number | null;
  delta: number | null;
  shared: boolean;
}

export interface CompareResult {
  analysisA: AnalysisResult;
  analysisB: AnalysisResult;
  metrics: CompareMetrics;
  rows: PathwayComparisonRow[];
}

export interface ExportMetadata {
  analysisId: string;
  createdAt: string;
  params: AnalysisParams;
  versionSnapshot: VersionSnapshot;
  analysisFlags: AnalysisFlags;
  attribution: string;
  exportVersion: number;
}

export interface JsonExport {
  metadata: ExportMetadata;
  analysis: AnalysisResult;
}
