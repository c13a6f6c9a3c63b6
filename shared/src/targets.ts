import type { ConfidenceTier, EvidenceState, MappingNote, MappingStatus } from './enums.js';

export interface TargetSummary {
  targetId: string;
  targetName: string;
  geneSymbol: string | null;
  accession: string | null;
  medianPotency: number;
  assayCount: number;
  potencyMin: number;
  potencyMax: number;
  potencyIqr: number;
  priorConfidence: number;
  confidenceTier: ConfidenceTier;
  confidenceReasons: string[];
  lowConfidence: boolean;
  mappingStatus: MappingStatus;
  mappedAccessions: string[];
  mappingNotes: MappingNote[];
  actionType: string | null;
  directionEvidence: EvidenceState;
  sourceAssayIds: string[];
}

// Tunable parameters shared by every stage of one analysis run
export interface AnalysisParams {
  potencyThreshold: number;
  minAssays: number;
  includeLowConfidence: boolean;
  topPathways: number;
  minDepth: number;
  maxDepth: number;
}
