import type { MappingNote, MatchKind, ResolutionStatus } from './enums.js';

// Canonical compound identity; immutable once resolved
export interface CompoundIdentity {
  canonicalId: string;
  displayName: string;
  structureKey: string;
  synonyms: string[];
  clinicalPhase: number | null;
  mechanismOfAction: string | null;
}

// Raw identity record returned by an identity/search provider
export interface IdentityRecord {
  canonicalId: string;
  displayName: string;
  structureKey: string;
  synonyms: string[];
  clinicalPhase?: number | null;
  mechanismOfAction?: string | null;
}

// Autocomplete entry; not resolved to a canonical parent
export interface CompoundSuggestion {
  compoundId: string;
  displayName: string;
}

export interface ResolutionCandidate {
  canonicalId: string;
  displayName: string;
  structureKey: string;
  matchKind: MatchKind;
  matchReasons: string[];
}

export interface ResolutionResult {
  query: string;
  status: ResolutionStatus;
  identity: CompoundIdentity | null;
  candidates: ResolutionCandidate[];
}

// One bioactivity measurement as delivered by the activity provider
export interface ActivityRecord {
  targetId: string;
  potency: number | null;
  assayId: string;
  relation: string;
  valid: boolean;
}

// Per-target annotation used for confidence priors and hierarchy mapping
export interface TargetAnnotation {
  targetId: string;
  name: string;
  geneSymbol: string | null;
  accession: string | null;
  secondaryAccessions: string[];
  priorConfidence: number | null;
  organism: string | null;
  actionType: string | null;
  mappingNotes: MappingNote[];
}

// Annotations for one compound's targets plus the compound-level mechanism text
export interface TargetAnnotationSet {
  mechanismOfAction: string | null;
  annotations: TargetAnnotation[];
}
