// Confidence tier assigned to an aggregated target
export const ConfidenceTier = {
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
} as const;
export type ConfidenceTier = (typeof ConfidenceTier)[keyof typeof ConfidenceTier];

// Whether a target maps onto a gene product in the pathway hierarchy
export const MappingStatus = {
  MAPPED: 'mapped',
  PARTIAL: 'partial',
  UNMAPPED: 'unmapped',
} as const;
export type MappingStatus = (typeof MappingStatus)[keyof typeof MappingStatus];

// Outcome of resolving a free-text compound query
export const ResolutionStatus = {
  RESOLVED: 'resolved',
  AMBIGUOUS: 'ambiguous',
  NOT_FOUND: 'not_found',
} as const;
export type ResolutionStatus = (typeof ResolutionStatus)[keyof typeof ResolutionStatus];

// How a candidate matched the query, strongest first
export const MatchKind = {
  EXACT_NAME: 'exact_name',
  SYNONYM: 'synonym',
  SUBSTRING: 'substring',
  PROVIDER: 'provider',
} as const;
export type MatchKind = (typeof MatchKind)[keyof typeof MatchKind];

export const NodeKind = {
  DRUG: 'drug',
  TARGET: 'target',
  PATHWAY: 'pathway',
} as const;
export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind];

export const EdgeKind = {
  DRUG_TARGET: 'drug_target',
  TARGET_PATHWAY: 'target_pathway',
} as const;
export type EdgeKind = (typeof EdgeKind)[keyof typeof EdgeKind];

// Tri-state evidence: absence of data is never collapsed into a negative claim
export const EvidenceState = {
  POSITIVE: 'positive',
  NEGATIVE: 'negative',
  UNKNOWN: 'unknown',
} as const;
export type EvidenceState = (typeof EvidenceState)[keyof typeof EvidenceState];

// Lifecycle of long-running work tracked outside a request
export const JobStatus = {
  QUEUED: 'queued',
  RUNNING: 'running',
  SUCCEEDED: 'succeeded',
  FAILED: 'failed',
  CANCELED: 'canceled',
} as const;
export type JobStatus = (typeof JobStatus)[keyof typeof JobStatus];

export const JobKind = {
  HIERARCHY_REBUILD: 'hierarchy_rebuild',
} as const;
export type JobKind = (typeof JobKind)[keyof typeof JobKind];

// How a target's accession was found and why it may not map, in the order the steps ran
export const MappingNote = {
  CHEMBL_ACCESSION: 'chembl_target_accession',
  UNIPROT_XREF: 'uniprot_xref_lookup',
  UNIPROT_GENE_SYMBOL: 'uniprot_gene_symbol',
  UNIPROT_UNMAPPED: 'uniprot_unmapped',
  UNIPROT_UNAVAILABLE: 'uniprot_unavailable',
  UNMAPPED_TARGET: 'unmapped_target',
} as const;
export type MappingNote = (typeof MappingNote)[keyof typeof MappingNote];

export const SourceStatus = {
  UP: 'up',
  DOWN: 'down',
} as const;
export type SourceStatus = (typeof SourceStatus)[keyof typeof SourceStatus];

// Upstream data sources whose versions are stamped on every analysis
export const DataSource = {
  CHEMBL: 'chembl',
  REACTOME: 'reactome',
  UNIPROT: 'uniprot',
  PUBCHEM: 'pubchem',
  OPENTARGETS: 'opentargets',
} as const;
export type DataSource = (typeof DataSource)[keyof typeof DataSource];

export const UNKNOWN_VERSION = 'unknown';
