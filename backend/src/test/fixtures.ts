// Builders for analysis payloads used across service tests
import type {
  AnalysisParams,
  AnalysisResult,
  CompoundIdentity,
  PathwayScore,
  TargetSummary,
} from '@pathimpact/shared';
import type { IdentityCache } from '../lib/services/resolver.js';
import { compareIds } from '../lib/stats.js';

export const defaultParams: AnalysisParams = {
  potencyThreshold: 5,
  minAssays: 2,
  includeLowConfidence: false,
  topPathways: 20,
  minDepth: 3,
  maxDepth: 5,
};

export function makeIdentity(overrides: Partial<CompoundIdentity> = {}): CompoundIdentity {
  return {
    canonicalId: 'CHEMBL1',
    displayName: 'Examplinib',
    structureKey: 'KEY-A',
    synonyms: [],
    clinicalPhase: null,
    mechanismOfAction: null,
    ...overrides,
  };
}

export function makeTarget(targetId: string, overrides: Partial<TargetSummary> = {}): TargetSummary {
  return {
    targetId,
    targetName: `${targetId} name`,
    geneSymbol: null,
    accession: null,
    medianPotency: 7,
    assayCount: 3,
    potencyMin: 6.5,
    potencyMax: 7.5,
    potencyIqr: 0.5,
    priorConfidence: 9,
    confidenceTier: 'high',
    confidenceReasons: ['rule:high'],
    lowConfidence: false,
    mappingStatus: 'mapped',
    mappedAccessions: [],
    mappingNotes: [],
    actionType: 'INHIBITOR',
    directionEvidence: 'positive',
    sourceAssayIds: ['A1'],
    ...overrides,
  };
}

export function makePathway(pathwayId: string, score: number, overrides: Partial<PathwayScore> = {}): PathwayScore {
  return {
    pathwayId,
    pathwayName: `Pathway ${pathwayId}`,
    depth: 3,
    pathwaySize: 10,
    targetsHit: 1,
    medianPotency: 7,
    score,
    coverageRatio: 0.1,
    targetIds: [],
    ancestorPathwayIds: [],
    url: `https://reactome.org/content/detail/${pathwayId}`,
    ...overrides,
  };
}

export function makeAnalysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  const params = overrides.params ?? defaultParams;
  return {
    analysisId: '01ARZ3NDEKTSV4RRFFQ69G5FAV',
    createdAt: '2026-01-01T00:00:00.000Z',
    query: 'examplinib',
    canonicalId: 'CHEMBL1',
    params,
    resolution: makeIdentity(),
    targets: [],
    hiddenTargetCount: 0,
    excludedTargetIds: [],
    pathways: [],
    graph: { nodes: [], edges: [] },
    versionSnapshot: {
      chembl: '34',
      opentargets: 'unknown',
      pubchem: 'unknown',
      reactome: '90',
      uniprot: 'unknown',
    },
    analysisFlags: {
      limitedData: 'negative',
      partialMapping: 'negative',
      highVariability: 'negative',
      directionUnknown: 'negative',
    },
    degradedMessages: [],
    attribution: 'Data sources: test attribution.',
    exportManifest: {
      exportVersion: 1,
      attributionText: 'Data sources: test attribution.',
      parameterSnapshot: params,
    },
    ...overrides,
  };
}

// Map-backed identity cache for resolver and analysis tests
export class InMemoryIdentityCache implements IdentityCache {
  private readonly byId = new Map<string, CompoundIdentity>();

  async get(canonicalId: string): Promise<CompoundIdentity | null> {
    return this.byId.get(canonicalId) ?? null;
  }

  async getByStructureKey(structureKey: string): Promise<CompoundIdentity | null> {
    const matches = [...this.byId.values()]
      .filter((identity) => identity.structureKey === structureKey)
      .sort((a, b) => compareIds(a.canonicalId, b.canonicalId));
    return matches[0] ?? null;
  }

  async put(identity: CompoundIdentity): Promise<void> {
    this.byId.set(identity.canonicalId, identity);
  }
}
