// Node of the ETL-built pathway hierarchy, collapsed to a tree
export interface PathwayNode {
  pathwayId: string;
  name: string;
  depth: number;
  geneSet: string[];
  ancestorIds: string[];
  childIds: string[];
}

// Raw ETL input before the hierarchy is collapsed
export interface HierarchySource {
  release: string;
  pathways: Array<{
    pathwayId: string;
    name: string;
    geneProducts: string[];
  }>;
  relations: Array<{
    parentId: string;
    childId: string;
  }>;
}

// Serialized form of a published hierarchy snapshot
export interface HierarchySnapshotData {
  release: string;
  version: string;
  builtAt: string;
  nodes: PathwayNode[];
}

export interface PathwayScore {
  pathwayId: string;
  pathwayName: string;
  depth: number;
  pathwaySize: number;
  targetsHit: number;
  medianPotency: number;
  score: number;
  coverageRatio: number;
  targetIds: string[];
  ancestorPathwayIds: string[];
  url: string;
}
