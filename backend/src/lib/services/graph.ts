import { createHash } from 'crypto';
import {
  EdgeKind,
  NodeKind,
  type AssociationGraph,
  type CompoundIdentity,
  type GraphEdge,
  type GraphNode,
  type PathwayScore,
  type TargetSummary,
} from '@pathimpact/shared';

export function graphNodeId(kind: NodeKind, entityId: string): string {
  return `${kind}:${entityId}`;
}

export function graphEdgeId(source: string, target: string, kind: EdgeKind): string {
  const digest = createHash('sha256').update(`${source}|${target}|${kind}`).digest('hex');
  return `edge:${digest.slice(0, 16)}`;
}

function edge(source: string, target: string, kind: EdgeKind, weight: number, metadata: Record<string, unknown>): GraphEdge {
  return { id: graphEdgeId(source, target, kind), source, target, kind, weight, metadata };
}

// Drug first, then targets and pathways in the order given
export function buildAssociationGraph(
  resolution: CompoundIdentity,
  targets: readonly TargetSummary[],
  pathways: readonly PathwayScore[]
): AssociationGraph {
  const drugId = graphNodeId(NodeKind.DRUG, resolution.canonicalId);
  const nodes: GraphNode[] = [
    {
      id: drugId,
      label: resolution.displayName,
      kind: NodeKind.DRUG,
      metadata: {
        canonicalId: resolution.canonicalId,
        structureKey: resolution.structureKey,
        clinicalPhase: resolution.clinicalPhase,
        mechanismOfAction: resolution.mechanismOfAction,
      },
    },
  ];
  const edges: GraphEdge[] = [];

  const targetNodes = new Set<string>();
  for (const target of targets) {
    const id = graphNodeId(NodeKind.TARGET, target.targetId);
    targetNodes.add(id);
    nodes.push({
      id,
      label: target.targetName,
      kind: NodeKind.TARGET,
      metadata: {
        medianPotency: target.medianPotency,
        confidenceTier: target.confidenceTier,
        lowConfidence: target.lowConfidence,
        actionType: target.actionType,
        accession: target.accession,
        mappingStatus: target.mappingStatus,
        assayRange: { min: target.potencyMin, max: target.potencyMax, iqr: target.potencyIqr },
      },
    });
    edges.push(
      edge(drugId, id, EdgeKind.DRUG_TARGET, target.medianPotency, {
        actionType: target.actionType,
        assayCount: target.assayCount,
      })
    );
  }

  for (const pathway of pathways) {
    nodes.push({
      id: graphNodeId(NodeKind.PATHWAY, pathway.pathwayId),
      label: pathway.pathwayName,
      kind: NodeKind.PATHWAY,
      metadata: {
        score: pathway.score,
        coverageRatio: pathway.coverageRatio,
        depth: pathway.depth,
        url: pathway.url,
      },
    });
  }

  for (const pathway of pathways) {
    const pathwayNode = graphNodeId(NodeKind.PATHWAY, pathway.pathwayId);
    for (const targetId of pathway.targetIds) {
      const targetNode = graphNodeId(NodeKind.TARGET, targetId);
      // Hidden targets have no node, so they get no edge either
      if (!targetNodes.has(targetNode)) continue;
      edges.push(edge(targetNode, pathwayNode, EdgeKind.TARGET_PATHWAY, pathway.score, {}));
    }
  }

  return { nodes, edges };
}
