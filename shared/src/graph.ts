import type { EdgeKind, NodeKind } from './enums.js';

export interface GraphNode {
  id: string;
  label: string;
  kind: NodeKind;
  metadata: Record<string, unknown>;
}

export interface GraphEdge {
  id: string;
  source: string;
  target: string;
  kind: EdgeKind;
  weight: number;
  metadata: Record<string, unknown>;
}

export interface AssociationGraph {
  nodes: GraphNode[];
  edges: GraphEdge[];
}
