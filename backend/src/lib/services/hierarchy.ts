import type { HierarchySnapshotData, HierarchySource, PathwayNode } from '@pathimpact/shared';
import { UNKNOWN_VERSION } from '@pathimpact/shared';
import { config } from '../config.js';
import { getItem, isConditionalCheckFailure, putItem } from '../dynamodb.js';
import { ConflictError, DataIntegrityError } from '../errors.js';
import { logger } from '../logger.js';
import { getObjectText, putObject } from '../s3.js';
import { compareIds } from '../stats.js';
import { hierarchySnapshotDataSchema } from '../validation.js';

const TABLE = config.tables.hierarchy;
const BUCKET = config.buckets.hierarchy;

const NO_IDS: readonly string[] = Object.freeze([]);

type StoredNode = Readonly<{
  pathwayId: string;
  name: string;
  depth: number;
  geneSet: readonly string[];
  ancestorIds: readonly string[];
  childIds: readonly string[];
}>;

/**
 * Point-in-time, read-only view of the pathway hierarchy.
 *
 * Instances are never mutated after construction. A rebuild produces a new
 * snapshot with a new version, and readers keep whichever instance they were
 * handed for the whole of their run.
 */
export class HierarchySnapshot {
  private readonly nodes: ReadonlyMap<string, StoredNode>;
  private readonly geneIndex: ReadonlyMap<string, readonly string[]>;

  constructor(
    readonly release: string,
    readonly version: string,
    readonly builtAt: string,
    nodes: PathwayNode[]
  ) {
    const byId = new Map<string, StoredNode>();
    const genes = new Map<string, string[]>();
    for (const node of [...nodes].sort((a, b) => compareIds(a.pathwayId, b.pathwayId))) {
      byId.set(
        node.pathwayId,
        Object.freeze({
          ...node,
          geneSet: Object.freeze([...node.geneSet]),
          ancestorIds: Object.freeze([...node.ancestorIds]),
          childIds: Object.freeze([...node.childIds]),
        })
      );
      for (const gene of node.geneSet) {
        const pathways = genes.get(gene) ?? [];
        pathways.push(node.pathwayId);
        genes.set(gene, pathways);
      }
    }
    this.nodes = byId;
    this.geneIndex = genes;
  }

  static empty(): HierarchySnapshot {
    return new HierarchySnapshot(UNKNOWN_VERSION, 'empty', new Date(0).toISOString(), []);
  }

  static fromData(data: HierarchySnapshotData): HierarchySnapshot {
    return new HierarchySnapshot(data.release, data.version, data.builtAt, data.nodes);
  }

  toData(): HierarchySnapshotData {
    return {
      release: this.release,
      version: this.version,
      builtAt: this.builtAt,
      nodes: [...this.nodes.values()].map((node) => ({
        ...node,
        geneSet: [...node.geneSet],
        ancestorIds: [...node.ancestorIds],
        childIds: [...node.childIds],
      })),
    };
  }

  get size(): number {
    return this.nodes.size;
  }

  pathwayIds(): string[] {
    return [...this.nodes.keys()];
  }

  node(pathwayId: string): StoredNode | undefined {
    return this.nodes.get(pathwayId);
  }

  // Root first
  ancestorsOf(pathwayId: string): readonly string[] {
    return this.nodes.get(pathwayId)?.ancestorIds ?? NO_IDS;
  }

  childrenOf(pathwayId: string): readonly string[] {
    return this.nodes.get(pathwayId)?.childIds ?? NO_IDS;
  }

  geneSet(pathwayId: string): readonly string[] {
    return this.nodes.get(pathwayId)?.geneSet ?? NO_IDS;
  }

  depth(pathwayId: string): number | undefined {
    return this.nodes.get(pathwayId)?.depth;
  }

  pathwaysForGene(accession: string): readonly string[] {
    return this.geneIndex.get(accession) ?? NO_IDS;
  }

  hasGene(accession: string): boolean {
    return this.geneIndex.has(accession);
  }

  genes(): string[] {
    return [...this.geneIndex.keys()].sort(compareIds);
  }
}

export interface BuildResult {
  snapshot: HierarchySnapshot;
  issues: DataIntegrityError[];
}

/**
 * Collapse raw pathway relations into a tree.
 *
 * Roots sit at depth 1. Depth is the shortest root-to-node distance, and a
 * node reached by several parents at that depth keeps the smallest parent id.
 * Gene sets are widened to include every descendant's genes.
 */
export function buildHierarchy(
  source: HierarchySource,
  meta: { version: string; builtAt: string }
): BuildResult {
  const issues: DataIntegrityError[] = [];
  const pathways = new Map<string, { name: string; genes: Set<string> }>();

  for (const pathway of source.pathways) {
    if (pathways.has(pathway.pathwayId)) {
      issues.push(new DataIntegrityError('Pathway', pathway.pathwayId, 'duplicate pathway id'));
      continue;
    }
    pathways.set(pathway.pathwayId, { name: pathway.name, genes: new Set(pathway.geneProducts) });
  }

  const children = new Map<string, Set<string>>();
  const hasParent = new Set<string>();
  for (const { parentId, childId } of source.relations) {
    if (parentId === childId) {
      issues.push(new DataIntegrityError('Pathway', childId, 'self-referencing relation'));
      continue;
    }
    if (!pathways.has(parentId) || !pathways.has(childId)) {
      const missing = pathways.has(parentId) ? childId : parentId;
      issues.push(new DataIntegrityError('Pathway', missing, 'relation names an unknown pathway'));
      continue;
    }
    const set = children.get(parentId) ?? new Set<string>();
    set.add(childId);
    children.set(parentId, set);
    hasParent.add(childId);
  }

  const depth = new Map<string, number>();
  const treeParent = new Map<string, string>();
  let frontier = [...pathways.keys()].filter((id) => !hasParent.has(id)).sort(compareIds);
  for (const root of frontier) depth.set(root, 1);

  for (let level = 2; frontier.length > 0; level++) {
    const reachedBy = new Map<string, string>();
    for (const parentId of frontier) {
      for (const childId of children.get(parentId) ?? []) {
        if (depth.has(childId)) continue;
        const current = reachedBy.get(childId);
        if (current === undefined || compareIds(parentId, current) < 0) {
          reachedBy.set(childId, parentId);
        }
      }
    }
    for (const [childId, parentId] of reachedBy) {
      depth.set(childId, level);
      treeParent.set(childId, parentId);
    }
    frontier = [...reachedBy.keys()].sort(compareIds);
  }

  for (const id of pathways.keys()) {
    if (!depth.has(id)) {
      issues.push(new DataIntegrityError('Pathway', id, 'unreachable from any root (cycle)'));
    }
  }

  const ancestors = (id: string): string[] => {
    const chain: string[] = [];
    for (let parent = treeParent.get(id); parent !== undefined; parent = treeParent.get(parent)) {
      chain.unshift(parent);
    }
    return chain;
  };

  const treeChildren = new Map<string, string[]>();
  for (const [childId, parentId] of treeParent) {
    const list = treeChildren.get(parentId) ?? [];
    list.push(childId);
    treeChildren.set(parentId, list);
  }

  // Deepest first so every child's inclusive set is ready before its parent
  const ordered = [...depth.entries()].sort((a, b) => b[1] - a[1] || compareIds(a[0], b[0]));
  const inclusive = new Map<string, Set<string>>();
  for (const [id] of ordered) {
    const genes = new Set(pathways.get(id)?.genes ?? []);
    for (const childId of treeChildren.get(id) ?? []) {
      for (const gene of inclusive.get(childId) ?? []) genes.add(gene);
    }
    inclusive.set(id, genes);
  }

  const nodes: PathwayNode[] = ordered.map(([id, nodeDepth]) => ({
    pathwayId: id,
    name: pathways.get(id)?.name ?? id,
    depth: nodeDepth,
    geneSet: [...(inclusive.get(id) ?? [])].sort(compareIds),
    ancestorIds: ancestors(id),
    childIds: [...(treeChildren.get(id) ?? [])].sort(compareIds),
  }));

  for (const issue of issues) {
    logger.warn({ entityId: issue.entityId, reason: issue.message }, 'Skipping hierarchy entity');
  }

  return {
    snapshot: new HierarchySnapshot(source.release, meta.version, meta.builtAt, nodes),
    issues,
  };
}

// ---------------------------------------------------------------------------
// Published snapshots: immutable S3 objects behind a single DynamoDB pointer

interface HierarchyPointer {
  PK: string;
  SK: string;
  version: string;
  release: string;
  objectKey: string;
  publishedAt: string;
}

const POINTER_KEY = { PK: 'HIERARCHY', SK: 'CURRENT' } as const;

// Only the current version is kept; a pointer flip replaces it
let current: HierarchySnapshot | null = null;

export function snapshotObjectKey(release: string, version: string): string {
  return `hierarchy/${release}/${version}.json`;
}

export async function publishSnapshot(snapshot: HierarchySnapshot): Promise<HierarchyPointer> {
  const previous = await getItem<HierarchyPointer>({ TableName: TABLE, Key: POINTER_KEY });
  const objectKey = snapshotObjectKey(snapshot.release, snapshot.version);

  // The object is complete before any reader can be pointed at it
  await putObject(BUCKET, objectKey, JSON.stringify(snapshot.toData()), 'application/json');

  const pointer: HierarchyPointer = {
    ...POINTER_KEY,
    version: snapshot.version,
    release: snapshot.release,
    objectKey,
    publishedAt: new Date().toISOString(),
  };

  try {
    await putItem({
      TableName: TABLE,
      Item: pointer,
      ...(previous
        ? {
            ConditionExpression: '#version = :expected',
            ExpressionAttributeNames: { '#version': 'version' },
            ExpressionAttributeValues: { ':expected': previous.version },
          }
        : { ConditionExpression: 'attribute_not_exists(PK)' }),
    });
  } catch (error) {
    if (isConditionalCheckFailure(error)) {
      throw new ConflictError('Hierarchy pointer moved during publish');
    }
    throw error;
  }

  current = snapshot;
  logger.info(
    { release: snapshot.release, version: snapshot.version, previous: previous?.version },
    'Published hierarchy snapshot'
  );
  return pointer;
}

/**
 * Read the published snapshot named by the pointer.
 * A missing pointer reads as the empty hierarchy; a pointer whose object is
 * missing or malformed is a DataIntegrityError.
 */
export async function readCurrentSnapshot(): Promise<HierarchySnapshot> {
  const pointer = await getItem<HierarchyPointer>({ TableName: TABLE, Key: POINTER_KEY });
  if (!pointer) {
    logger.warn('No hierarchy snapshot published; scoring against an empty hierarchy');
    return HierarchySnapshot.empty();
  }

  if (current?.version === pointer.version) return current;

  const body = await getObjectText(BUCKET, pointer.objectKey);
  if (body === null) {
    throw new DataIntegrityError('HierarchySnapshot', pointer.version, 'snapshot object missing');
  }
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch {
    throw new DataIntegrityError('HierarchySnapshot', pointer.version, 'snapshot object is not valid JSON');
  }
  const parsed = hierarchySnapshotDataSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataIntegrityError('HierarchySnapshot', pointer.version, 'snapshot object has an unexpected shape');
  }

  current = HierarchySnapshot.fromData(parsed.data);
  return current;
}

// Request path: an unreadable hierarchy degrades to target-only results
export async function loadCurrentSnapshot(): Promise<HierarchySnapshot> {
  try {
    return await readCurrentSnapshot();
  } catch (error) {
    logger.error({ err: error }, 'Hierarchy snapshot unreadable; scoring against an empty hierarchy');
    return HierarchySnapshot.empty();
  }
}

export function clearSnapshotCache(): void {
  current = null;
}
