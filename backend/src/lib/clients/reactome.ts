/**
 * Reactome ContentService: release version, species event hierarchy and
 * UniProt accession to lowest-level pathway mapping.
 */
import { z } from 'zod';
import type { HierarchySource } from '@pathimpact/shared';
import { config } from '../config.js';
import { buildUrl, getJson, getText } from '../http.js';
import { compareIds } from '../stats.js';

const SOURCE = 'reactome';
const PATHWAY_TYPES = new Set(['Pathway', 'TopLevelPathway']);

export interface EventNode {
  stId: string;
  name: string;
  type: string;
  children?: EventNode[];
}

const eventNodeSchema: z.ZodType<EventNode> = z.lazy(() =>
  z.object({
    stId: z.string(),
    name: z.string(),
    type: z.string(),
    children: z.array(eventNodeSchema).optional(),
  })
);

const mappedPathwaysSchema = z.array(
  z.object({
    stId: z.string(),
    displayName: z.string().optional(),
  })
);

/**
 * Flatten an event tree into pathways and parent/child relations.
 * Reactions are dropped; a pathway listed under several parents appears once.
 */
export function flattenEvents(roots: readonly EventNode[]): Omit<HierarchySource, 'release'> {
  const names = new Map<string, string>();
  const relations = new Map<string, { parentId: string; childId: string }>();

  const visit = (node: EventNode, parentId: string | null): void => {
    if (!PATHWAY_TYPES.has(node.type)) return;
    if (parentId !== null) {
      relations.set(`${parentId}>${node.stId}`, { parentId, childId: node.stId });
    }
    if (names.has(node.stId)) return;
    names.set(node.stId, node.name);
    for (const child of node.children ?? []) visit(child, node.stId);
  };
  for (const root of roots) visit(root, null);

  return {
    pathways: [...names.entries()]
      .sort(([a], [b]) => compareIds(a, b))
      .map(([pathwayId, name]) => ({ pathwayId, name, geneProducts: [] })),
    relations: [...relations.values()],
  };
}

export class ReactomeClient {
  constructor(
    private readonly baseUrl: string = config.upstream.reactomeBaseUrl,
    private readonly timeoutMs: number = config.upstream.requestTimeoutMs
  ) {}

  async releaseVersion(): Promise<string | null> {
    return getText(SOURCE, buildUrl(this.baseUrl, '/data/database/version'), { timeoutMs: this.timeoutMs });
  }

  async eventHierarchy(taxonId: string = config.etl.speciesTaxonId): Promise<EventNode[]> {
    const body = await getJson(
      SOURCE,
      buildUrl(this.baseUrl, `/data/eventsHierarchy/${encodeURIComponent(taxonId)}`),
      z.array(eventNodeSchema),
      { timeoutMs: this.timeoutMs }
    );
    return body ?? [];
  }

  // Lowest-level pathways containing the accession; unknown accessions map to nothing
  async pathwaysForAccession(accession: string, taxonId: string = config.etl.speciesTaxonId): Promise<string[]> {
    const body = await getJson(
      SOURCE,
      buildUrl(this.baseUrl, `/data/mapping/UniProt/${encodeURIComponent(accession)}/pathways`, {
        species: taxonId,
      }),
      mappedPathwaysSchema,
      { timeoutMs: this.timeoutMs }
    );
    return [...new Set((body ?? []).map((pathway) => pathway.stId))].sort(compareIds);
  }
}
