import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { HierarchySource } from '@pathimpact/shared';
import {
  HierarchySnapshot,
  buildHierarchy,
  clearSnapshotCache,
  loadCurrentSnapshot,
  publishSnapshot,
  readCurrentSnapshot,
} from './hierarchy.js';
import * as dynamodb from '../dynamodb.js';
import * as s3 from '../s3.js';
import { ConflictError, DataIntegrityError } from '../errors.js';

vi.mock('../dynamodb.js', () => ({
  getItem: vi.fn(),
  putItem: vi.fn(),
  isConditionalCheckFailure: vi.fn(
    (error: unknown) => error instanceof Error && error.name === 'ConditionalCheckFailedException'
  ),
}));

vi.mock('../s3.js', () => ({
  getObjectText: vi.fn(),
  putObject: vi.fn(),
}));

vi.mock('../config.js', () => ({
  config: {
    tables: { hierarchy: 'test-hierarchy-table' },
    buckets: { hierarchy: 'test-hierarchy-bucket' },
    scoring: {
      potencyThreshold: 5,
      minAssays: 2,
      includeLowConfidence: false,
      topPathways: 20,
      minDepth: 3,
      maxDepth: 5,
    },
  },
}));

const META = { version: 'v1', builtAt: '2026-01-01T00:00:00.000Z' };

// R ─ A ─ B ─ C, plus a shortcut R ─ C and a second root S ─ B
const source: HierarchySource = {
  release: '90',
  pathways: [
    { pathwayId: 'R', name: 'Root', geneProducts: [] },
    { pathwayId: 'S', name: 'Second root', geneProducts: ['G9'] },
    { pathwayId: 'A', name: 'Alpha', geneProducts: ['G1'] },
    { pathwayId: 'B', name: 'Beta', geneProducts: ['G2'] },
    { pathwayId: 'C', name: 'Gamma', geneProducts: ['G3'] },
  ],
  relations: [
    { parentId: 'R', childId: 'A' },
    { parentId: 'A', childId: 'B' },
    { parentId: 'B', childId: 'C' },
    { parentId: 'R', childId: 'C' },
    { parentId: 'S', childId: 'B' },
  ],
};

describe('buildHierarchy', () => {
  it('assigns shortest-path depth with roots at depth 1', () => {
    const { snapshot, issues } = buildHierarchy(source, META);
    expect(issues).toEqual([]);
    expect(snapshot.depth('R')).toBe(1);
    expect(snapshot.depth('S')).toBe(1);
    expect(snapshot.depth('A')).toBe(2);
    expect(snapshot.depth('B')).toBe(2);
    expect(snapshot.depth('C')).toBe(2);
  });

  it('keeps the smallest parent id when several parents tie', () => {
    const { snapshot } = buildHierarchy(source, META);
    // B is reachable at depth 2 through S only; A reaches it at depth 3
    expect(snapshot.ancestorsOf('B')).toEqual(['S']);
    expect(snapshot.ancestorsOf('C')).toEqual(['R']);
    expect(snapshot.childrenOf('R')).toEqual(['A', 'C']);
    expect(snapshot.childrenOf('A')).toEqual([]);
  });

  it('makes gene sets inclusive of descendants', () => {
    const { snapshot } = buildHierarchy(source, META);
    expect(snapshot.geneSet('R')).toEqual(['G1', 'G3']);
    expect(snapshot.geneSet('S')).toEqual(['G2', 'G9']);
    expect(snapshot.pathwaysForGene('G3')).toEqual(['C', 'R']);
  });

  it('reports cycles unreachable from any root and skips them', () => {
    const cyclic: HierarchySource = {
      release: '90',
      pathways: [
        { pathwayId: 'R', name: 'Root', geneProducts: ['G1'] },
        { pathwayId: 'X', name: 'Loop X', geneProducts: ['G2'] },
        { pathwayId: 'Y', name: 'Loop Y', geneProducts: ['G3'] },
      ],
      relations: [
        { parentId: 'X', childId: 'Y' },
        { parentId: 'Y', childId: 'X' },
      ],
    };
    const { snapshot, issues } = buildHierarchy(cyclic, META);
    expect(snapshot.size).toBe(1);
    expect(issues.map((issue) => issue.message)).toEqual([
      'Pathway X: unreachable from any root (cycle)',
      'Pathway Y: unreachable from any root (cycle)',
    ]);
  });

  it('collapses a back edge below a root without losing nodes', () => {
    const looped: HierarchySource = {
      release: '90',
      pathways: [
        { pathwayId: 'R', name: 'Root', geneProducts: [] },
        { pathwayId: 'A', name: 'A', geneProducts: ['G1'] },
        { pathwayId: 'B', name: 'B', geneProducts: ['G2'] },
      ],
      relations: [
        { parentId: 'R', childId: 'A' },
        { parentId: 'A', childId: 'B' },
        { parentId: 'B', childId: 'A' },
      ],
    };
    const { snapshot, issues } = buildHierarchy(looped, META);
    expect(issues).toEqual([]);
    expect(snapshot.depth('B')).toBe(3);
    expect(snapshot.ancestorsOf('B')).toEqual(['R', 'A']);
  });

  it('skips self references, unknown ids and duplicates', () => {
    const messy: HierarchySource = {
      release: '90',
      pathways: [
        { pathwayId: 'R', name: 'Root', geneProducts: [] },
        { pathwayId: 'R', name: 'Root again', geneProducts: [] },
      ],
      relations: [
        { parentId: 'R', childId: 'R' },
        { parentId: 'R', childId: 'MISSING' },
      ],
    };
    const { snapshot, issues } = buildHierarchy(messy, META);
    expect(snapshot.node('R')?.name).toBe('Root');
    expect(issues.map((issue) => issue.message)).toEqual([
      'Pathway R: duplicate pathway id',
      'Pathway R: self-referencing relation',
      'Pathway MISSING: relation names an unknown pathway',
    ]);
  });
});

describe('HierarchySnapshot', () => {
  it('returns empty lists for unknown pathways', () => {
    const snapshot = HierarchySnapshot.empty();
    expect(snapshot.release).toBe('unknown');
    expect(snapshot.ancestorsOf('nope')).toEqual([]);
    expect(snapshot.geneSet('nope')).toEqual([]);
    expect(snapshot.depth('nope')).toBeUndefined();
    expect(snapshot.hasGene('G1')).toBe(false);
  });

  it('round-trips through its serialized form', () => {
    const { snapshot } = buildHierarchy(source, META);
    const restored = HierarchySnapshot.fromData(JSON.parse(JSON.stringify(snapshot.toData())));
    expect(restored.toData()).toEqual(snapshot.toData());
    expect(restored.genes()).toEqual(['G1', 'G2', 'G3', 'G9']);
  });
});

describe('hierarchy store', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    clearSnapshotCache();
  });

  it('writes the object before flipping the pointer', async () => {
    const { snapshot } = buildHierarchy(source, META);
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce(null);

    const pointer = await publishSnapshot(snapshot);

    expect(pointer.objectKey).toBe('hierarchy/90/v1.json');
    expect(s3.putObject).toHaveBeenCalledWith(
      'test-hierarchy-bucket',
      'hierarchy/90/v1.json',
      JSON.stringify(snapshot.toData()),
      'application/json'
    );
    expect(dynamodb.putItem).toHaveBeenCalledWith(
      expect.objectContaining({
        TableName: 'test-hierarchy-table',
        ConditionExpression: 'attribute_not_exists(PK)',
      })
    );
    const putOrder = vi.mocked(s3.putObject).mock.invocationCallOrder[0];
    const pointerOrder = vi.mocked(dynamodb.putItem).mock.invocationCallOrder[0];
    expect(putOrder).toBeLessThan(pointerOrder);
  });

  it('guards the flip with the previously read version', async () => {
    const { snapshot } = buildHierarchy(source, { ...META, version: 'v2' });
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce({
      PK: 'HIERARCHY',
      SK: 'CURRENT',
      version: 'v1',
      release: '89',
      objectKey: 'hierarchy/89/v1.json',
      publishedAt: '2025-12-01T00:00:00.000Z',
    });

    await publishSnapshot(snapshot);

    expect(dynamodb.putItem).toHaveBeenCalledWith(
      expect.objectContaining({
        ConditionExpression: '#version = :expected',
        ExpressionAttributeValues: { ':expected': 'v1' },
      })
    );
  });

  it('turns a lost race into a ConflictError', async () => {
    const { snapshot } = buildHierarchy(source, META);
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce(null);
    vi.mocked(dynamodb.putItem).mockRejectedValueOnce(
      Object.assign(new Error('conditional failed'), { name: 'ConditionalCheckFailedException' })
    );

    await expect(publishSnapshot(snapshot)).rejects.toThrow(ConflictError);
  });

  it('returns an empty hierarchy when nothing has been published', async () => {
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce(null);
    const snapshot = await loadCurrentSnapshot();
    expect(snapshot.size).toBe(0);
    expect(snapshot.release).toBe('unknown');
  });

  it('loads the pointed-to snapshot once per version', async () => {
    const { snapshot } = buildHierarchy(source, META);
    const pointer = {
      PK: 'HIERARCHY',
      SK: 'CURRENT',
      version: 'v1',
      release: '90',
      objectKey: 'hierarchy/90/v1.json',
      publishedAt: '2026-01-01T00:00:00.000Z',
    };
    vi.mocked(dynamodb.getItem).mockResolvedValue(pointer);
    vi.mocked(s3.getObjectText).mockResolvedValue(JSON.stringify(snapshot.toData()));

    const first = await loadCurrentSnapshot();
    const second = await loadCurrentSnapshot();

    expect(first).toBe(second);
    expect(first.depth('C')).toBe(2);
    expect(s3.getObjectText).toHaveBeenCalledTimes(1);
  });

  it('keeps only the current version in memory', async () => {
    const v1 = buildHierarchy(source, META).snapshot;
    const v2 = buildHierarchy(source, { ...META, version: 'v2' }).snapshot;
    const pointerTo = (version: string) => ({
      PK: 'HIERARCHY',
      SK: 'CURRENT',
      version,
      release: '90',
      objectKey: `hierarchy/90/${version}.json`,
      publishedAt: '2026-01-01T00:00:00.000Z',
    });
    vi.mocked(dynamodb.getItem)
      .mockResolvedValueOnce(pointerTo('v1'))
      .mockResolvedValueOnce(pointerTo('v2'))
      .mockResolvedValueOnce(pointerTo('v1'));
    vi.mocked(s3.getObjectText)
      .mockResolvedValueOnce(JSON.stringify(v1.toData()))
      .mockResolvedValueOnce(JSON.stringify(v2.toData()))
      .mockResolvedValueOnce(JSON.stringify(v1.toData()));

    expect((await loadCurrentSnapshot()).version).toBe('v1');
    expect((await loadCurrentSnapshot()).version).toBe('v2');
    expect((await loadCurrentSnapshot()).version).toBe('v1');
    expect(s3.getObjectText).toHaveBeenCalledTimes(3);
  });

  describe('when the pointed-to object is unusable', () => {
    const pointer = {
      PK: 'HIERARCHY',
      SK: 'CURRENT',
      version: 'v9',
      release: '90',
      objectKey: 'hierarchy/90/v9.json',
      publishedAt: '2026-01-01T00:00:00.000Z',
    };

    beforeEach(() => {
      vi.mocked(dynamodb.getItem).mockResolvedValue(pointer);
    });

    it('reports a missing object as a data integrity problem', async () => {
      vi.mocked(s3.getObjectText).mockResolvedValue(null);

      const error = await readCurrentSnapshot().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DataIntegrityError);
      expect(error).toHaveProperty('message', 'HierarchySnapshot v9: snapshot object missing');
    });

    it('reports a body that is not JSON', async () => {
      vi.mocked(s3.getObjectText).mockResolvedValue('{"release":');

      await expect(readCurrentSnapshot()).rejects.toThrow(
        'HierarchySnapshot v9: snapshot object is not valid JSON'
      );
    });

    it('reports a body with the wrong shape', async () => {
      vi.mocked(s3.getObjectText).mockResolvedValue(JSON.stringify({ release: '90' }));

      await expect(readCurrentSnapshot()).rejects.toThrow(
        'HierarchySnapshot v9: snapshot object has an unexpected shape'
      );
    });

    it('falls back to an empty hierarchy on the request path', async () => {
      vi.mocked(s3.getObjectText).mockResolvedValue(null);

      const snapshot = await loadCurrentSnapshot();

      expect(snapshot.size).toBe(0);
      expect(snapshot.release).toBe('unknown');
    });

    it('falls back when the object store itself fails', async () => {
      vi.mocked(s3.getObjectText).mockRejectedValue(new Error('SlowDown'));

      expect((await loadCurrentSnapshot()).size).toBe(0);
    });
  });
});
