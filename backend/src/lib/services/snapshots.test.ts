import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  captureVersionSnapshot,
  createShare,
  getAnalysis,
  getShare,
  saveAnalysis,
} from './snapshots.js';
import * as dynamodb from '../dynamodb.js';
import { ConflictError, DataIntegrityError, NotFoundError } from '../errors.js';
import { makeAnalysis, makePathway, makeTarget } from '../../test/fixtures.js';

vi.mock('../dynamodb.js', () => ({
  getItem: vi.fn(),
  putItem: vi.fn(),
  isConditionalCheckFailure: vi.fn(
    (error: unknown) => error instanceof Error && error.name === 'ConditionalCheckFailedException'
  ),
}));

vi.mock('../config.js', () => ({
  config: {
    tables: { analyses: 'test-analyses-table', shares: 'test-shares-table' },
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

vi.mock('ulid', () => ({
  ulid: () => '01HN8Y1ZBPVD60W3YB6S5PQNRC',
}));

const analysis = makeAnalysis({
  targets: [makeTarget('T1')],
  pathways: [makePathway('P1', 0.35, { targetIds: ['T1'] })],
});

const storedItem = {
  PK: `ANALYSIS#${analysis.analysisId}`,
  SK: 'RESULT',
  analysisId: analysis.analysisId,
  canonicalId: analysis.canonicalId,
  createdAt: analysis.createdAt,
  payload: JSON.stringify(analysis),
};

describe('captureVersionSnapshot', () => {
  it('lists every known source, marking unversioned ones unknown', () => {
    expect(captureVersionSnapshot({ chembl: '34', reactome: '90', uniprot: '  ' })).toEqual({
      chembl: '34',
      opentargets: 'unknown',
      pubchem: 'unknown',
      reactome: '90',
      uniprot: 'unknown',
    });
  });

  it('keeps extra consulted sources and sorts keys', () => {
    const snapshot = captureVersionSnapshot({ gtex: 'v8' });
    expect(Object.keys(snapshot)).toEqual(['chembl', 'gtex', 'opentargets', 'pubchem', 'reactome', 'uniprot']);
    expect(snapshot.gtex).toBe('v8');
  });
});

describe('analysis store', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('stores the serialized result under a fresh key', async () => {
    await saveAnalysis(analysis);
    expect(dynamodb.putItem).toHaveBeenCalledWith({
      TableName: 'test-analyses-table',
      Item: storedItem,
      ConditionExpression: 'attribute_not_exists(PK)',
    });
  });

  it('refuses to overwrite an existing analysis', async () => {
    vi.mocked(dynamodb.putItem).mockRejectedValueOnce(
      Object.assign(new Error('conditional failed'), { name: 'ConditionalCheckFailedException' })
    );
    await expect(saveAnalysis(analysis)).rejects.toThrow(ConflictError);
  });

  it('reads a stored analysis back', async () => {
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce(storedItem);
    expect(await getAnalysis(analysis.analysisId)).toEqual(analysis);
  });

  it('throws NotFoundError for unknown analyses', async () => {
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce(null);
    await expect(getAnalysis('01ARZ3NDEKTSV4RRFFQ69G5FAW')).rejects.toThrow(NotFoundError);
  });

  it('reports a payload that no longer validates', async () => {
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce({ ...storedItem, payload: '{"analysisId":"x"}' });
    await expect(getAnalysis(analysis.analysisId)).rejects.toThrow(DataIntegrityError);
  });
});

describe('shares', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('copies the stored payload verbatim under a new id', async () => {
    // Whitespace is preserved, not re-serialized
    const payload = JSON.stringify(analysis, null, 2);
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce({ ...storedItem, payload });

    const share = await createShare(analysis.analysisId);

    expect(share.shareId).toBe('01HN8Y1ZBPVD60W3YB6S5PQNRC');
    expect(share.analysisId).toBe(analysis.analysisId);
    const put = vi.mocked(dynamodb.putItem).mock.calls[0][0];
    expect(put.TableName).toBe('test-shares-table');
    expect(put.ConditionExpression).toBe('attribute_not_exists(PK)');
    expect(put.Item).toMatchObject({
      PK: 'SHARE#01HN8Y1ZBPVD60W3YB6S5PQNRC',
      SK: 'SNAPSHOT',
      payload,
    });
  });

  it('does not share an analysis that was never stored', async () => {
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce(null);
    await expect(createShare('01ARZ3NDEKTSV4RRFFQ69G5FAW')).rejects.toThrow(
      'Analysis not found: 01ARZ3NDEKTSV4RRFFQ69G5FAW'
    );
    expect(dynamodb.putItem).not.toHaveBeenCalled();
  });

  it('returns the frozen analysis for a share', async () => {
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce({
      PK: 'SHARE#01HN8Y1ZBPVD60W3YB6S5PQNRC',
      SK: 'SNAPSHOT',
      shareId: '01HN8Y1ZBPVD60W3YB6S5PQNRC',
      analysisId: analysis.analysisId,
      createdAt: '2026-02-01T00:00:00.000Z',
      payload: JSON.stringify(analysis),
    });

    expect(await getShare('01HN8Y1ZBPVD60W3YB6S5PQNRC')).toEqual({
      shareId: '01HN8Y1ZBPVD60W3YB6S5PQNRC',
      analysisId: analysis.analysisId,
      createdAt: '2026-02-01T00:00:00.000Z',
      analysis,
    });
  });

  it('throws NotFoundError for unknown shares', async () => {
    vi.mocked(dynamodb.getItem).mockResolvedValueOnce(null);
    await expect(getShare('01HN8Y1ZBPVD60W3YB6S5PQNRD')).rejects.toThrow(NotFoundError);
  });
});
