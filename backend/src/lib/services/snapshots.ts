import { ulid } from 'ulid';
import {
  DataSource,
  UNKNOWN_VERSION,
  type AnalysisResult,
  type ShareResponse,
  type ShareSnapshot,
  type VersionSnapshot,
} from '@pathimpact/shared';
import { config } from '../config.js';
import { getItem, isConditionalCheckFailure, putItem } from '../dynamodb.js';
import { ConflictError, DataIntegrityError, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';
import { compareIds } from '../stats.js';
import { analysisResultSchema } from '../validation.js';

const ANALYSES_TABLE = config.tables.analyses;
const SHARES_TABLE = config.tables.shares;

// Every known source is present; a source we could not version is "unknown", never omitted
export function captureVersionSnapshot(consulted: Readonly<Record<string, string | undefined>>): VersionSnapshot {
  const keys = new Set<string>([...Object.values(DataSource), ...Object.keys(consulted)]);
  const snapshot: VersionSnapshot = {};
  for (const key of [...keys].sort(compareIds)) {
    const version = consulted[key]?.trim();
    snapshot[key] = version ? version : UNKNOWN_VERSION;
  }
  return snapshot;
}

interface AnalysisItem {
  PK: string;
  SK: string;
  analysisId: string;
  canonicalId: string;
  createdAt: string;
  payload: string;
}

interface ShareItem {
  PK: string;
  SK: string;
  shareId: string;
  analysisId: string;
  createdAt: string;
  payload: string;
}

function parsePayload(entity: string, id: string, payload: string): AnalysisResult {
  const result = analysisResultSchema.safeParse(JSON.parse(payload));
  if (!result.success) {
    throw new DataIntegrityError(entity, id, 'stored payload failed validation');
  }
  return result.data;
}

export async function saveAnalysis(result: AnalysisResult): Promise<void> {
  const item: AnalysisItem = {
    PK: `ANALYSIS#${result.analysisId}`,
    SK: 'RESULT',
    analysisId: result.analysisId,
    canonicalId: result.canonicalId,
    createdAt: result.createdAt,
    payload: JSON.stringify(result),
  };

  try {
    await putItem({
      TableName: ANALYSES_TABLE,
      Item: item,
      ConditionExpression: 'attribute_not_exists(PK)',
    });
  } catch (error) {
    if (isConditionalCheckFailure(error)) {
      throw new ConflictError(`Analysis already stored: ${result.analysisId}`);
    }
    throw error;
  }
}

async function getAnalysisItem(analysisId: string): Promise<AnalysisItem> {
  const item = await getItem<AnalysisItem>({
    TableName: ANALYSES_TABLE,
    Key: { PK: `ANALYSIS#${analysisId}`, SK: 'RESULT' },
  });
  if (!item) {
    throw new NotFoundError('Analysis', analysisId);
  }
  return item;
}

export async function getAnalysis(analysisId: string): Promise<AnalysisResult> {
  const item = await getAnalysisItem(analysisId);
  return parsePayload('Analysis', analysisId, item.payload);
}

/**
 * Freeze a stored analysis under a new opaque id.
 *
 * The stored payload string is copied as is; shares are never recomputed, so
 * re-running the same drug later cannot change what a share shows.
 */
export async function createShare(analysisId: string): Promise<ShareResponse> {
  const analysis = await getAnalysisItem(analysisId);
  const shareId = ulid();
  const createdAt = new Date().toISOString();

  const item: ShareItem = {
    PK: `SHARE#${shareId}`,
    SK: 'SNAPSHOT',
    shareId,
    analysisId,
    createdAt,
    payload: analysis.payload,
  };

  try {
    await putItem({
      TableName: SHARES_TABLE,
      Item: item,
      ConditionExpression: 'attribute_not_exists(PK)',
    });
  } catch (error) {
    if (isConditionalCheckFailure(error)) {
      throw new ConflictError(`Share id already in use: ${shareId}`);
    }
    throw error;
  }

  logger.info({ shareId, analysisId }, 'Created share snapshot');
  return { shareId, analysisId, createdAt };
}

export async function getShare(shareId: string): Promise<ShareSnapshot> {
  const item = await getItem<ShareItem>({
    TableName: SHARES_TABLE,
    Key: { PK: `SHARE#${shareId}`, SK: 'SNAPSHOT' },
  });
  if (!item) {
    throw new NotFoundError('Share', shareId);
  }

  return {
    shareId: item.shareId,
    analysisId: item.analysisId,
    createdAt: item.createdAt,
    analysis: parsePayload('Share', shareId, item.payload),
  };
}
