import {
  MatchKind,
  ResolutionStatus,
  type CompoundIdentity,
  type IdentityRecord,
  type ResolutionCandidate,
  type ResolutionResult,
} from '@pathimpact/shared';
import { config } from '../config.js';
import { getItem, putItem, queryItems } from '../dynamodb.js';
import { UpstreamUnavailableError, ValidationError } from '../errors.js';
import { logger, type Logger } from '../logger.js';
import { withRetry, type RetryOptions } from '../retry.js';
import { compareIds } from '../stats.js';

const TABLE = config.tables.compounds;

// Search side of the compound registry
export interface IdentityProvider {
  searchByName(normalizedQuery: string): Promise<IdentityRecord[]>;
  lookupByStructureKey(structureKey: string): Promise<IdentityRecord[]>;
}

// External structure standardizer; throws ValidationError for unparseable input
export interface StructureStandardizer {
  standardize(structure: string): Promise<string>;
}

export interface IdentityCache {
  get(canonicalId: string): Promise<CompoundIdentity | null>;
  getByStructureKey(structureKey: string): Promise<CompoundIdentity | null>;
  put(identity: CompoundIdentity): Promise<void>;
}

export interface ResolverDeps {
  provider: IdentityProvider;
  cache: IdentityCache;
  retry?: RetryOptions;
  log?: Logger;
}

const MATCH_RANK: Record<MatchKind, number> = {
  [MatchKind.EXACT_NAME]: 0,
  [MatchKind.SYNONYM]: 1,
  [MatchKind.SUBSTRING]: 2,
  [MatchKind.PROVIDER]: 3,
};

export function normalizeQuery(query: string): string {
  return query.trim().replace(/\s+/g, ' ').toLowerCase();
}

// Collapse provider records to one per canonical parent, merging synonyms
function collapseRecords(records: readonly IdentityRecord[]): Map<string, IdentityRecord> {
  const byId = new Map<string, IdentityRecord>();
  for (const record of records) {
    const existing = byId.get(record.canonicalId);
    if (!existing) {
      byId.set(record.canonicalId, { ...record, synonyms: [...record.synonyms] });
      continue;
    }
    existing.synonyms = [...new Set([...existing.synonyms, ...record.synonyms])];
  }
  return byId;
}

function matchReasons(query: string, record: IdentityRecord): string[] {
  const name = normalizeQuery(record.displayName);
  const synonyms = record.synonyms.map(normalizeQuery);
  const reasons: string[] = [];
  if (name === query) reasons.push('name_exact');
  if (record.structureKey.toLowerCase() === query) reasons.push('structure_key_exact');
  if (synonyms.includes(query)) reasons.push('synonym_exact');
  if (name !== query && name.includes(query)) reasons.push('name_substring');
  if (synonyms.some((synonym) => synonym !== query && synonym.includes(query))) {
    reasons.push('synonym_substring');
  }
  return reasons.length > 0 ? reasons : ['provider_match'];
}

function matchKindOf(reasons: readonly string[]): MatchKind {
  if (reasons.includes('name_exact') || reasons.includes('structure_key_exact')) {
    return MatchKind.EXACT_NAME;
  }
  if (reasons.includes('synonym_exact')) return MatchKind.SYNONYM;
  if (reasons.includes('name_substring') || reasons.includes('synonym_substring')) {
    return MatchKind.SUBSTRING;
  }
  return MatchKind.PROVIDER;
}

/**
 * Rank distinct canonical parents against a normalized query.
 * Stronger match kinds first, ties by ascending canonical id.
 */
export function rankCandidates(
  normalizedQuery: string,
  records: readonly IdentityRecord[]
): ResolutionCandidate[] {
  return [...collapseRecords(records).values()]
    .map((record) => {
      const reasons = matchReasons(normalizedQuery, record);
      return {
        canonicalId: record.canonicalId,
        displayName: record.displayName,
        structureKey: record.structureKey,
        matchKind: matchKindOf(reasons),
        matchReasons: reasons,
      };
    })
    .sort(
      (a, b) =>
        MATCH_RANK[a.matchKind] - MATCH_RANK[b.matchKind] || compareIds(a.canonicalId, b.canonicalId)
    );
}

export function toIdentity(record: IdentityRecord): CompoundIdentity {
  return {
    canonicalId: record.canonicalId,
    displayName: record.displayName,
    structureKey: record.structureKey,
    synonyms: [...new Set(record.synonyms)].sort(compareIds),
    clinicalPhase: record.clinicalPhase ?? null,
    mechanismOfAction: record.mechanismOfAction ?? null,
  };
}

async function settle(
  deps: ResolverDeps,
  query: string,
  normalizedQuery: string,
  records: readonly IdentityRecord[],
  resolutionChoice?: string
): Promise<ResolutionResult> {
  const log = deps.log ?? logger;
  const collapsed = collapseRecords(records);
  const candidates = rankCandidates(normalizedQuery, records);

  let chosen: IdentityRecord | undefined;
  if (resolutionChoice) {
    chosen = collapsed.get(resolutionChoice);
    if (!chosen) {
      throw new ValidationError(`Resolution choice ${resolutionChoice} is not a candidate for query: ${query}`, {
        resolutionChoice,
        candidates,
      });
    }
  } else if (candidates.length === 1) {
    chosen = collapsed.get(candidates[0].canonicalId);
  }

  if (candidates.length === 0) {
    log.info({ query }, 'Compound query matched nothing');
    return { query, status: ResolutionStatus.NOT_FOUND, identity: null, candidates };
  }
  if (!chosen) {
    log.info({ query, candidates: candidates.length }, 'Compound query is ambiguous');
    return { query, status: ResolutionStatus.AMBIGUOUS, identity: null, candidates };
  }

  const identity = toIdentity(chosen);
  try {
    await deps.cache.put(identity);
  } catch (error) {
    // Resolution stands even when the cache write fails
    log.warn({ canonicalId: identity.canonicalId, err: error }, 'Identity cache write failed');
  }
  return { query, status: ResolutionStatus.RESOLVED, identity, candidates };
}

function retryOptions(deps: ResolverDeps, operation: string): RetryOptions {
  const log = deps.log ?? logger;
  return {
    ...deps.retry,
    onRetry: (error, attempt, delayMs) => {
      log.warn({ operation, attempt, delayMs, err: error }, 'Identity provider call failed; retrying');
      deps.retry?.onRetry?.(error, attempt, delayMs);
    },
  };
}

export async function resolveCompound(
  deps: ResolverDeps,
  query: string,
  options: { resolutionChoice?: string } = {}
): Promise<ResolutionResult> {
  const normalized = normalizeQuery(query);
  const { resolutionChoice } = options;

  let records: IdentityRecord[];
  try {
    records = await withRetry(
      () => deps.provider.searchByName(normalized),
      retryOptions(deps, 'searchByName')
    );
  } catch (error) {
    // An explicit choice already made can be served from the cache
    if (error instanceof UpstreamUnavailableError && resolutionChoice) {
      const cached = await deps.cache.get(resolutionChoice);
      if (cached) {
        (deps.log ?? logger).warn(
          { query, canonicalId: resolutionChoice },
          'Identity provider unavailable; using cached identity'
        );
        return { query, status: ResolutionStatus.RESOLVED, identity: cached, candidates: [] };
      }
    }
    throw error;
  }

  return settle(deps, query, normalized, records, resolutionChoice);
}

// Novel compounds: standardize the structure, then look it up by structure key
export async function resolveStructure(
  deps: ResolverDeps & { standardizer: StructureStandardizer },
  structure: string
): Promise<ResolutionResult> {
  const structureKey = await deps.standardizer.standardize(structure);

  const cached = await deps.cache.getByStructureKey(structureKey);
  if (cached) {
    return { query: structure, status: ResolutionStatus.RESOLVED, identity: cached, candidates: [] };
  }

  const records = await withRetry(
    () => deps.provider.lookupByStructureKey(structureKey),
    retryOptions(deps, 'lookupByStructureKey')
  );
  return settle(deps, structure, structureKey.toLowerCase(), records);
}

// ---------------------------------------------------------------------------
// Identity caches

interface CompoundItem extends CompoundIdentity {
  PK: string;
  SK: string;
  GSI1PK: string;
  GSI1SK: string;
  updatedAt: string;
}

function fromItem(item: CompoundItem): CompoundIdentity {
  return {
    canonicalId: item.canonicalId,
    displayName: item.displayName,
    structureKey: item.structureKey,
    synonyms: item.synonyms,
    clinicalPhase: item.clinicalPhase,
    mechanismOfAction: item.mechanismOfAction,
  };
}

// PK COMPOUND#{id} / SK META, with GSI1 keyed by structure
export class DynamoIdentityCache implements IdentityCache {
  async get(canonicalId: string): Promise<CompoundIdentity | null> {
    const item = await getItem<CompoundItem>({
      TableName: TABLE,
      Key: { PK: `COMPOUND#${canonicalId}`, SK: 'META' },
    });
    return item ? fromItem(item) : null;
  }

  async getByStructureKey(structureKey: string): Promise<CompoundIdentity | null> {
    const { items } = await queryItems<CompoundItem>({
      TableName: TABLE,
      IndexName: 'GSI1',
      KeyConditionExpression: 'GSI1PK = :pk',
      ExpressionAttributeValues: { ':pk': `STRUCTURE#${structureKey}` },
      Limit: 1,
    });
    return items.length > 0 ? fromItem(items[0]) : null;
  }

  // Unconditional upsert: identities are immutable, so last writer wins
  async put(identity: CompoundIdentity): Promise<void> {
    const item: CompoundItem = {
      PK: `COMPOUND#${identity.canonicalId}`,
      SK: 'META',
      GSI1PK: `STRUCTURE#${identity.structureKey}`,
      GSI1SK: `COMPOUND#${identity.canonicalId}`,
      ...identity,
      updatedAt: new Date().toISOString(),
    };
    await putItem({ TableName: TABLE, Item: item });
  }
}
