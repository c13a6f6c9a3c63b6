import { z } from 'zod';
import {
  ConfidenceTier,
  EdgeKind,
  EvidenceState,
  MappingNote,
  MappingStatus,
  NodeKind,
  type AnalysisParams,
} from '@pathimpact/shared';
import { config } from './config.js';
import { ConfigurationError, ValidationError } from './errors.js';

// Common validators
export const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/);
export const compoundQuerySchema = z.string().trim().min(2).max(255);
export const canonicalIdSchema = z.string().trim().min(1).max(64);

// Analysis parameters; bounds are enforced before any computation starts
export const analysisParamsSchema = z
  .object({
    potencyThreshold: z.number().min(4).max(10).default(config.scoring.potencyThreshold),
    minAssays: z.number().int().min(1).max(20).default(config.scoring.minAssays),
    includeLowConfidence: z.boolean().default(config.scoring.includeLowConfidence),
    topPathways: z.number().int().min(1).max(100).default(config.scoring.topPathways),
    minDepth: z.number().int().min(2).max(10).default(config.scoring.minDepth),
    maxDepth: z.number().int().min(2).max(10).default(config.scoring.maxDepth),
  })
  .refine((params) => params.minDepth <= params.maxDepth, {
    message: 'minDepth must not exceed maxDepth',
    path: ['minDepth'],
  });

// Request schemas
export const resolveRequestSchema = z.object({
  query: compoundQuerySchema,
  resolutionChoice: canonicalIdSchema.optional(),
});

export const analysisRunSchema = z.object({
  query: compoundQuerySchema,
  params: z.record(z.string(), z.unknown()).optional(),
  resolutionChoice: canonicalIdSchema.optional(),
});

// Autocomplete takes partial input; short queries are answered with nothing
export const suggestQuerySchema = z.object({
  q: z.string().max(255).optional().default(''),
});

export const compareRequestSchema = z.object({
  analysisIdA: ulidSchema,
  analysisIdB: ulidSchema,
});

export const etlEventSchema = z.object({
  seedAccessions: z.array(z.string().trim().min(1).max(32)).max(5000).optional().default([]),
});

// EventBridge schedules deliver the ETL input under detail
export const scheduledEtlEventSchema = z.object({
  'detail-type': z.string(),
  detail: etlEventSchema,
});

// Hierarchy snapshots as stored in S3
export const pathwayNodeSchema = z.object({
  pathwayId: z.string().min(1),
  name: z.string(),
  depth: z.number().int().min(1),
  geneSet: z.array(z.string()),
  ancestorIds: z.array(z.string()),
  childIds: z.array(z.string()),
});

export const hierarchySnapshotDataSchema = z.object({
  release: z.string().min(1),
  version: z.string().min(1),
  builtAt: z.string(),
  nodes: z.array(pathwayNodeSchema),
});

// Full analysis payload, used to re-read exports and stored analyses
const compoundIdentitySchema = z.object({
  canonicalId: z.string(),
  displayName: z.string(),
  structureKey: z.string(),
  synonyms: z.array(z.string()),
  clinicalPhase: z.number().nullable(),
  mechanismOfAction: z.string().nullable(),
});

const strictParamsSchema = z.object({
  potencyThreshold: z.number(),
  minAssays: z.number(),
  includeLowConfidence: z.boolean(),
  topPathways: z.number(),
  minDepth: z.number(),
  maxDepth: z.number(),
});

const targetSummarySchema = z.object({
  targetId: z.string(),
  targetName: z.string(),
  geneSymbol: z.string().nullable(),
  accession: z.string().nullable(),
  medianPotency: z.number(),
  assayCount: z.number().int().min(1),
  potencyMin: z.number(),
  potencyMax: z.number(),
  potencyIqr: z.number(),
  priorConfidence: z.number(),
  confidenceTier: z.enum(ConfidenceTier),
  confidenceReasons: z.array(z.string()),
  lowConfidence: z.boolean(),
  mappingStatus: z.enum(MappingStatus),
  mappedAccessions: z.array(z.string()),
  mappingNotes: z.array(z.enum(MappingNote)),
  actionType: z.string().nullable(),
  directionEvidence: z.enum(EvidenceState),
  sourceAssayIds: z.array(z.string()),
});

const pathwayScoreSchema = z.object({
  pathwayId: z.string(),
  pathwayName: z.string(),
  depth: z.number().int(),
  pathwaySize: z.number().int(),
  targetsHit: z.number().int(),
  medianPotency: z.number(),
  score: z.number().min(0),
  coverageRatio: z.number(),
  targetIds: z.array(z.string()),
  ancestorPathwayIds: z.array(z.string()),
  url: z.string(),
});

const analysisFlagsSchema = z.object({
  limitedData: z.enum(EvidenceState),
  partialMapping: z.enum(EvidenceState),
  highVariability: z.enum(EvidenceState),
  directionUnknown: z.enum(EvidenceState),
});

export const analysisResultSchema = z.object({
  analysisId: z.string(),
  createdAt: z.string(),
  query: z.string(),
  canonicalId: z.string(),
  params: strictParamsSchema,
  resolution: compoundIdentitySchema,
  targets: z.array(targetSummarySchema),
  hiddenTargetCount: z.number().int().min(0),
  excludedTargetIds: z.array(z.string()),
  pathways: z.array(pathwayScoreSchema),
  graph: z.object({
    nodes: z.array(
      z.object({
        id: z.string(),
        label: z.string(),
        kind: z.enum(NodeKind),
        metadata: z.record(z.string(), z.unknown()),
      })
    ),
    edges: z.array(
      z.object({
        id: z.string(),
        source: z.string(),
        target: z.string(),
        kind: z.enum(EdgeKind),
        weight: z.number(),
        metadata: z.record(z.string(), z.unknown()),
      })
    ),
  }),
  versionSnapshot: z.record(z.string(), z.string()),
  analysisFlags: analysisFlagsSchema,
  degradedMessages: z.array(z.string()),
  attribution: z.string(),
  exportManifest: z.object({
    exportVersion: z.number().int(),
    attributionText: z.string(),
    parameterSnapshot: strictParamsSchema,
  }),
});

export const jsonExportSchema = z.object({
  metadata: z.object({
    analysisId: z.string(),
    createdAt: z.string(),
    params: strictParamsSchema,
    versionSnapshot: z.record(z.string(), z.string()),
    analysisFlags: analysisFlagsSchema,
    attribution: z.string(),
    exportVersion: z.number().int(),
  }),
  analysis: analysisResultSchema,
});

// Type exports
export type EtlEventInput = z.infer<typeof etlEventSchema>;

export function formatIssues(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));
}

// Parse with a schema, converting zod failures into ValidationError
export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid input', { issues: formatIssues(result.error) });
  }
  return result.data;
}

// Out-of-range parameters are a configuration problem, not bad user data
export function parseAnalysisParams(input: unknown = {}): AnalysisParams {
  const result = analysisParamsSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new ConfigurationError('Invalid analysis parameters', {
      issues: formatIssues(result.error),
    });
  }
  return result.data;
}
