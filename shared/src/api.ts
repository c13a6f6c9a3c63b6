// Common API types
import type { CompoundSuggestion } from './compounds.js';
import type { SourceStatus } from './enums.js';
import type { AnalysisParams } from './targets.js';

// Standard error response
export interface ApiError {
  error: {
    code: string;
    message: string;
    requestId: string;
    details?: Record<string, unknown>;
  };
}

// Error codes
export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  AMBIGUOUS_COMPOUND: 'AMBIGUOUS_COMPOUND',
  NOT_FOUND: 'NOT_FOUND',
  CONFLICT: 'CONFLICT',
  UPSTREAM_UNAVAILABLE: 'UPSTREAM_UNAVAILABLE',
  DATA_INTEGRITY: 'DATA_INTEGRITY',
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  INVALID_STATE_TRANSITION: 'INVALID_STATE_TRANSITION',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;
export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface ResolveRequest {
  query: string;
  resolutionChoice?: string;
}

export interface AnalysisRunRequest {
  query: string;
  params?: Partial<AnalysisParams>;
  resolutionChoice?: string;
}

export interface CompareRunRequest {
  analysisIdA: string;
  analysisIdB: string;
}

export interface ShareResponse {
  shareId: string;
  analysisId: string;
  createdAt: string;
}

export interface SuggestResponse {
  query: string;
  suggestions: CompoundSuggestion[];
}

export interface SourceHealth {
  status: SourceStatus;
  latencyMs: number | null;
  error: string | null;
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

// Health check response
export interface HealthResponse {
  status: HealthStatus;
  timestamp: string;
  version: string;
  hierarchyRelease: string;
  sources: Record<string, SourceHealth>;
}
