import type {
  APIGatewayProxyEventV2,
  APIGatewayProxyResultV2,
  APIGatewayProxyStructuredResultV2,
  Context,
} from 'aws-lambda';
import { ZodError } from 'zod';
import { ErrorCode, type ApiError, type HealthResponse, type SuggestResponse } from '@pathimpact/shared';
import { ChemblClient } from '../lib/clients/chembl.js';
import { ReactomeClient } from '../lib/clients/reactome.js';
import { UniProtClient } from '../lib/clients/uniprot.js';
import { config } from '../lib/config.js';
import { AppError, ValidationError } from '../lib/errors.js';
import { createRequestLogger, type Logger } from '../lib/logger.js';

// Services
import { runAnalysis } from '../lib/services/analysis.js';
import { compareAnalyses } from '../lib/services/compare.js';
import { csvFileName, renderCsvExport, renderJsonExport } from '../lib/services/export.js';
import { checkHealth } from '../lib/services/health.js';
import { loadCurrentSnapshot } from '../lib/services/hierarchy.js';
import { getJob } from '../lib/services/jobs.js';
import { DynamoIdentityCache, resolveCompound, type ResolverDeps } from '../lib/services/resolver.js';
import { createShare, getAnalysis, getShare } from '../lib/services/snapshots.js';

// Validation schemas
import {
  analysisRunSchema,
  compareRequestSchema,
  formatIssues,
  parseAnalysisParams,
  parseInput,
  resolveRequestSchema,
  suggestQuerySchema,
  ulidSchema,
} from '../lib/validation.js';

type RouteResult = APIGatewayProxyStructuredResultV2;

// Route handler type
type RouteHandler = (event: APIGatewayProxyEventV2, context: HandlerContext) => Promise<RouteResult>;

interface HandlerContext {
  requestId: string;
  logger: Logger;
  params: Record<string, string>;
}

// Shared across warm invocations; all are stateless apart from connection reuse
const chembl = new ChemblClient();
const reactome = new ReactomeClient();
const uniprot = new UniProtClient();
const identityCache = new DynamoIdentityCache();

// Shorter queries match too much to be useful
const MIN_SUGGEST_LENGTH = 2;

function resolverDeps(logger: Logger): ResolverDeps {
  return { provider: chembl, cache: identityCache, log: logger };
}

// Path ids are ULIDs minted by this service
function getIdParam(ctx: HandlerContext, name: string): string {
  return parseInput(ulidSchema, ctx.params[name] ?? '');
}

// Parse JSON body
function parseBody(event: APIGatewayProxyEventV2): unknown {
  if (!event.body) {
    throw new ValidationError('Request body is required');
  }
  try {
    return JSON.parse(
      event.isBase64Encoded ? Buffer.from(event.body, 'base64').toString('utf-8') : event.body
    );
  } catch {
    throw new ValidationError('Invalid JSON in request body');
  }
}

// Create JSON response
function jsonResponse(statusCode: number, body: unknown, headers?: Record<string, string>): RouteResult {
  return {
    statusCode,
    headers: {
      'Content-Type': 'application/json',
      ...headers,
    },
    body: JSON.stringify(body),
  };
}

function textResponse(statusCode: number, body: string, headers: Record<string, string>): RouteResult {
  return { statusCode, headers, body };
}

function errorResponse(statusCode: number, error: ApiError): RouteResult {
  return jsonResponse(statusCode, error);
}

// Route definitions
const routes: Record<string, { handler: RouteHandler }> = {
  'GET /health': {
    handler: async (_event, ctx) => {
      const report = await checkHealth({
        sources: {
          chembl: () => chembl.releaseVersion(),
          reactome: () => reactome.releaseVersion(),
          uniprot: () => uniprot.ping(),
        },
        log: ctx.logger,
      });
      const response: HealthResponse = {
        status: report.status,
        timestamp: new Date().toISOString(),
        version: config.version,
        hierarchyRelease: report.hierarchyRelease,
        sources: report.sources,
      };
      return jsonResponse(report.status === 'unhealthy' ? 503 : 200, response);
    },
  },

  // Autocomplete
  'GET /compounds/suggest': {
    handler: async (event) => {
      const { q } = parseInput(suggestQuerySchema, event.queryStringParameters ?? {});
      const query = q.trim();
      const response: SuggestResponse = {
        query: q,
        suggestions: query.length < MIN_SUGGEST_LENGTH ? [] : await chembl.suggest(query),
      };
      return jsonResponse(200, response);
    },
  },

  // Resolution
  'POST /resolve': {
    handler: async (event, ctx) => {
      const input = parseInput(resolveRequestSchema, parseBody(event));
      const result = await resolveCompound(resolverDeps(ctx.logger), input.query, {
        resolutionChoice: input.resolutionChoice,
      });
      return jsonResponse(200, result);
    },
  },

  // Analyses
  'POST /analysis': {
    handler: async (event, ctx) => {
      const input = parseInput(analysisRunSchema, parseBody(event));
      const params = parseAnalysisParams(input.params);
      const hierarchy = await loadCurrentSnapshot();
      const result = await runAnalysis(
        {
          ...resolverDeps(ctx.logger),
          activities: chembl,
          annotations: chembl,
          accessions: uniprot,
          hierarchy,
          versionSources: { chembl: () => chembl.releaseVersion() },
        },
        { query: input.query, params, resolutionChoice: input.resolutionChoice }
      );
      return jsonResponse(201, result);
    },
  },
  'GET /analysis/{analysisId}': {
    handler: async (_event, ctx) => {
      const analysis = await getAnalysis(getIdParam(ctx, 'analysisId'));
      return jsonResponse(200, analysis);
    },
  },
  'GET /analysis/{analysisId}/export.csv': {
    handler: async (_event, ctx) => {
      const analysis = await getAnalysis(getIdParam(ctx, 'analysisId'));
      return textResponse(200, renderCsvExport(analysis), {
        'Content-Type': 'text/csv; charset=utf-8',
        'Content-Disposition': `attachment; filename="${csvFileName(analysis.analysisId)}"`,
      });
    },
  },
  'GET /analysis/{analysisId}/export.json': {
    handler: async (_event, ctx) => {
      const analysis = await getAnalysis(getIdParam(ctx, 'analysisId'));
      return textResponse(200, renderJsonExport(analysis), { 'Content-Type': 'application/json' });
    },
  },

  // Shares
  'POST /analysis/{analysisId}/share': {
    handler: async (_event, ctx) => {
      const share = await createShare(getIdParam(ctx, 'analysisId'));
      return jsonResponse(201, share);
    },
  },
  'GET /share/{shareId}': {
    handler: async (_event, ctx) => {
      const share = await getShare(getIdParam(ctx, 'shareId'));
      return jsonResponse(200, share);
    },
  },

  // Comparison
  'POST /compare': {
    handler: async (event) => {
      const input = parseInput(compareRequestSchema, parseBody(event));
      const [a, b] = await Promise.all([getAnalysis(input.analysisIdA), getAnalysis(input.analysisIdB)]);
      return jsonResponse(200, compareAnalyses(a, b));
    },
  },

  // Jobs
  'GET /jobs/{jobId}': {
    handler: async (_event, ctx) => {
      const job = await getJob(getIdParam(ctx, 'jobId'));
      return jsonResponse(200, job);
    },
  },
};

// Match route to handler
function matchRoute(
  method: string,
  path: string
): { handler: RouteHandler; params: Record<string, string> } | null {
  const direct = routes[`${method} ${path}`];
  if (direct) {
    return { handler: direct.handler, params: {} };
  }

  // Pattern matching with path parameters
  const pathParts = path.split('/');
  for (const [pattern, route] of Object.entries(routes)) {
    const [patternMethod, patternPath = ''] = pattern.split(' ');
    if (patternMethod !== method) continue;

    const patternParts = patternPath.split('/');
    if (patternParts.length !== pathParts.length) continue;

    const params: Record<string, string> = {};
    let matches = true;

    for (let i = 0; i < patternParts.length; i++) {
      const part = patternParts[i];
      if (part.startsWith('{') && part.endsWith('}')) {
        params[part.slice(1, -1)] = decodeURIComponent(pathParts[i]);
      } else if (part !== pathParts[i]) {
        matches = false;
        break;
      }
    }

    if (matches) {
      return { handler: route.handler, params };
    }
  }

  return null;
}

// Main handler
export async function handler(
  event: APIGatewayProxyEventV2,
  _context: Context
): Promise<APIGatewayProxyResultV2> {
  const requestId = event.requestContext.requestId;
  const logger = createRequestLogger(requestId);
  const method = event.requestContext.http.method;
  const path = event.rawPath;

  logger.info({ method, path }, 'Request received');

  try {
    const match = matchRoute(method, path);

    if (!match) {
      return errorResponse(404, {
        error: {
          code: ErrorCode.NOT_FOUND,
          message: `Route not found: ${method} ${path}`,
          requestId,
        },
      });
    }

    const response = await match.handler(event, { requestId, logger, params: match.params });
    logger.info({ statusCode: response.statusCode }, 'Request completed');
    return response;
  } catch (error) {
    // Handle known errors
    if (error instanceof AppError) {
      logger.warn({ error: error.message, code: error.code }, 'Application error');
      return jsonResponse(error.statusCode, error.toApiError(requestId));
    }

    // Handle Zod validation errors
    if (error instanceof ZodError) {
      logger.warn({ issues: error.issues }, 'Validation error');
      return errorResponse(400, {
        error: {
          code: ErrorCode.VALIDATION_ERROR,
          message: 'Validation failed',
          requestId,
          details: { issues: formatIssues(error) },
        },
      });
    }

    // Unknown errors
    logger.error({ err: error }, 'Unexpected error');
    return errorResponse(500, {
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
        requestId,
      },
    });
  }
}
