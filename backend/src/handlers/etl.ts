import type { Context } from 'aws-lambda';
import { ReactomeClient } from '../lib/clients/reactome.js';
import { createRequestLogger } from '../lib/logger.js';
import { runHierarchyEtl, type EtlSummary } from '../lib/services/etl.js';
import {
  etlEventSchema,
  parseInput,
  scheduledEtlEventSchema,
  type EtlEventInput,
} from '../lib/validation.js';

const reactome = new ReactomeClient();

// Scheduled runs carry the input under detail; direct invocations pass it as is
function readInput(event: unknown): EtlEventInput {
  const scheduled = scheduledEtlEventSchema.safeParse(event);
  if (scheduled.success) return scheduled.data.detail;
  return parseInput(etlEventSchema, event ?? {});
}

export async function handler(event: unknown, context: Context): Promise<EtlSummary> {
  const logger = createRequestLogger(context.awsRequestId);
  const input = readInput(event);

  logger.info({ seedAccessions: input.seedAccessions.length }, 'Hierarchy rebuild started');
  return runHierarchyEtl({ source: reactome, log: logger }, input);
}
