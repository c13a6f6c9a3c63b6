import { ulid } from 'ulid';
import { JobStatus, type Job, type JobKind } from '@pathimpact/shared';
import { config } from '../config.js';
import { getItem, isConditionalCheckFailure, putItem, stripKeys } from '../dynamodb.js';
import { ConflictError, InvalidStateTransitionError, NotFoundError } from '../errors.js';
import { logger } from '../logger.js';

const TABLE = config.tables.jobs;

// Valid state transitions
const VALID_TRANSITIONS: Record<JobStatus, JobStatus[]> = {
  queued: ['running', 'canceled'],
  running: ['succeeded', 'failed', 'canceled'],
  succeeded: [],
  failed: [],
  canceled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

type JobItem = Job & { PK: string; SK: string };

function jobKey(jobId: string) {
  return { PK: `JOB#${jobId}`, SK: 'META' };
}

export async function createJob(kind: JobKind, input: Record<string, unknown>): Promise<Job> {
  const now = new Date().toISOString();
  const job: Job = {
    jobId: ulid(),
    kind,
    status: JobStatus.QUEUED,
    input,
    createdAt: now,
    updatedAt: now,
  };

  await putItem({
    TableName: TABLE,
    Item: { ...jobKey(job.jobId), ...job },
    ConditionExpression: 'attribute_not_exists(PK)',
  });

  logger.info({ jobId: job.jobId, kind }, 'Queued job');
  return job;
}

export async function getJob(jobId: string): Promise<Job> {
  const item = await getItem<JobItem>({ TableName: TABLE, Key: jobKey(jobId) });
  if (!item) {
    throw new NotFoundError('Job', jobId);
  }
  return stripKeys(item);
}

export async function transitionJob(
  jobId: string,
  status: JobStatus,
  patch: { result?: Record<string, unknown>; error?: string } = {}
): Promise<Job> {
  const current = await getJob(jobId);
  if (!canTransition(current.status, status)) {
    throw new InvalidStateTransitionError(current.status, status);
  }

  const updated: Job = {
    ...current,
    ...patch,
    status,
    updatedAt: new Date().toISOString(),
  };

  try {
    // Another writer may have moved the job since it was read
    await putItem({
      TableName: TABLE,
      Item: { ...jobKey(jobId), ...updated },
      ConditionExpression: '#status = :expected',
      ExpressionAttributeNames: { '#status': 'status' },
      ExpressionAttributeValues: { ':expected': current.status },
    });
  } catch (error) {
    if (isConditionalCheckFailure(error)) {
      throw new ConflictError(`Job ${jobId} changed state concurrently`);
    }
    throw error;
  }

  logger.info({ jobId, from: current.status, to: status }, 'Job transitioned');
  return updated;
}
