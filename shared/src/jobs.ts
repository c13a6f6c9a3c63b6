import type { JobKind, JobStatus } from './enums.js';

// Long-running work polled by id; the engine never blocks on it
export interface Job {
  jobId: string;
  kind: JobKind;
  status: JobStatus;
  input: Record<string, unknown>;
  result?: Record<string, unknown>;
  error?: string;
  createdAt: string;
  updatedAt: string;
}
