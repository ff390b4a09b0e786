import type { JobRecord, JobStatus } from '../../types/job.js';

/**
 * Durable job status records and checkpoints, keyed by job id.
 */
export interface JobRepository {
  save(record: JobRecord): Promise<void>;
  get(jobId: string): Promise<JobRecord | null>;
  /** Records by creation time, oldest first */
  list(status?: JobStatus): Promise<JobRecord[]>;
  close(): Promise<void>;
}

export class InMemoryJobRepository implements JobRepository {
  private readonly records = new Map<string, JobRecord>();

  async save(record: JobRecord): Promise<void> {
    this.records.set(record.jobId, structuredClone(record));
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const record = this.records.get(jobId);
    return record ? structuredClone(record) : null;
  }

  async list(status?: JobStatus): Promise<JobRecord[]> {
    return [...this.records.values()]
      .filter((record) => status === undefined || record.status === status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((record) => structuredClone(record));
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
