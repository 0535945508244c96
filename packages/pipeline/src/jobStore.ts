import { PolicyQaError } from "@policyqa/core";
import type { JobCounts, JobRecord } from "./types.js";

export interface JobStore {
  create(jobId: string, filename: string): JobRecord;
  complete(jobId: string, chunksCreated: number): JobRecord;
  fail(jobId: string, error: string): JobRecord;
  get(jobId: string): JobRecord | undefined;
  list(): JobRecord[];
  counts(): JobCounts;
}

export class UnknownJobError extends PolicyQaError {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
  }
}

/**
 * Process-local job table. Records are kept for the life of the process.
 */
export class InMemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, JobRecord>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  create(jobId: string, filename: string): JobRecord {
    const record: JobRecord = {
      jobId,
      filename,
      status: "processing",
      startedAt: this.now().toISOString(),
    };
    this.jobs.set(jobId, record);
    return record;
  }

  complete(jobId: string, chunksCreated: number): JobRecord {
    const { filename, startedAt } = this.require(jobId);
    const record: JobRecord = {
      jobId,
      filename,
      status: "completed",
      startedAt,
      completedAt: this.now().toISOString(),
      chunksCreated,
    };
    this.jobs.set(jobId, record);
    return record;
  }

  fail(jobId: string, error: string): JobRecord {
    const { filename, startedAt } = this.require(jobId);
    const record: JobRecord = {
      jobId,
      filename,
      status: "failed",
      startedAt,
      failedAt: this.now().toISOString(),
      error,
    };
    this.jobs.set(jobId, record);
    return record;
  }

  get(jobId: string): JobRecord | undefined {
    return this.jobs.get(jobId);
  }

  list(): JobRecord[] {
    return [...this.jobs.values()];
  }

  counts(): JobCounts {
    const counts: JobCounts = { total: 0, processing: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) {
      counts.total++;
      counts[job.status]++;
    }
    return counts;
  }

  private require(jobId: string): JobRecord {
    const job = this.jobs.get(jobId);
    if (!job) throw new UnknownJobError(jobId);
    return job;
  }
}
