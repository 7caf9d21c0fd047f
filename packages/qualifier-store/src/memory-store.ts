import { uuidv7 } from "uuidv7";
import { JobNotFoundError, LEASE_EXPIRED_ERROR, LeaseLostError } from "./errors";
import type {
  ClaimTestRunsInput,
  CompleteTestRunInput,
  FailTestRunInput,
  QualifierStore,
  TestRunJob,
  TestRunJobCreateInput
} from "./types";

function isLeaseExpired(job: TestRunJob, nowMs: number): boolean {
  return (
    job.status === "claimed" &&
    job.leaseExpiresAt !== undefined &&
    new Date(job.leaseExpiresAt).getTime() <= nowMs
  );
}

function cloneJob(job: TestRunJob): TestRunJob {
  return {
    ...job,
    payload: { ...job.payload, inputFiles: [...job.payload.inputFiles] }
  };
}

export class InMemoryQualifierStore implements QualifierStore {
  readonly jobs = new Map<string, TestRunJob>();
  readonly reports = new Map<string, string>();
  readonly flightRecords = new Map<string, string>();

  async enqueueTestRun(input: TestRunJobCreateInput): Promise<TestRunJob> {
    const now = new Date().toISOString();
    const job: TestRunJob = {
      id: input.id ?? uuidv7(),
      status: "queued",
      payload: { ...input.payload, inputFiles: [...input.payload.inputFiles] },
      attemptCount: 0,
      maxAttempts: input.maxAttempts,
      availableAt: input.availableAt ?? now,
      createdAt: now,
      updatedAt: now
    };
    this.jobs.set(job.id, job);
    return cloneJob(job);
  }

  async claimTestRuns(input: ClaimTestRunsInput): Promise<TestRunJob[]> {
    const now = input.now ?? new Date().toISOString();
    const nowMs = new Date(now).getTime();
    const leaseToken = `${input.workerId}:${uuidv7()}`;
    const leaseExpiresAt = new Date(nowMs + input.leaseMs).toISOString();

    for (const job of this.jobs.values()) {
      if (isLeaseExpired(job, nowMs) && job.attemptCount >= job.maxAttempts) {
        job.status = "failed";
        job.lastError = LEASE_EXPIRED_ERROR;
        job.leaseToken = undefined;
        job.leaseExpiresAt = undefined;
        job.updatedAt = now;
      }
    }

    const claimable = [...this.jobs.values()]
      .filter((job) => {
        if (job.status === "queued") {
          return new Date(job.availableAt).getTime() <= nowMs;
        }
        return isLeaseExpired(job, nowMs);
      })
      .sort((a, b) => a.availableAt.localeCompare(b.availableAt))
      .slice(0, Math.max(0, input.limit));

    return claimable.map((job) => {
      job.status = "claimed";
      job.leaseToken = leaseToken;
      job.leaseExpiresAt = leaseExpiresAt;
      job.attemptCount += 1;
      job.updatedAt = now;
      return cloneJob(job);
    });
  }

  async completeTestRun(input: CompleteTestRunInput): Promise<void> {
    const job = this.requireLeasedJob(input.jobId, input.leaseToken);
    job.status = "completed";
    job.leaseToken = undefined;
    job.leaseExpiresAt = undefined;
    job.updatedAt = new Date().toISOString();
  }

  async failTestRun(input: FailTestRunInput): Promise<void> {
    const job = this.requireLeasedJob(input.jobId, input.leaseToken);
    const now = new Date().toISOString();
    const canRetry = job.attemptCount < job.maxAttempts;
    job.status = canRetry ? "queued" : "failed";
    job.availableAt = canRetry ? input.retryAt ?? now : job.availableAt;
    job.lastError = input.error;
    job.leaseToken = undefined;
    job.leaseExpiresAt = undefined;
    job.updatedAt = now;
  }

  async fetchJob(jobId: string): Promise<TestRunJob> {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return cloneJob(job);
  }

  async setReport(key: string, value: string): Promise<void> {
    this.reports.set(key, value);
  }

  async getReport(key: string): Promise<string | undefined> {
    return this.reports.get(key);
  }

  async saveFlightRecord(name: string, content: string): Promise<void> {
    this.flightRecords.set(name, content);
  }

  async hasFlightRecord(name: string): Promise<boolean> {
    return this.flightRecords.has(name);
  }

  async close(): Promise<void> {}

  private requireLeasedJob(jobId: string, leaseToken: string): TestRunJob {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    if (job.status !== "claimed" || job.leaseToken !== leaseToken) {
      throw new LeaseLostError(jobId);
    }
    return job;
  }
}
