import type { ClaimTestRunsInput, JsonValue, TestRunJob, TestRunQueue } from "@qualifier/store";
import { jsonLineLogger, toErrorMessage, type Logger } from "@qualifier/core";

export type QueueRunnerDependencies = {
  store: Pick<TestRunQueue, "claimTestRuns" | "completeTestRun" | "failTestRun">;
  execute: (job: TestRunJob) => Promise<Record<string, JsonValue>>;
  executeTimeoutMs?: number;
  retryDelayMs?: number;
  logger?: Logger;
};

export type QueueRunnerInput = ClaimTestRunsInput;

export type QueueRunnerResult = {
  claimed: number;
  completed: number;
  failed: number;
};

/** Settles with the execution, or rejects once `timeoutMs` passes; `<= 0` waits indefinitely. */
function executeWithTimeout(
  job: TestRunJob,
  execution: Promise<Record<string, JsonValue>>,
  timeoutMs: number
): Promise<Record<string, JsonValue>> {
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return execution;
  }

  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(
        new Error(
          `Test run ${job.id} (attempt ${job.attemptCount} of ${job.maxAttempts}) timed out after ${timeoutMs}ms`
        )
      );
    }, timeoutMs);
    execution.then(
      (output) => {
        clearTimeout(timer);
        resolve(output);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

function summarizeJob(job: TestRunJob): Record<string, JsonValue> {
  return {
    jobId: job.id,
    status: job.status,
    debug: job.payload.debug,
    inputFileCount: job.payload.inputFiles.length,
    attemptCount: job.attemptCount,
    maxAttempts: job.maxAttempts,
    availableAt: job.availableAt,
    leaseExpiresAt: job.leaseExpiresAt ?? null,
    lastError: job.lastError ?? null
  };
}

export function createQueueRunner(deps: QueueRunnerDependencies) {
  const log = deps.logger ?? jsonLineLogger;

  return {
    async runOnce(input: QueueRunnerInput): Promise<QueueRunnerResult> {
      const executeTimeoutMs = deps.executeTimeoutMs ?? 120_000;
      const retryDelayMs = deps.retryDelayMs ?? 5_000;
      log({
        component: "queue-runner",
        event: "batch_start",
        workerId: input.workerId,
        limit: input.limit,
        leaseMs: input.leaseMs
      });
      const claimed = await deps.store.claimTestRuns(input);
      let completed = 0;
      let failed = 0;

      for (const job of claimed) {
        try {
          log({
            component: "queue-runner",
            event: "job_execution_start",
            workerId: input.workerId,
            ...summarizeJob(job)
          });
          const output = await executeWithTimeout(job, deps.execute(job), executeTimeoutMs);
          await deps.store.completeTestRun({
            jobId: job.id,
            leaseToken: job.leaseToken ?? ""
          });
          log({
            component: "queue-runner",
            event: "job_execution_completed",
            workerId: input.workerId,
            outputKeys: Object.keys(output),
            ...summarizeJob(job)
          });
          completed += 1;
        } catch (error) {
          failed += 1;
          const message = toErrorMessage(error);
          log({
            component: "queue-runner",
            event: "job_execution_error",
            workerId: input.workerId,
            error: message,
            ...summarizeJob(job)
          });

          try {
            await deps.store.failTestRun({
              jobId: job.id,
              leaseToken: job.leaseToken ?? "",
              error: message,
              retryAt: new Date(Date.now() + retryDelayMs).toISOString()
            });
          } catch (failError) {
            // The lease is gone; whoever holds it now owns the job's outcome.
            log({
              component: "queue-runner",
              event: "job_fail_not_recorded",
              workerId: input.workerId,
              jobId: job.id,
              error: toErrorMessage(failError)
            });
          }
        }
      }

      log({
        component: "queue-runner",
        event: "batch_done",
        workerId: input.workerId,
        claimed: claimed.length,
        completed,
        failed
      });
      return {
        claimed: claimed.length,
        completed,
        failed
      };
    }
  };
}
