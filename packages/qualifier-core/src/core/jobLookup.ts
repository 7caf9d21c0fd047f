import {
  JobNotFoundError,
  StoreConnectionError,
  type TestRunJob,
  type TestRunQueue
} from "@qualifier/store";

/**
 * Fetches a queued test run by id. An unknown id and an unreachable store both
 * come back as `undefined`; other failures propagate.
 */
export async function getQueueJob(
  queue: Pick<TestRunQueue, "fetchJob">,
  jobId: string
): Promise<TestRunJob | undefined> {
  try {
    return await queue.fetchJob(jobId);
  } catch (error) {
    if (error instanceof JobNotFoundError || error instanceof StoreConnectionError) {
      return undefined;
    }
    throw error;
  }
}
