import type { JsonValue, ReportStore, TestRunJob } from "@qualifier/store";
import { callTestExecutor, type Logger, type TestExecutor, type TestReport } from "@qualifier/core";

export type QueueExecutionAdapter = {
  execute(job: TestRunJob): Promise<Record<string, JsonValue>>;
};

type TestRunAdapterDeps = {
  store: Pick<ReportStore, "setReport">;
  testExecutor: TestExecutor;
  sampleReport?: () => TestReport;
  logger?: Logger;
};

export function createTestRunExecutionAdapter(deps: TestRunAdapterDeps): QueueExecutionAdapter {
  return {
    async execute(job) {
      await callTestExecutor(
        {
          executor: deps.testExecutor,
          reportStore: deps.store,
          sampleReport: deps.sampleReport,
          logger: deps.logger
        },
        {
          userConfigJson: job.payload.userConfig,
          authSpec: job.payload.authSpec,
          inputFiles: job.payload.inputFiles,
          debug: job.payload.debug,
          currentJob: job
        }
      );
      return {
        jobId: job.id,
        debug: job.payload.debug,
        handledBy: "test-run-adapter"
      };
    }
  };
}

/** Stands in when no executor module is configured; only debug runs can succeed. */
export const unconfiguredTestExecutor: TestExecutor = () => {
  throw new Error("No test executor configured. Set QUALIFIER_TEST_EXECUTOR or submit debug runs.");
};
