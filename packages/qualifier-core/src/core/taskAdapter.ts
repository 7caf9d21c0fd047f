import type { ReportStore, TestRunJob } from "@qualifier/store";
import { parseTestConfiguration } from "./configuration";
import type { Logger } from "./logging";
import { isReportPresent, loadSampleReport, type TestReport } from "./report";
import type { TestExecutor, TestExecutorResult } from "./testExecutor";

export type TaskAdapterDependencies = {
  executor: TestExecutor;
  reportStore: Pick<ReportStore, "setReport">;
  /** Defaults to the bundled sample report. */
  sampleReport?: () => TestReport;
  logger?: Logger;
};

export type TestRunInput = {
  userConfigJson: string;
  authSpec: string;
  inputFiles: string[];
  debug?: boolean;
  /** The queue job running this call; the report is keyed by its id. */
  currentJob?: Pick<TestRunJob, "id"> | null;
};

/**
 * Runs one test pass and stores its report under the current job id.
 *
 * Nothing is written, and nothing is reported back, when the executor produces
 * no report or when there is no current job id. Configuration and executor
 * errors propagate to the caller.
 */
export async function callTestExecutor(deps: TaskAdapterDependencies, input: TestRunInput): Promise<void> {
  const config = parseTestConfiguration(input.userConfigJson);

  let report: TestExecutorResult;
  if (input.debug) {
    report = (deps.sampleReport ?? loadSampleReport)();
  } else {
    report = await deps.executor(config, input.authSpec, input.inputFiles);
  }

  if (!isReportPresent(report)) {
    return;
  }

  const jobId = input.currentJob?.id;
  if (!jobId) {
    return;
  }

  await deps.reportStore.setReport(jobId, JSON.stringify(report));
  deps.logger?.({
    component: "task-adapter",
    event: "report_stored",
    jobId,
    debug: input.debug ?? false
  });
}
