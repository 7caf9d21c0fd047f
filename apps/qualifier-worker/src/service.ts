import type {
  FlightRecordStore,
  JsonValue,
  ReportStore,
  TestRunJob,
  TestRunJobStatus,
  TestRunQueue
} from "@qualifier/store";
import {
  RequestValidationError,
  describeDetails,
  getQueueJob,
  jsonValueSchema,
  parseCreateTestRunRequest,
  parseFlightRecordUpload,
  parseFlightRecords,
  parseTestConfiguration
} from "@qualifier/core";

export type TaskStatus = "Queued" | "Started" | "Finished" | "Failed";

export type TestRunSpecification = {
  flightRecords: string[];
  authSpec: string;
  userConfig: string;
  debug: boolean;
};

export type SubmitTestRunResult = {
  taskId: string;
  statusMessage: string;
  specification: TestRunSpecification;
};

export type FlightRecordUploadResult = {
  statusMessage: string;
  uploaded: string[];
};

export type TaskStatusResult = {
  taskId: string;
  taskStatus: TaskStatus;
  taskResult?: JsonValue;
  error?: string;
};

type TestRunServiceDeps = {
  store: Pick<TestRunQueue, "enqueueTestRun" | "fetchJob"> &
    Pick<ReportStore, "getReport"> &
    FlightRecordStore;
  maxAttempts?: number;
};

const STATUS_LABELS: Record<TestRunJobStatus, TaskStatus> = {
  queued: "Queued",
  claimed: "Started",
  completed: "Finished",
  failed: "Failed"
};

function parseStoredReport(raw: string): JsonValue {
  return jsonValueSchema.parse(JSON.parse(raw));
}

export function createTestRunService(deps: TestRunServiceDeps) {
  const maxAttempts = deps.maxAttempts ?? 1;

  async function requireFlightRecords(names: string[]): Promise<void> {
    const missing: string[] = [];
    for (const name of names) {
      if (!(await deps.store.hasFlightRecord(name))) {
        missing.push(name);
      }
    }
    if (missing.length > 0) {
      const details = missing.map((name) => ({ field: "flight_records", message: `Flight record not found: ${name}` }));
      throw new RequestValidationError(`Invalid test run request: ${describeDetails(details)}`, details);
    }
  }

  return {
    async uploadFlightRecords(input: unknown): Promise<FlightRecordUploadResult> {
      const files = parseFlightRecordUpload(input);
      for (const file of files) {
        await deps.store.saveFlightRecord(file.name, file.content);
      }
      const uploaded = files.map((file) => file.name);
      return {
        statusMessage: `Uploaded ${uploaded.length} flight record(s): ${uploaded.join(", ")}`,
        uploaded
      };
    },

    async submitTestRun(input: unknown): Promise<SubmitTestRunResult> {
      const request = parseCreateTestRunRequest(input);
      parseTestConfiguration(request.user_config);

      const specification: TestRunSpecification = {
        flightRecords: parseFlightRecords(request.flight_records),
        authSpec: request.auth_spec,
        userConfig: request.user_config,
        debug: request.debug ?? false
      };
      await requireFlightRecords(specification.flightRecords);
      const job = await deps.store.enqueueTestRun({
        payload: {
          userConfig: specification.userConfig,
          authSpec: specification.authSpec,
          inputFiles: specification.flightRecords,
          debug: specification.debug
        },
        maxAttempts
      });

      return {
        taskId: job.id,
        statusMessage: "A task has been started in the background.",
        specification
      };
    },

    async getTaskStatus(taskId: string): Promise<TaskStatusResult | undefined> {
      const job: TestRunJob | undefined = await getQueueJob(deps.store, taskId);
      if (!job) {
        return undefined;
      }

      const status: TaskStatusResult = {
        taskId: job.id,
        taskStatus: STATUS_LABELS[job.status]
      };
      if (job.status === "completed") {
        const raw = await deps.store.getReport(job.id);
        if (raw !== undefined) {
          status.taskResult = parseStoredReport(raw);
        }
      }
      if (job.status === "failed" && job.lastError) {
        status.error = job.lastError;
      }
      return status;
    }
  };
}

export type TestRunService = ReturnType<typeof createTestRunService>;
