export type JsonValue =
  | string
  | number
  | boolean
  | null
  | { [key: string]: JsonValue }
  | JsonValue[];

export type StoreLogger = (entry: Record<string, JsonValue>) => void;

export type TestRunJobStatus = "queued" | "claimed" | "completed" | "failed";

export type TestRunPayload = {
  userConfig: string;
  authSpec: string;
  inputFiles: string[];
  debug: boolean;
};

export type TestRunJob = {
  id: string;
  status: TestRunJobStatus;
  payload: TestRunPayload;
  attemptCount: number;
  maxAttempts: number;
  availableAt: string;
  leaseToken?: string;
  leaseExpiresAt?: string;
  lastError?: string;
  createdAt: string;
  updatedAt: string;
};

export type TestRunJobCreateInput = {
  id?: string;
  payload: TestRunPayload;
  maxAttempts: number;
  availableAt?: string;
};

export type ClaimTestRunsInput = {
  workerId: string;
  limit: number;
  leaseMs: number;
  now?: string;
};

export type CompleteTestRunInput = {
  jobId: string;
  leaseToken: string;
};

export type FailTestRunInput = {
  jobId: string;
  leaseToken: string;
  error: string;
  retryAt?: string;
};

export interface TestRunQueue {
  enqueueTestRun(input: TestRunJobCreateInput): Promise<TestRunJob>;
  claimTestRuns(input: ClaimTestRunsInput): Promise<TestRunJob[]>;
  completeTestRun(input: CompleteTestRunInput): Promise<void>;
  failTestRun(input: FailTestRunInput): Promise<void>;
  /** Throws `JobNotFoundError` when no job has this id. */
  fetchJob(jobId: string): Promise<TestRunJob>;
}

/** Report sink keyed by job id. Values are serialized reports. */
export interface ReportStore {
  setReport(key: string, value: string): Promise<void>;
  getReport(key: string): Promise<string | undefined>;
}

/** Uploaded flight record files, keyed by file name. Re-uploading a name replaces it. */
export interface FlightRecordStore {
  saveFlightRecord(name: string, content: string): Promise<void>;
  hasFlightRecord(name: string): Promise<boolean>;
}

export interface QualifierStore extends TestRunQueue, ReportStore, FlightRecordStore {
  close(): Promise<void>;
}
