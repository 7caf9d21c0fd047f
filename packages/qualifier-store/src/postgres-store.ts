import { Pool } from "pg";
import { uuidv7 } from "uuidv7";
import { z } from "zod";
import {
  JobNotFoundError,
  LEASE_EXPIRED_ERROR,
  LeaseLostError,
  StoreConnectionError,
  isConnectivityError
} from "./errors";
import type {
  ClaimTestRunsInput,
  CompleteTestRunInput,
  FailTestRunInput,
  QualifierStore,
  StoreLogger,
  TestRunJob,
  TestRunJobCreateInput
} from "./types";

export type SqlResult = {
  rows: unknown[];
  rowCount: number | null;
};

/** The subset of `pg.Pool` the store talks to. */
export type SqlClient = {
  query(text: string, values?: unknown[]): Promise<SqlResult>;
  end?(): Promise<void>;
};

export const QUALIFIER_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS test_run_jobs (
  id TEXT PRIMARY KEY,
  status TEXT NOT NULL,
  user_config TEXT NOT NULL,
  auth_spec TEXT NOT NULL,
  input_files JSONB NOT NULL DEFAULT '[]'::jsonb,
  debug BOOLEAN NOT NULL DEFAULT FALSE,
  attempt_count INTEGER NOT NULL DEFAULT 0,
  max_attempts INTEGER NOT NULL DEFAULT 1,
  available_at TIMESTAMPTZ NOT NULL,
  lease_token TEXT,
  lease_expires_at TIMESTAMPTZ,
  last_error TEXT,
  created_at TIMESTAMPTZ NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL
);
CREATE INDEX IF NOT EXISTS test_run_jobs_claim_idx ON test_run_jobs (status, available_at);
CREATE TABLE IF NOT EXISTS test_run_reports (
  job_id TEXT PRIMARY KEY,
  report TEXT NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL
);
CREATE TABLE IF NOT EXISTS flight_records (
  name TEXT PRIMARY KEY,
  content TEXT NOT NULL,
  updated_at TIMESTAMPTZ NOT NULL
);
`;

const JOB_COLUMNS = `id, status, user_config, auth_spec, input_files, debug, attempt_count, max_attempts,
  available_at, lease_token, lease_expires_at, last_error, created_at, updated_at`;

const timestampSchema = z
  .union([z.date(), z.string()])
  .transform((value) => (value instanceof Date ? value : new Date(value)).toISOString());

const jobRowSchema = z.object({
  id: z.string(),
  status: z.enum(["queued", "claimed", "completed", "failed"]),
  user_config: z.string(),
  auth_spec: z.string(),
  input_files: z.array(z.string()),
  debug: z.boolean(),
  attempt_count: z.number().int(),
  max_attempts: z.number().int(),
  available_at: timestampSchema,
  lease_token: z.string().nullable(),
  lease_expires_at: timestampSchema.nullable(),
  last_error: z.string().nullable(),
  created_at: timestampSchema,
  updated_at: timestampSchema
});

const reportRowSchema = z.object({ report: z.string() });

function toJob(row: unknown): TestRunJob {
  const parsed = jobRowSchema.parse(row);
  return {
    id: parsed.id,
    status: parsed.status,
    payload: {
      userConfig: parsed.user_config,
      authSpec: parsed.auth_spec,
      inputFiles: parsed.input_files,
      debug: parsed.debug
    },
    attemptCount: parsed.attempt_count,
    maxAttempts: parsed.max_attempts,
    availableAt: parsed.available_at,
    leaseToken: parsed.lease_token ?? undefined,
    leaseExpiresAt: parsed.lease_expires_at ?? undefined,
    lastError: parsed.last_error ?? undefined,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at
  };
}

const defaultLogger: StoreLogger = (entry) => {
  console.log(JSON.stringify(entry));
};

export type PoolSqlClient = SqlClient & { pool: Pool };

/**
 * Idle clients that lose their connection emit `error` on the pool; the
 * listener logs it and the next query surfaces the failure as a
 * `StoreConnectionError`.
 */
export function createPoolClient(connectionString: string, logger: StoreLogger = defaultLogger): PoolSqlClient {
  const pool = new Pool({ connectionString });
  pool.on("error", (error) => {
    logger({
      component: "postgres-store",
      event: "pool_client_error",
      error: error.message
    });
  });
  return {
    pool,
    query: (text, values) => pool.query(text, values),
    end: () => pool.end()
  };
}

export type PostgresQualifierStoreOptions = {
  logger?: StoreLogger;
};

export class PostgresQualifierStore implements QualifierStore {
  private readonly client: SqlClient;

  constructor(connection: string | SqlClient, options: PostgresQualifierStoreOptions = {}) {
    this.client = typeof connection === "string" ? createPoolClient(connection, options.logger) : connection;
  }

  async ensureSchema(): Promise<void> {
    await this.query(QUALIFIER_SCHEMA_SQL);
  }

  async enqueueTestRun(input: TestRunJobCreateInput): Promise<TestRunJob> {
    const now = new Date().toISOString();
    const result = await this.query(
      `INSERT INTO test_run_jobs (
         id, status, user_config, auth_spec, input_files, debug, attempt_count, max_attempts,
         available_at, created_at, updated_at
       ) VALUES ($1, 'queued', $2, $3, $4::jsonb, $5, 0, $6, $7, $8, $8)
       RETURNING ${JOB_COLUMNS}`,
      [
        input.id ?? uuidv7(),
        input.payload.userConfig,
        input.payload.authSpec,
        JSON.stringify(input.payload.inputFiles),
        input.payload.debug,
        input.maxAttempts,
        input.availableAt ?? now,
        now
      ]
    );
    return toJob(result.rows[0]);
  }

  async claimTestRuns(input: ClaimTestRunsInput): Promise<TestRunJob[]> {
    const now = input.now ?? new Date().toISOString();
    const leaseExpiresAt = new Date(new Date(now).getTime() + input.leaseMs).toISOString();
    await this.query(
      `UPDATE test_run_jobs
          SET status = 'failed',
              last_error = $2,
              lease_token = NULL,
              lease_expires_at = NULL,
              updated_at = $1
        WHERE status = 'claimed' AND lease_expires_at <= $1 AND attempt_count >= max_attempts`,
      [now, LEASE_EXPIRED_ERROR]
    );
    const result = await this.query(
      `UPDATE test_run_jobs
          SET status = 'claimed',
              lease_token = $1,
              lease_expires_at = $2,
              attempt_count = attempt_count + 1,
              updated_at = $3
        WHERE id IN (
          SELECT id FROM test_run_jobs
           WHERE (status = 'queued' AND available_at <= $3)
              OR (status = 'claimed' AND lease_expires_at <= $3 AND attempt_count < max_attempts)
           ORDER BY available_at
           LIMIT $4
           FOR UPDATE SKIP LOCKED
        )
        RETURNING ${JOB_COLUMNS}`,
      [`${input.workerId}:${uuidv7()}`, leaseExpiresAt, now, Math.max(0, input.limit)]
    );
    return result.rows.map(toJob);
  }

  async completeTestRun(input: CompleteTestRunInput): Promise<void> {
    const result = await this.query(
      `UPDATE test_run_jobs
          SET status = 'completed', lease_token = NULL, lease_expires_at = NULL, updated_at = $3
        WHERE id = $1 AND status = 'claimed' AND lease_token = $2`,
      [input.jobId, input.leaseToken, new Date().toISOString()]
    );
    if (!result.rowCount) {
      throw new LeaseLostError(input.jobId);
    }
  }

  async failTestRun(input: FailTestRunInput): Promise<void> {
    const now = new Date().toISOString();
    const result = await this.query(
      `UPDATE test_run_jobs
          SET status = CASE WHEN attempt_count < max_attempts THEN 'queued' ELSE 'failed' END,
              available_at = CASE WHEN attempt_count < max_attempts THEN $4 ELSE available_at END,
              last_error = $3,
              lease_token = NULL,
              lease_expires_at = NULL,
              updated_at = $5
        WHERE id = $1 AND status = 'claimed' AND lease_token = $2`,
      [input.jobId, input.leaseToken, input.error, input.retryAt ?? now, now]
    );
    if (!result.rowCount) {
      throw new LeaseLostError(input.jobId);
    }
  }

  async fetchJob(jobId: string): Promise<TestRunJob> {
    const result = await this.query(`SELECT ${JOB_COLUMNS} FROM test_run_jobs WHERE id = $1`, [jobId]);
    const row = result.rows[0];
    if (row === undefined) {
      throw new JobNotFoundError(jobId);
    }
    return toJob(row);
  }

  async setReport(key: string, value: string): Promise<void> {
    await this.query(
      `INSERT INTO test_run_reports (job_id, report, updated_at) VALUES ($1, $2, $3)
       ON CONFLICT (job_id) DO UPDATE SET report = EXCLUDED.report, updated_at = EXCLUDED.updated_at`,
      [key, value, new Date().toISOString()]
    );
  }

  async getReport(key: string): Promise<string | undefined> {
    const result = await this.query("SELECT report FROM test_run_reports WHERE job_id = $1", [key]);
    const row = result.rows[0];
    return row === undefined ? undefined : reportRowSchema.parse(row).report;
  }

  async saveFlightRecord(name: string, content: string): Promise<void> {
    await this.query(
      `INSERT INTO flight_records (name, content, updated_at) VALUES ($1, $2, $3)
       ON CONFLICT (name) DO UPDATE SET content = EXCLUDED.content, updated_at = EXCLUDED.updated_at`,
      [name, content, new Date().toISOString()]
    );
  }

  async hasFlightRecord(name: string): Promise<boolean> {
    const result = await this.query("SELECT 1 FROM flight_records WHERE name = $1", [name]);
    return result.rows.length > 0;
  }

  async close(): Promise<void> {
    await this.client.end?.();
  }

  private async query(text: string, values?: unknown[]): Promise<SqlResult> {
    try {
      return await this.client.query(text, values);
    } catch (error) {
      if (isConnectivityError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        throw new StoreConnectionError(`Report store unreachable: ${message}`, { cause: error });
      }
      throw error;
    }
  }
}
