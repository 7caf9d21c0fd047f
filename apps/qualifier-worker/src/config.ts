import { z } from "zod";
import { RequestValidationError, describeDetails, toValidationDetails } from "@qualifier/core";

/** An empty variable counts as unset. */
const fromEnv = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const intFromEnv = (fallback: number, min: number) =>
  fromEnv(z.coerce.number().int().min(min).default(fallback));

const workerEnvSchema = z
  .object({
    QUALIFIER_WORKER_ID: fromEnv(z.string().trim().min(1).default("qualifier-worker")),
    QUALIFIER_BATCH_SIZE: intFromEnv(10, 1),
    QUALIFIER_LEASE_MS: intFromEnv(150_000, 1),
    QUALIFIER_POLL_MS: intFromEnv(1_000, 0),
    QUALIFIER_EXECUTE_TIMEOUT_MS: intFromEnv(120_000, 0),
    QUALIFIER_RUN_ONCE: fromEnv(z.enum(["0", "1"]).default("0")),
    QUALIFIER_STORE: fromEnv(z.enum(["postgres", "memory"]).default("postgres")),
    QUALIFIER_DATABASE_URL: fromEnv(z.string().trim().min(1).optional()),
    DATABASE_URL: fromEnv(z.string().trim().min(1).optional()),
    QUALIFIER_TEST_EXECUTOR: fromEnv(z.string().trim().min(1).optional())
  })
  .superRefine((values, ctx) => {
    if (values.QUALIFIER_EXECUTE_TIMEOUT_MS > 0 && values.QUALIFIER_LEASE_MS < values.QUALIFIER_EXECUTE_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["QUALIFIER_LEASE_MS"],
        message: "Lease must be at least QUALIFIER_EXECUTE_TIMEOUT_MS"
      });
    }
  });

export type WorkerConfig = {
  workerId: string;
  batchSize: number;
  leaseMs: number;
  pollMs: number;
  executeTimeoutMs: number;
  runOnce: boolean;
  store: "postgres" | "memory";
  databaseUrl?: string;
  testExecutorModule?: string;
};

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  const parsed = workerEnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = toValidationDetails(parsed.error);
    throw new RequestValidationError(`Invalid worker configuration: ${describeDetails(details)}`, details);
  }

  const values = parsed.data;
  return {
    workerId: values.QUALIFIER_WORKER_ID,
    batchSize: values.QUALIFIER_BATCH_SIZE,
    leaseMs: values.QUALIFIER_LEASE_MS,
    pollMs: values.QUALIFIER_POLL_MS,
    executeTimeoutMs: values.QUALIFIER_EXECUTE_TIMEOUT_MS,
    runOnce: values.QUALIFIER_RUN_ONCE === "1",
    store: values.QUALIFIER_STORE,
    databaseUrl: values.QUALIFIER_DATABASE_URL ?? values.DATABASE_URL,
    testExecutorModule: values.QUALIFIER_TEST_EXECUTOR
  };
}
