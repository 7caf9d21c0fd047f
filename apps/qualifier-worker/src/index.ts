import { setTimeout as sleep } from "node:timers/promises";
import { createQualifierStore, PostgresQualifierStore } from "@qualifier/store";
import { jsonLineLogger, loadTestExecutor } from "@qualifier/core";
import { loadWorkerConfig } from "./config";
import { createTestRunExecutionAdapter, unconfiguredTestExecutor } from "./executor";
import { createQueueRunner } from "./runner";

async function run() {
  const config = loadWorkerConfig();
  const store =
    config.store === "memory"
      ? createQualifierStore({ driver: "memory" })
      : createQualifierStore({ driver: "postgres", connectionString: config.databaseUrl, logger: jsonLineLogger });
  if (store instanceof PostgresQualifierStore) {
    await store.ensureSchema();
  }

  const testExecutor = config.testExecutorModule
    ? await loadTestExecutor(config.testExecutorModule)
    : unconfiguredTestExecutor;
  const executor = createTestRunExecutionAdapter({ store, testExecutor, logger: jsonLineLogger });
  const runner = createQueueRunner({
    store,
    execute: (job) => executor.execute(job),
    executeTimeoutMs: config.executeTimeoutMs,
    logger: jsonLineLogger
  });

  console.log(`[Qualifier Worker] Starting worker ${config.workerId}...`);

  try {
    do {
      const result = await runner.runOnce({
        workerId: config.workerId,
        limit: config.batchSize,
        leaseMs: config.leaseMs
      });
      if (result.claimed > 0 || config.runOnce) {
        console.log(JSON.stringify({ workerId: config.workerId, ...result }));
      }
      if (config.runOnce) {
        break;
      }
      await sleep(config.pollMs);
    } while (true);
  } finally {
    await store.close();
  }
}

run().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
