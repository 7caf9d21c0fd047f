import test from "node:test";
import assert from "node:assert/strict";
import { InMemoryQualifierStore, StoreConnectionError } from "@qualifier/store";
import { ConfigurationFormatError, RequestValidationError } from "@qualifier/core";
import { createTestRunService } from "./service";

const request = {
  flight_records: "flight-1.json, flight-2.json",
  auth_spec: "NoAuth()",
  user_config: "{\"locale\":\"che\"}"
};

async function storeWithFlightRecords(): Promise<InMemoryQualifierStore> {
  const store = new InMemoryQualifierStore();
  await store.saveFlightRecord("flight-1.json", "{\"flights\":[]}");
  await store.saveFlightRecord("flight-2.json", "{\"flights\":[]}");
  return store;
}

test("submitting a test run enqueues a job with the parsed flight records", async () => {
  const store = await storeWithFlightRecords();
  const service = createTestRunService({ store });

  const submitted = await service.submitTestRun(request);

  assert.equal(submitted.statusMessage, "A task has been started in the background.");
  assert.deepEqual(submitted.specification, {
    flightRecords: ["flight-1.json", "flight-2.json"],
    authSpec: "NoAuth()",
    userConfig: "{\"locale\":\"che\"}",
    debug: false
  });
  const job = store.jobs.get(submitted.taskId);
  assert.equal(job?.status, "queued");
  assert.equal(job?.maxAttempts, 1);
  assert.deepEqual(job?.payload.inputFiles, ["flight-1.json", "flight-2.json"]);
});

test("submitting rejects invalid requests and configurations before enqueueing", async () => {
  const store = await storeWithFlightRecords();
  const service = createTestRunService({ store });

  await assert.rejects(service.submitTestRun({ ...request, auth_spec: "" }), RequestValidationError);
  await assert.rejects(service.submitTestRun({ ...request, user_config: "{oops" }), ConfigurationFormatError);
  assert.equal(store.jobs.size, 0);
});

test("submitting names every flight record that was never uploaded", async () => {
  const store = new InMemoryQualifierStore();
  await store.saveFlightRecord("flight-1.json", "{}");
  const service = createTestRunService({ store });

  await assert.rejects(
    service.submitTestRun({ ...request, flight_records: "flight-1.json,flight-2.json,flight-3.json" }),
    (error: unknown) => {
      assert.ok(error instanceof RequestValidationError);
      assert.equal(
        error.message,
        "Invalid test run request: flight_records: Flight record not found: flight-2.json; " +
          "flight_records: Flight record not found: flight-3.json"
      );
      return true;
    }
  );
  assert.equal(store.jobs.size, 0);
});

test("uploaded flight records become available to test runs", async () => {
  const store = new InMemoryQualifierStore();
  const service = createTestRunService({ store });

  const uploaded = await service.uploadFlightRecords([
    { name: "flight-1.json", content: "{\"flights\":[]}" },
    { name: "flight-2.json", content: "{\"flights\":[]}" }
  ]);

  assert.deepEqual(uploaded, {
    statusMessage: "Uploaded 2 flight record(s): flight-1.json, flight-2.json",
    uploaded: ["flight-1.json", "flight-2.json"]
  });
  assert.equal(store.flightRecords.get("flight-2.json"), "{\"flights\":[]}");
  const submitted = await service.submitTestRun(request);
  assert.equal(store.jobs.get(submitted.taskId)?.status, "queued");
});

test("invalid uploads store nothing", async () => {
  const store = new InMemoryQualifierStore();
  const service = createTestRunService({ store });

  await assert.rejects(
    service.uploadFlightRecords([
      { name: "flight-1.json", content: "{}" },
      { name: "flight-2.json", content: "not json" }
    ]),
    RequestValidationError
  );
  assert.equal(store.flightRecords.size, 0);
});

test("task status maps queue states", async () => {
  const store = await storeWithFlightRecords();
  const service = createTestRunService({ store });
  const { taskId } = await service.submitTestRun(request);

  assert.deepEqual(await service.getTaskStatus(taskId), { taskId, taskStatus: "Queued" });

  await store.claimTestRuns({ workerId: "worker-a", limit: 1, leaseMs: 30_000 });
  assert.deepEqual(await service.getTaskStatus(taskId), { taskId, taskStatus: "Started" });
});

test("finished tasks carry their stored report", async () => {
  const store = await storeWithFlightRecords();
  const service = createTestRunService({ store });
  const { taskId } = await service.submitTestRun({ ...request, debug: true });
  const [claimed] = await store.claimTestRuns({ workerId: "worker-a", limit: 1, leaseMs: 30_000 });
  await store.setReport(taskId, "{\"findings\":{\"issues\":[]}}");
  await store.completeTestRun({ jobId: taskId, leaseToken: claimed.leaseToken ?? "" });

  assert.deepEqual(await service.getTaskStatus(taskId), {
    taskId,
    taskStatus: "Finished",
    taskResult: { findings: { issues: [] } }
  });
});

test("failed tasks carry the last error", async () => {
  const store = await storeWithFlightRecords();
  const service = createTestRunService({ store });
  const { taskId } = await service.submitTestRun(request);
  const [claimed] = await store.claimTestRuns({ workerId: "worker-a", limit: 1, leaseMs: 30_000 });
  await store.failTestRun({ jobId: taskId, leaseToken: claimed.leaseToken ?? "", error: "executor crashed" });

  assert.deepEqual(await service.getTaskStatus(taskId), {
    taskId,
    taskStatus: "Failed",
    error: "executor crashed"
  });
});

test("task status is unavailable for unknown ids and unreachable stores alike", async () => {
  const empty = createTestRunService({ store: new InMemoryQualifierStore() });
  const unreachableStore = new InMemoryQualifierStore();
  unreachableStore.fetchJob = async () => {
    throw new StoreConnectionError("Report store unreachable: connect ECONNREFUSED");
  };
  const unreachable = createTestRunService({ store: unreachableStore });

  assert.equal(await empty.getTaskStatus("2f8343be-6482-4d1b-a474-16847e01af1e"), undefined);
  assert.equal(await unreachable.getTaskStatus("2f8343be-6482-4d1b-a474-16847e01af1e"), undefined);
});
