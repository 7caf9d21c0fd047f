export * from "./core/configuration";
export * from "./core/errors";
export * from "./core/flightRecords";
export * from "./core/jobLookup";
export * from "./core/json";
export * from "./core/logging";
export * from "./core/report";
export * from "./core/taskAdapter";
export * from "./core/testExecutor";
export * from "./core/testRunRequest";
export * from "./core/validation";
