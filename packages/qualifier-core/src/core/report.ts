import fs from "node:fs";
import path from "node:path";
import type { JsonValue } from "@qualifier/store";
import { jsonObjectSchema, type JsonObject } from "./json";

export type TestReport = JsonObject;

export const SAMPLE_REPORT_PATH = path.join(__dirname, "..", "..", "data", "sample-report.json");

/** Presence follows truthiness: empty containers, "", 0 and false count as no report. */
export function isReportPresent(report: JsonValue | undefined): boolean {
  if (report === null || report === undefined) return false;
  if (Array.isArray(report)) return report.length > 0;
  if (typeof report === "object") return Object.keys(report).length > 0;
  return Boolean(report);
}

let cachedSampleReport: TestReport | null = null;

/** The canned report used by debug runs. Each call returns a fresh copy. */
export function loadSampleReport(filePath: string = SAMPLE_REPORT_PATH): TestReport {
  if (filePath !== SAMPLE_REPORT_PATH) {
    return readReportFile(filePath);
  }
  if (!cachedSampleReport) {
    cachedSampleReport = readReportFile(filePath);
  }
  return structuredClone(cachedSampleReport);
}

function readReportFile(filePath: string): TestReport {
  return jsonObjectSchema.parse(JSON.parse(fs.readFileSync(filePath, "utf8")));
}
