import path from "node:path";
import { ExecutorUnavailableError } from "./errors";
import type { TestConfiguration } from "./configuration";
import type { TestReport } from "./report";

export type TestExecutorResult = TestReport | null | undefined;

/** Runs one qualification pass and returns its report, or nothing when no report was produced. */
export type TestExecutor = (
  config: TestConfiguration,
  authSpec: string,
  inputFiles: string[]
) => Promise<TestExecutorResult> | TestExecutorResult;

function pickExecutor(moduleExports: unknown): TestExecutor | undefined {
  if (!moduleExports || typeof moduleExports !== "object") return undefined;
  const candidates = [
    "main" in moduleExports ? moduleExports.main : undefined,
    "default" in moduleExports ? moduleExports.default : undefined
  ];
  for (const candidate of candidates) {
    if (isTestExecutor(candidate)) return candidate;
  }
  // CommonJS modules imported as ESM expose their exports object as `default`.
  const interop = candidates[1];
  return interop !== moduleExports ? pickExecutor(interop) : undefined;
}

function isTestExecutor(value: unknown): value is TestExecutor {
  return typeof value === "function";
}

/** Loads a test executor from a module exporting `main` or a default function. */
export async function loadTestExecutor(modulePath: string, cwd: string = process.cwd()): Promise<TestExecutor> {
  const resolved = modulePath.startsWith(".") ? path.resolve(cwd, modulePath) : modulePath;
  let moduleExports: unknown;
  try {
    moduleExports = await import(resolved);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ExecutorUnavailableError(modulePath, `Test executor module could not be loaded: ${reason}`, {
      cause: error
    });
  }

  const executor = pickExecutor(moduleExports);
  if (!executor) {
    throw new ExecutorUnavailableError(
      modulePath,
      `Test executor module ${modulePath} exports neither a main nor a default function`
    );
  }
  return executor;
}
