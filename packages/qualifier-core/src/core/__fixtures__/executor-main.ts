import type { TestExecutor } from "../testExecutor";

export const main: TestExecutor = async (config, authSpec, inputFiles) => ({
  locale: config.locale ?? null,
  authSpec,
  inputFiles
});
