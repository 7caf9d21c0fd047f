import type { JsonValue } from "@qualifier/store";

export type Logger = (entry: Record<string, JsonValue>) => void;

export const jsonLineLogger: Logger = (entry) => {
  console.log(JSON.stringify(entry));
};

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
