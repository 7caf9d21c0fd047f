import { z } from "zod";
import { RequestValidationError } from "./errors";
import { describeDetails, toValidationDetails } from "./validation";

export const createTestRunRequestSchema = z.object({
  flight_records: z.string().trim().min(1, "At least one flight record is required"),
  auth_spec: z.string().trim().min(1, "Auth spec is required"),
  user_config: z.string().trim().min(1, "User config is required"),
  debug: z.boolean().optional()
});

export type CreateTestRunRequest = z.infer<typeof createTestRunRequestSchema>;

export function parseFlightRecords(value: string): string[] {
  return value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function parseCreateTestRunRequest(input: unknown): CreateTestRunRequest {
  const parsed = createTestRunRequestSchema.safeParse(input);
  if (!parsed.success) {
    const details = toValidationDetails(parsed.error);
    throw new RequestValidationError(`Invalid test run request: ${describeDetails(details)}`, details);
  }
  if (parseFlightRecords(parsed.data.flight_records).length === 0) {
    const details = [{ field: "flight_records", message: "At least one flight record is required" }];
    throw new RequestValidationError(`Invalid test run request: ${describeDetails(details)}`, details);
  }
  return parsed.data;
}
