import { z } from "zod";
import { RequestValidationError } from "./errors";
import { describeDetails, toValidationDetails } from "./validation";

const flightRecordFileSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, "File name is required")
    .refine((name) => !name.includes(","), "File name must not contain a comma"),
  content: z.string().superRefine((content, ctx) => {
    try {
      JSON.parse(content);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Flight record is not valid JSON" });
    }
  })
});

export const flightRecordUploadSchema = z.array(flightRecordFileSchema).min(1, "At least one file is required");

export type FlightRecordFile = z.infer<typeof flightRecordFileSchema>;

/** Validates a batch of uploaded `.json` flight record files. Names come back trimmed. */
export function parseFlightRecordUpload(input: unknown): FlightRecordFile[] {
  const parsed = flightRecordUploadSchema.safeParse(input);
  if (!parsed.success) {
    const details = toValidationDetails(parsed.error);
    throw new RequestValidationError(`Invalid flight record upload: ${describeDetails(details)}`, details);
  }
  return parsed.data;
}
