import type { ZodError } from "zod";
import type { ValidationDetail } from "./errors";

export function toValidationDetails(error: ZodError): ValidationDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.length > 0 ? issue.path.join(".") : "(root)",
    message: issue.message
  }));
}

export function describeDetails(details: ValidationDetail[]): string {
  return details.map((detail) => `${detail.field}: ${detail.message}`).join("; ");
}
