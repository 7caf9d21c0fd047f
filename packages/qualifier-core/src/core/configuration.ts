import { z } from "zod";
import { ConfigurationFormatError } from "./errors";
import { describeDetails, toValidationDetails } from "./validation";

const injectionTargetSchema = z
  .object({
    name: z.string().min(1),
    injection_base_url: z.string().url()
  })
  .passthrough();

const observerSchema = z
  .object({
    name: z.string().min(1),
    observation_base_url: z.string().url()
  })
  .passthrough();

/**
 * Known fields are checked when present; everything else belongs to the test
 * executor and passes through untouched.
 */
export const testConfigurationSchema = z
  .object({
    locale: z.string().min(1).optional(),
    injection_targets: z.array(injectionTargetSchema).optional(),
    observers: z.array(observerSchema).optional()
  })
  .passthrough();

export type TestConfiguration = z.infer<typeof testConfigurationSchema>;

export function parseTestConfiguration(text: string): TestConfiguration {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationFormatError(`Test configuration is not valid JSON: ${reason}`, [], {
      cause: error
    });
  }

  const parsed = testConfigurationSchema.safeParse(raw);
  if (!parsed.success) {
    const details = toValidationDetails(parsed.error);
    throw new ConfigurationFormatError(
      `Test configuration does not match the expected shape: ${describeDetails(details)}`,
      details
    );
  }
  return parsed.data;
}
