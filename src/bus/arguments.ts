import { z } from "zod";

const optionsSchema = z.record(z.unknown());

export const getManifestArgumentsSchema = z.tuple([
  z.string(),
  z.string(),
  optionsSchema,
]);

export const startArgumentsSchema = z.tuple([
  z.string(),
  z.string(),
  z.string(),
  optionsSchema,
]);

export const closeArgumentsSchema = z.tuple([z.string(), optionsSchema]);

export const propertyGetArgumentsSchema = z.tuple([z.string(), z.string()]);

export const propertyGetAllArgumentsSchema = z.tuple([z.string()]);

export interface MethodArguments {
  signature: string;
  body: readonly unknown[];
}

/**
 * Checks the wire signature first, then the decoded body, so a mistyped call
 * never reaches the coordinator.
 */
export function parseMethodArguments<T extends z.ZodTypeAny>(
  schema: T,
  expectedSignature: string,
  call: MethodArguments,
): z.infer<T> | undefined {
  if (call.signature !== expectedSignature) {
    return undefined;
  }
  const parsed = schema.safeParse(call.body);
  return parsed.success ? parsed.data : undefined;
}
