import { z } from "zod";
import { ConfigurationError } from "./errors";

export function toFriendlyZodError(error: z.ZodError, subject: string): string {
  const details = error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `- ${path}: ${issue.message}`;
    })
    .join("\n");
  return `Malformed ${subject}:\n${details}`;
}

export function parseTunables<TSchema extends z.ZodTypeAny>(schema: TSchema, input: unknown, subject: string): z.output<TSchema> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(toFriendlyZodError(parsed.error, subject), subject);
  }
  return parsed.data;
}
