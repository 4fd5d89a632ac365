// src/lib/params.ts
import { z } from "zod";
import { ValidationError } from "./errors";

const integer = z
  .string({ invalid_type_error: "Expected a single integer value" })
  .trim()
  .regex(/^[+-]?\d+$/, "Expected an integer")
  .transform((value, ctx) => {
    const parsed = Number(value);
    // must survive the round trip to the upstream query string unchanged
    if (!Number.isSafeInteger(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Integer out of range" });
      return z.NEVER;
    }
    return parsed;
  });

export const playerRequestSchema = z.object({
  player_id: integer,
  season: integer.optional(),
});

export const topScorersRequestSchema = z.object({
  league_id: integer,
  season: integer.optional(),
});

/** Parses path params and query string together; throws ValidationError on any bad field. */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => ({
        path: issue.path.join("."),
        message: issue.message,
      }))
    );
  }
  return parsed.data;
}
