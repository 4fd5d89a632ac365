// src/lib/config.ts
import { z } from "zod";
import { ConfigurationError } from "./errors";

export const DEFAULT_API_HOST = "api-football-v1.p.rapidapi.com";
export const DEFAULT_PORT = 8000;

const envSchema = z.object({
  RAPID_API_KEY: z
    .string({ required_error: "RAPID_API_KEY is required" })
    .trim()
    .min(1, "RAPID_API_KEY is required"),
  RAPID_API_HOST: z.string().trim().min(1, "RAPID_API_HOST must not be empty").default(DEFAULT_API_HOST),
  PORT: z.coerce
    .number({ invalid_type_error: "PORT must be a number" })
    .int("PORT must be an integer")
    .min(1, "PORT must be between 1 and 65535")
    .max(65535, "PORT must be between 1 and 65535")
    .default(DEFAULT_PORT),
});

export type AppConfig = Readonly<{
  apiKey: string;
  apiHost: string;
  port: number;
}>;

/**
 * Reads the service configuration from `env`.
 * Throws a ConfigurationError listing every problem when the environment is unusable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const message = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new ConfigurationError(message);
  }

  return Object.freeze({
    apiKey: parsed.data.RAPID_API_KEY,
    apiHost: parsed.data.RAPID_API_HOST,
    port: parsed.data.PORT,
  });
}
