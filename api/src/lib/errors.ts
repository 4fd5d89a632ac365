// src/lib/errors.ts
import type { Response } from "express";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/** Non-200 answer from API-Football. `message` is the upstream body as text. */
export class UpstreamError extends Error {
  readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = "UpstreamError";
    this.status = status;
  }
}

export type ValidationIssue = {
  path: string;
  message: string;
};

export class ValidationError extends Error {
  readonly status = 422;
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super("Invalid request");
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export function sendError(res: Response, err: unknown) {
  if (err instanceof ValidationError) {
    return res.status(err.status).json({ error: err.message, details: err.issues });
  }

  if (err instanceof UpstreamError) {
    console.error(`Upstream request failed (${err.status}):`, err.message);
    return res.status(err.status).json({ error: err.message });
  }

  console.error("Unhandled error:", err);
  const message = err instanceof Error && err.message ? err.message : "Unknown error";
  return res.status(500).json({ error: message });
}
