// api/health.ts
import type { Request, Response } from "express";

// Liveness only: never touches the upstream API.
export default function handler(_req: Request, res: Response) {
  res.status(200).json({
    status: "healthy",
    timestamp: new Date().toISOString(),
  });
}
