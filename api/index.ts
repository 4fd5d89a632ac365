// api/index.ts
import type { Request, Response } from "express";

export const SERVICE_INFO = {
  message: "Soccer Stats API",
  version: "1.0.0",
  endpoints: ["/", "/health", "/player/{player_id}", "/topscorers/{league_id}"],
} as const;

export default function handler(_req: Request, res: Response) {
  res.status(200).json(SERVICE_INFO);
}
