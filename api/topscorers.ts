// api/topscorers.ts
import type { Request, Response } from "express";
import { sendError } from "./src/lib/errors";
import type { FootballClient } from "./src/lib/footballClient";
import { parseRequest, topScorersRequestSchema } from "./src/lib/params";

export default function topScorersHandler(client: FootballClient) {
  return async function handler(req: Request, res: Response) {
    try {
      const { league_id, season } = parseRequest(topScorersRequestSchema, {
        league_id: req.params.league_id,
        season: req.query.season,
      });

      const data = await client.getTopScorers({
        leagueId: league_id,
        season,
      });

      return res.status(200).json(data);
    } catch (e) {
      return sendError(res, e);
    }
  };
}
