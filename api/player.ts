// api/player.ts
import type { Request, Response } from "express";
import { sendError } from "./src/lib/errors";
import type { FootballClient } from "./src/lib/footballClient";
import { parseRequest, playerRequestSchema } from "./src/lib/params";

export default function playerHandler(client: FootballClient) {
  return async function handler(req: Request, res: Response) {
    try {
      const { player_id, season } = parseRequest(playerRequestSchema, {
        player_id: req.params.player_id,
        season: req.query.season,
      });

      const data = await client.getPlayerStats({
        playerId: player_id,
        season,
      });

      return res.status(200).json(data);
    } catch (e) {
      return sendError(res, e);
    }
  };
}
