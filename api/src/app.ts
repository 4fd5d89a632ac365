// src/app.ts
import type { Server } from "node:http";
import express, { type Express } from "express";
import healthHandler from "../health";
import indexHandler from "../index";
import playerHandler from "../player";
import topScorersHandler from "../topscorers";
import { readOnly } from "./lib/cors";
import type { FootballClient } from "./lib/footballClient";

export function createApp(client: FootballClient) {
  const app = express();
  app.disable("x-powered-by");

  app.use(readOnly);

  app.get("/", indexHandler);
  app.get("/health", healthHandler);
  app.get("/player/:player_id", playerHandler(client));
  app.get("/topscorers/:league_id", topScorersHandler(client));

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  return app;
}

/** Resolves once the app is bound to `port`; rejects on bind errors such as EADDRINUSE. */
export function startServer(app: Express, port: number) {
  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(port);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      resolve(server);
    });
  });
}
