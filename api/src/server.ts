// src/server.ts
import dotenv from "dotenv";
import { createApp, startServer } from "./app";
import { loadConfig } from "./lib/config";
import { ConfigurationError } from "./lib/errors";
import { RapidApiFootballClient } from "./lib/footballClient";

dotenv.config();

async function main() {
  const config = loadConfig();
  const client = new RapidApiFootballClient({ apiKey: config.apiKey, apiHost: config.apiHost });

  await startServer(createApp(client), config.port);
  console.log(`soccer-stats-proxy listening on port ${config.port}`);
}

main().catch((e: unknown) => {
  if (e instanceof ConfigurationError) {
    console.error(`Configuration error: ${e.message}`);
  } else {
    console.error("Failed to start:", e);
  }
  process.exit(1);
});
