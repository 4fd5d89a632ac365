// src/lib/footballClient.ts
import { ConfigurationError, UpstreamError } from "./errors";

export const DEFAULT_SEASON = 2023;
export const DEFAULT_LEAGUE_ID = 39; // Premier League

export type PlayerQuery = {
  playerId: number;
  season?: number;
};

export type TopScorersQuery = {
  leagueId?: number;
  season?: number;
};

/** Whatever JSON API-Football sent back. Passed through untouched. */
export type UpstreamPayload = unknown;

export interface FootballClient {
  getPlayerStats(query: PlayerQuery): Promise<UpstreamPayload>;
  getTopScorers(query?: TopScorersQuery): Promise<UpstreamPayload>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type RapidApiFootballClientOptions = {
  apiKey: string;
  apiHost: string;
  fetch?: FetchLike;
};

export class RapidApiFootballClient implements FootballClient {
  private readonly apiKey: string;
  private readonly apiHost: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(options: RapidApiFootballClientOptions) {
    if (!options.apiKey) {
      throw new ConfigurationError("RAPID_API_KEY is required");
    }
    this.apiKey = options.apiKey;
    this.apiHost = options.apiHost;
    this.baseUrl = `https://${options.apiHost}/v3`;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  getPlayerStats({ playerId, season = DEFAULT_SEASON }: PlayerQuery) {
    return this.get("/players", { id: playerId, season });
  }

  getTopScorers({ leagueId = DEFAULT_LEAGUE_ID, season = DEFAULT_SEASON }: TopScorersQuery = {}) {
    return this.get("/players/topscorers", { league: leagueId, season });
  }

  private async get(path: string, query: Record<string, number>): Promise<UpstreamPayload> {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(query)) {
      params.set(key, String(value));
    }

    const res = await this.fetchImpl(`${this.baseUrl}${path}?${params.toString()}`, {
      method: "GET",
      headers: {
        "X-RapidAPI-Key": this.apiKey,
        "X-RapidAPI-Host": this.apiHost,
      },
    });

    const text = await res.text();
    if (res.status !== 200) {
      throw new UpstreamError(res.status, text);
    }

    const payload: UpstreamPayload = JSON.parse(text);
    return payload;
  }
}
