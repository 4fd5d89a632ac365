import { describe, expect, it } from "vitest";
import { DEFAULT_API_HOST, loadConfig } from "./config";
import { ConfigurationError } from "./errors";

describe("loadConfig", () => {
  it("fails when RAPID_API_KEY is missing", () => {
    expect(() => loadConfig({})).toThrow(ConfigurationError);
    expect(() => loadConfig({})).toThrow("RAPID_API_KEY is required");
  });

  it("fails when RAPID_API_KEY is blank", () => {
    expect(() => loadConfig({ RAPID_API_KEY: "   " })).toThrow("RAPID_API_KEY is required");
  });

  it("applies defaults for host and port", () => {
    expect(loadConfig({ RAPID_API_KEY: "test-key" })).toEqual({
      apiKey: "test-key",
      apiHost: DEFAULT_API_HOST,
      port: 8000,
    });
  });

  it("reads host and port overrides", () => {
    const config = loadConfig({
      RAPID_API_KEY: "test-key",
      RAPID_API_HOST: "football.example.test",
      PORT: "3001",
    });
    expect(config.apiHost).toBe("football.example.test");
    expect(config.port).toBe(3001);
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ RAPID_API_KEY: "test-key", PORT: "eighty" })).toThrow(
      "PORT must be a number"
    );
  });

  it("returns a frozen value", () => {
    expect(Object.isFrozen(loadConfig({ RAPID_API_KEY: "test-key" }))).toBe(true);
  });
});
