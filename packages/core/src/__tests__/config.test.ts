import { afterEach, describe, it, expect, vi } from "vitest";
import { ConfigError } from "../errors.js";
import { getBaseConfig, loadBaseConfig, resetBaseConfig } from "../config.js";

afterEach(() => {
  vi.unstubAllEnvs();
  resetBaseConfig();
});

describe("loadBaseConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadBaseConfig({});

    expect(config.agent).toEqual({
      defaultMode: "standard",
      budgetUsd: undefined,
      escalationEnabled: false,
      evDeltaThreshold: 0.1,
      minVolume24h: 1000,
      maxConcurrency: 1,
      minCitationDomains: 2,
      deepTaskTimeoutSeconds: 300,
      deepTaskPollSeconds: 5,
    });
    expect(config.kalshi).toEqual({
      baseUrl: "https://api.elections.kalshi.com/trade-api/v2",
      environment: "prod",
    });
    expect(config.exa.baseUrl).toBe("https://api.exa.ai");
    expect(config.supabase).toBeUndefined();
    expect(config.env).toEqual({ logLevel: "info", dataDir: "./data", nodeEnv: "development" });
  });

  it("reads policy overrides and flags", () => {
    const config = loadBaseConfig({
      AGENT_DEFAULT_MODE: "deep",
      AGENT_BUDGET_USD: "0.75",
      AGENT_ESCALATION_ENABLED: "1",
      AGENT_MAX_CONCURRENCY: "3",
      KALSHI_ENVIRONMENT: "demo",
      SUPABASE_URL: "https://db.example.com",
      SUPABASE_KEY: "test-secret",
    });

    expect(config.agent.defaultMode).toBe("deep");
    expect(config.agent.budgetUsd).toBe(0.75);
    expect(config.agent.escalationEnabled).toBe(true);
    expect(config.agent.maxConcurrency).toBe(3);
    expect(config.kalshi.baseUrl).toBe("https://demo-api.kalshi.co/trade-api/v2");
    expect(config.supabase).toEqual({ url: "https://db.example.com", key: "test-secret" });
  });

  it("rejects out-of-range values with the variable names", () => {
    try {
      loadBaseConfig({ AGENT_MAX_CONCURRENCY: "8", AGENT_DEFAULT_MODE: "slow" });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      expect(error instanceof ConfigError && error.context).toEqual({
        variables: ["AGENT_DEFAULT_MODE", "AGENT_MAX_CONCURRENCY"],
      });
    }
  });

  it("caches the environment until reset", () => {
    vi.stubEnv("AGENT_MAX_CONCURRENCY", "2");
    resetBaseConfig();
    expect(getBaseConfig().agent.maxConcurrency).toBe(2);

    vi.stubEnv("AGENT_MAX_CONCURRENCY", "3");
    expect(getBaseConfig().agent.maxConcurrency).toBe(2);

    resetBaseConfig();
    expect(getBaseConfig().agent.maxConcurrency).toBe(3);
  });
});
