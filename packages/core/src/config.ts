/**
 * Configuration Management
 * Loads and validates base configuration from environment variables
 */

import { z } from "zod";
import "dotenv/config";
import { ConfigError } from "./errors.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

// Base environment schema - shared across all apps
const baseEnvSchema = z.object({
  // Exa (research provider)
  EXA_API_KEY: z.string().optional(),
  EXA_BASE_URL: z.string().url().default("https://api.exa.ai"),

  // Anthropic (synthesis critic)
  ANTHROPIC_API_KEY: z.string().optional(),

  // Kalshi (market data)
  KALSHI_ENVIRONMENT: z.enum(["prod", "demo"]).default("prod"),
  KALSHI_BASE_URL: z.string().url().optional(),

  // Supabase
  SUPABASE_URL: z.string().url().optional(),
  SUPABASE_KEY: z.string().optional(),

  // Agent policy
  AGENT_DEFAULT_MODE: z.enum(["fast", "standard", "deep"]).default("standard"),
  AGENT_BUDGET_USD: z.coerce.number().positive().optional(),
  AGENT_ESCALATION_ENABLED: booleanFlag.default("false"),
  AGENT_EV_DELTA_THRESHOLD: z.coerce.number().min(0).max(1).default(0.1),
  AGENT_MIN_VOLUME_24H: z.coerce.number().min(0).default(1000),
  AGENT_MAX_CONCURRENCY: z.coerce.number().int().min(1).max(3).default(1),
  AGENT_MIN_CITATION_DOMAINS: z.coerce.number().int().min(0).default(2),
  DEEP_TASK_TIMEOUT_SECONDS: z.coerce.number().positive().default(300),
  DEEP_TASK_POLL_SECONDS: z.coerce.number().positive().default(5),

  // General
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("./data"),
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type BaseEnv = z.infer<typeof baseEnvSchema>;

export type ResearchModeSetting = BaseEnv["AGENT_DEFAULT_MODE"];

/**
 * Base configuration - shared across all apps
 */
export interface BaseConfig {
  exa: {
    apiKey?: string;
    baseUrl: string;
  };

  anthropic: {
    apiKey?: string;
  };

  kalshi: {
    baseUrl: string;
    environment: "prod" | "demo";
  };

  supabase?: {
    url: string;
    key: string;
  };

  agent: {
    defaultMode: ResearchModeSetting;
    budgetUsd?: number;
    escalationEnabled: boolean;
    evDeltaThreshold: number;
    minVolume24h: number;
    maxConcurrency: number;
    minCitationDomains: number;
    deepTaskTimeoutSeconds: number;
    deepTaskPollSeconds: number;
  };

  env: {
    logLevel: "debug" | "info" | "warn" | "error";
    dataDir: string;
    nodeEnv: "development" | "production" | "test";
  };
}

const KALSHI_BASE_URLS = {
  prod: "https://api.elections.kalshi.com/trade-api/v2",
  demo: "https://demo-api.kalshi.co/trade-api/v2",
} as const;

let baseConfigInstance: BaseConfig | null = null;

/**
 * Load and validate base configuration
 */
export function loadBaseConfig(source: NodeJS.ProcessEnv = process.env): BaseConfig {
  const parseResult = baseEnvSchema.safeParse(source);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map((e) => `  - ${e.path.join(".")}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Configuration validation failed:\n${errors}`, {
      variables: parseResult.error.issues.map((e) => e.path.join(".")),
    });
  }

  const env = parseResult.data;

  return {
    exa: {
      apiKey: env.EXA_API_KEY || undefined,
      baseUrl: env.EXA_BASE_URL,
    },

    anthropic: {
      apiKey: env.ANTHROPIC_API_KEY || undefined,
    },

    kalshi: {
      baseUrl: env.KALSHI_BASE_URL ?? KALSHI_BASE_URLS[env.KALSHI_ENVIRONMENT],
      environment: env.KALSHI_ENVIRONMENT,
    },

    supabase: env.SUPABASE_URL && env.SUPABASE_KEY
      ? {
          url: env.SUPABASE_URL,
          key: env.SUPABASE_KEY,
        }
      : undefined,

    agent: {
      defaultMode: env.AGENT_DEFAULT_MODE,
      budgetUsd: env.AGENT_BUDGET_USD,
      escalationEnabled: env.AGENT_ESCALATION_ENABLED,
      evDeltaThreshold: env.AGENT_EV_DELTA_THRESHOLD,
      minVolume24h: env.AGENT_MIN_VOLUME_24H,
      maxConcurrency: env.AGENT_MAX_CONCURRENCY,
      minCitationDomains: env.AGENT_MIN_CITATION_DOMAINS,
      deepTaskTimeoutSeconds: env.DEEP_TASK_TIMEOUT_SECONDS,
      deepTaskPollSeconds: env.DEEP_TASK_POLL_SECONDS,
    },

    env: {
      logLevel: env.LOG_LEVEL,
      dataDir: env.DATA_DIR,
      nodeEnv: env.NODE_ENV,
    },
  };
}

/**
 * Get base configuration (lazy-loaded singleton)
 */
export function getBaseConfig(): BaseConfig {
  if (!baseConfigInstance) {
    baseConfigInstance = loadBaseConfig();
  }
  return baseConfigInstance;
}

/**
 * Drop the cached config so the next getBaseConfig() re-reads the environment
 */
export function resetBaseConfig(): void {
  baseConfigInstance = null;
}
