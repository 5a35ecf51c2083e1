import { config as loadEnv } from "dotenv";
import { z } from "zod";

import { NodeRole } from "./contracts/component";

if (process.env.NODE_ENV !== "production") {
  loadEnv();
}

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

const flag = z
  .string()
  .optional()
  .transform((value) => value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase()));

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  HOST: z.string().default("0.0.0.0"),
  NODE_NAME: z.string().default("relay-node"),
  NODE_ROLE: NodeRole.default("solo"),

  REDIS_HOST: z.string().default("localhost"),
  REDIS_PORT: z.coerce.number().int().min(1).max(65535).default(6379),
  REDIS_DB: z.coerce.number().int().min(0).default(0),
  REDIS_NAMESPACE: z.string().min(1).default("relay"),
  SOLUTION_TTL_SECONDS: z.coerce.number().positive().default(120),
  WAIT_TIMEOUT_SECONDS: z.coerce.number().positive().default(55),
  WAIT_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(500),

  LLM_PROVIDER: z.enum(["openai", "fake"]).default("fake"),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  MAX_TOKENS: z.coerce.number().int().positive().default(4000),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),

  CONVERSATION_DB_PATH: z.string().default("./data/conversations.db"),
  MAX_CONVERSATION_MESSAGES: z.coerce.number().int().positive().default(10),
  CONVERSATION_RETENTION_DAYS: z.coerce.number().positive().default(7),
  HISTORY_WINDOW: z.coerce.number().int().min(0).default(5),

  GOOGLE_API_KEY: z.string().optional(),
  GOOGLE_CX_KEY: z.string().optional(),

  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  PINO_PRETTY: flag,
});

export type RelayConfig = {
  port: number;
  host: string;
  nodeName: string;
  role: NodeRole;
  redis: { host: string; port: number; db: number; namespace: string };
  coordination: { ttlSeconds: number; waitTimeoutSeconds: number; pollIntervalSeconds: number };
  llm: {
    provider: "openai" | "fake";
    apiKey?: string;
    model: string;
    baseUrl: string;
    maxTokens: number;
    timeoutMs: number;
  };
  conversations: {
    dbPath: string;
    maxMessages: number;
    retentionDays: number;
    historyWindow: number;
  };
  search: { apiKey?: string; cx?: string };
  log: { level?: string; pretty: boolean };
};

// Blank variables count as unset.
const dropBlank = (env: NodeJS.ProcessEnv): Record<string, string> =>
  Object.fromEntries(
    Object.entries(env).filter((entry): entry is [string, string] => typeof entry[1] === "string" && entry[1].trim() !== "")
  );

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(dropBlank(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const e = parsed.data;

  const issues: string[] = [];
  if (e.WAIT_TIMEOUT_SECONDS >= e.SOLUTION_TTL_SECONDS) {
    issues.push("WAIT_TIMEOUT_SECONDS must be shorter than SOLUTION_TTL_SECONDS");
  }
  if (e.WAIT_POLL_INTERVAL_MS / 1000 > e.WAIT_TIMEOUT_SECONDS) {
    issues.push("WAIT_POLL_INTERVAL_MS must not exceed WAIT_TIMEOUT_SECONDS");
  }
  if (e.LLM_PROVIDER === "openai" && !e.OPENAI_API_KEY) {
    issues.push("OPENAI_API_KEY is required when LLM_PROVIDER=openai");
  }
  if (issues.length > 0) {
    throw new ConfigError(issues);
  }

  return {
    port: e.PORT,
    host: e.HOST,
    nodeName: e.NODE_NAME,
    role: e.NODE_ROLE,
    redis: { host: e.REDIS_HOST, port: e.REDIS_PORT, db: e.REDIS_DB, namespace: e.REDIS_NAMESPACE },
    coordination: {
      ttlSeconds: e.SOLUTION_TTL_SECONDS,
      waitTimeoutSeconds: e.WAIT_TIMEOUT_SECONDS,
      pollIntervalSeconds: e.WAIT_POLL_INTERVAL_MS / 1000,
    },
    llm: {
      provider: e.LLM_PROVIDER,
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      baseUrl: e.OPENAI_BASE_URL,
      maxTokens: e.MAX_TOKENS,
      timeoutMs: e.REQUEST_TIMEOUT_MS,
    },
    conversations: {
      dbPath: e.CONVERSATION_DB_PATH,
      maxMessages: e.MAX_CONVERSATION_MESSAGES,
      retentionDays: e.CONVERSATION_RETENTION_DAYS,
      historyWindow: e.HISTORY_WINDOW,
    },
    search: { apiKey: e.GOOGLE_API_KEY, cx: e.GOOGLE_CX_KEY },
    log: { level: e.LOG_LEVEL, pretty: e.PINO_PRETTY },
  };
}
