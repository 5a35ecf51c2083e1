import { describe, it, expect } from "vitest";

import { ConfigError, loadConfig } from "../src/config";

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});
    expect(config.port).toBe(8001);
    expect(config.host).toBe("0.0.0.0");
    expect(config.role).toBe("solo");
    expect(config.redis).toEqual({ host: "localhost", port: 6379, db: 0, namespace: "relay" });
    expect(config.coordination).toEqual({ ttlSeconds: 120, waitTimeoutSeconds: 55, pollIntervalSeconds: 0.5 });
    expect(config.llm.provider).toBe("fake");
    expect(config.conversations).toEqual({
      dbPath: "./data/conversations.db",
      maxMessages: 10,
      retentionDays: 7,
      historyWindow: 5,
    });
    expect(config.log).toEqual({ level: undefined, pretty: false });
  });

  it("reads coordination settings", () => {
    const config = loadConfig({
      NODE_ROLE: "waiter",
      SOLUTION_TTL_SECONDS: "60",
      WAIT_TIMEOUT_SECONDS: "20",
      WAIT_POLL_INTERVAL_MS: "250",
      REDIS_PORT: "6380",
      PINO_PRETTY: "1",
    });
    expect(config.role).toBe("waiter");
    expect(config.coordination).toEqual({ ttlSeconds: 60, waitTimeoutSeconds: 20, pollIntervalSeconds: 0.25 });
    expect(config.redis.port).toBe(6380);
    expect(config.log.pretty).toBe(true);
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ PORT: "", NODE_ROLE: "  " }).port).toBe(8001);
  });

  it("requires the wait to end before the solution expires", () => {
    expect(() => loadConfig({ SOLUTION_TTL_SECONDS: "30", WAIT_TIMEOUT_SECONDS: "30" })).toThrow(
      "Invalid configuration: WAIT_TIMEOUT_SECONDS must be shorter than SOLUTION_TTL_SECONDS"
    );
  });

  it("rejects an unknown role", () => {
    let caught: unknown;
    try {
      loadConfig({ NODE_ROLE: "parent" });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    expect(caught instanceof ConfigError && caught.issues[0].startsWith("NODE_ROLE:")).toBe(true);
  });

  it("needs a key for the openai provider", () => {
    expect(() => loadConfig({ LLM_PROVIDER: "openai" })).toThrow("OPENAI_API_KEY is required when LLM_PROVIDER=openai");
    expect(loadConfig({ LLM_PROVIDER: "openai", OPENAI_API_KEY: "test-secret" }).llm.apiKey).toBe("test-secret");
  });
});
