import Redis from "ioredis";

import type { RelayLogger } from "../lib/log";
import { errorMessage } from "../lib/log";

/**
 * The slice of a Redis-like service the solution store depends on.
 * Every method may reject when the service is unreachable.
 */
export interface KeyValueClient {
  setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void>;
  get(key: string): Promise<string | null>;
  del(key: string): Promise<number>;
  ping(): Promise<boolean>;
  close(): Promise<void>;
}

export type RedisClientOptions = {
  host: string;
  port: number;
  db: number;
  connectTimeoutMs?: number;
  log: RelayLogger;
};

export class RedisKeyValueClient implements KeyValueClient {
  private redis: Redis;
  private log: RelayLogger;
  private lastErrorLoggedAt = 0;

  constructor(opts: RedisClientOptions) {
    this.log = opts.log;
    this.redis = new Redis({
      host: opts.host,
      port: opts.port,
      db: opts.db,
      lazyConnect: true,
      connectTimeout: opts.connectTimeoutMs ?? 5000,
      keepAlive: 30_000,
      // Fail commands immediately while disconnected instead of queueing them.
      enableOfflineQueue: false,
      maxRetriesPerRequest: 1,
      retryStrategy: (times) => Math.min(times * 500, 5000),
    });

    this.redis.on("error", (error: Error) => {
      const now = Date.now();
      if (now - this.lastErrorLoggedAt < 30_000) return;
      this.lastErrorLoggedAt = now;
      this.log.warn({ error: error.message }, "kv.redis.error");
    });
  }

  async connect(): Promise<boolean> {
    try {
      await this.redis.connect();
      await this.redis.ping();
      this.log.info({}, "kv.redis.connected");
      return true;
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, "kv.redis.connect_failed");
      return false;
    }
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.redis.set(key, value, "EX", ttlSeconds);
  }

  async get(key: string): Promise<string | null> {
    return this.redis.get(key);
  }

  async del(key: string): Promise<number> {
    return this.redis.del(key);
  }

  async ping(): Promise<boolean> {
    const reply = await this.redis.ping();
    return reply === "PONG";
  }

  async close(): Promise<void> {
    if (this.redis.status === "end") return;
    if (this.redis.status === "wait") {
      // never connected
      this.redis.disconnect();
      return;
    }
    try {
      await this.redis.quit();
    } catch {
      this.redis.disconnect();
    }
  }
}

type MemoryEntry = { value: string; expiresAtMs: number };

/**
 * In-process stand-in with server-style expiry. Used by tests and by nodes
 * running without a shared service.
 */
export class MemoryKeyValueClient implements KeyValueClient {
  private entries = new Map<string, MemoryEntry>();
  private now: () => number;
  available = true;
  calls = { set: 0, get: 0, del: 0 };

  constructor(opts: { now?: () => number } = {}) {
    this.now = opts.now ?? Date.now;
  }

  private assertAvailable() {
    if (!this.available) {
      throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    }
  }

  async setWithExpiry(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.assertAvailable();
    this.calls.set += 1;
    this.entries.set(key, { value, expiresAtMs: this.now() + ttlSeconds * 1000 });
  }

  async get(key: string): Promise<string | null> {
    this.assertAvailable();
    this.calls.get += 1;
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.value;
  }

  async del(key: string): Promise<number> {
    this.assertAvailable();
    this.calls.del += 1;
    return this.entries.delete(key) ? 1 : 0;
  }

  async ping(): Promise<boolean> {
    return this.available;
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
