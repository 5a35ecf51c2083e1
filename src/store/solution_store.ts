import { setTimeout as sleep } from "node:timers/promises";

import { z } from "zod";

import { NO_UPDATE, type ComponentResult } from "../contracts/component";
import { shortFingerprint } from "../coordination/task_fingerprint";
import { createDefaultLogger, errorMessage, type RelayLogger } from "../lib/log";
import type { KeyValueClient } from "./key_value_client";

export type SolutionEntry = {
  fingerprint: string;
  payload: ComponentResult;
  storedAt: string;
};

export interface SolutionStore {
  put(fingerprint: string, payload: ComponentResult, ttlSeconds: number): Promise<boolean>;
  get(fingerprint: string): Promise<ComponentResult | null>;
  getEntry(fingerprint: string): Promise<SolutionEntry | null>;
  waitFor(
    fingerprint: string,
    timeoutSeconds: number,
    pollIntervalSeconds: number
  ): Promise<ComponentResult | null>;
  waitForSolution(
    fingerprint: string,
    timeoutSeconds: number,
    pollIntervalSeconds: number
  ): Promise<WaitResult>;
  delete(fingerprint: string): Promise<boolean>;
  isAvailable(): Promise<boolean>;
}

export type WaitResult =
  | { status: "found"; payload: ComponentResult }
  | { status: "timeout" }
  | { status: "store_unavailable" };

type ReadResult = { ok: true; entry: SolutionEntry | null } | { ok: false; error: string };

const StoredSolution = z.object({
  reply: z.string().default(""),
  artifact: z.string().default(NO_UPDATE),
  fingerprint: z.string().optional(),
  storedAt: z.string().optional(),
});

type StoreOptions = {
  client: KeyValueClient;
  namespace?: string;
  log?: RelayLogger;
  now?: () => number;
  sleepImpl?: (ms: number) => Promise<void>;
};

/**
 * Shared, TTL-bounded solution cache. Advisory only: every failure of the
 * underlying service reads as "absent" (or `false` for writes).
 */
export class KeyValueSolutionStore implements SolutionStore {
  private client: KeyValueClient;
  private namespace: string;
  private log: RelayLogger;
  private now: () => number;
  private sleepImpl: (ms: number) => Promise<void>;

  constructor(opts: StoreOptions) {
    this.client = opts.client;
    this.namespace = opts.namespace ?? "relay";
    this.log = opts.log ?? createDefaultLogger();
    this.now = opts.now ?? Date.now;
    this.sleepImpl = opts.sleepImpl ?? ((ms) => sleep(ms));
  }

  keyFor(fingerprint: string): string {
    return `${this.namespace}:solution:${fingerprint}`;
  }

  async put(fingerprint: string, payload: ComponentResult, ttlSeconds: number): Promise<boolean> {
    const ttl = Math.max(1, Math.ceil(ttlSeconds));
    const body = JSON.stringify({
      reply: payload.reply,
      artifact: payload.artifact,
      fingerprint,
      storedAt: new Date(this.now()).toISOString(),
    });

    try {
      await this.client.setWithExpiry(this.keyFor(fingerprint), body, ttl);
      this.log.info(
        { fingerprint: shortFingerprint(fingerprint), ttlSeconds: ttl },
        "solution_store.put"
      );
      return true;
    } catch (error) {
      this.log.error(
        { fingerprint: shortFingerprint(fingerprint), error: errorMessage(error) },
        "solution_store.put_failed"
      );
      return false;
    }
  }

  private async read(fingerprint: string): Promise<ReadResult> {
    let raw: string | null;
    try {
      raw = await this.client.get(this.keyFor(fingerprint));
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }

    if (raw === null) {
      this.log.debug({ fingerprint: shortFingerprint(fingerprint) }, "solution_store.miss");
      return { ok: true, entry: null };
    }

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(raw);
    } catch (error) {
      this.log.warn(
        { fingerprint: shortFingerprint(fingerprint), error: errorMessage(error) },
        "solution_store.entry_invalid"
      );
      return { ok: true, entry: null };
    }

    const parsed = StoredSolution.safeParse(parsedJson);
    if (!parsed.success) {
      this.log.warn(
        { fingerprint: shortFingerprint(fingerprint), issues: parsed.error.issues.length },
        "solution_store.entry_invalid"
      );
      return { ok: true, entry: null };
    }

    return {
      ok: true,
      entry: {
        fingerprint: parsed.data.fingerprint ?? fingerprint,
        payload: { reply: parsed.data.reply, artifact: parsed.data.artifact },
        storedAt: parsed.data.storedAt ?? "",
      },
    };
  }

  async getEntry(fingerprint: string): Promise<SolutionEntry | null> {
    const read = await this.read(fingerprint);
    if (!read.ok) {
      this.log.error(
        { fingerprint: shortFingerprint(fingerprint), error: read.error },
        "solution_store.get_failed"
      );
      return null;
    }
    return read.entry;
  }

  async get(fingerprint: string): Promise<ComponentResult | null> {
    const entry = await this.getEntry(fingerprint);
    return entry ? entry.payload : null;
  }

  async waitFor(
    fingerprint: string,
    timeoutSeconds: number,
    pollIntervalSeconds: number
  ): Promise<ComponentResult | null> {
    const waited = await this.waitForSolution(fingerprint, timeoutSeconds, pollIntervalSeconds);
    return waited.status === "found" ? waited.payload : null;
  }

  /**
   * Cooperative poll. The last check happens at the deadline, never after it,
   * so a miss returns within one poll interval of `timeoutSeconds`. A read
   * that fails ends the wait at once with `store_unavailable`.
   */
  async waitForSolution(
    fingerprint: string,
    timeoutSeconds: number,
    pollIntervalSeconds: number
  ): Promise<WaitResult> {
    const timeoutMs = Math.max(0, timeoutSeconds * 1000);
    const pollMs = Math.max(1, pollIntervalSeconds * 1000);
    const startedAt = this.now();
    let polls = 0;

    this.log.info(
      { fingerprint: shortFingerprint(fingerprint), timeoutSeconds, pollIntervalSeconds },
      "solution_store.wait_started"
    );

    for (;;) {
      polls += 1;
      const read = await this.read(fingerprint);
      const elapsedMs = this.now() - startedAt;

      if (!read.ok) {
        this.log.warn(
          { fingerprint: shortFingerprint(fingerprint), elapsedMs, polls, error: read.error },
          "solution_store.wait_store_unavailable"
        );
        return { status: "store_unavailable" };
      }

      if (read.entry) {
        this.log.info(
          { fingerprint: shortFingerprint(fingerprint), elapsedMs, polls },
          "solution_store.wait_found"
        );
        return { status: "found", payload: read.entry.payload };
      }

      if (elapsedMs >= timeoutMs) {
        this.log.warn(
          { fingerprint: shortFingerprint(fingerprint), elapsedMs, polls },
          "solution_store.wait_timeout"
        );
        return { status: "timeout" };
      }

      await this.sleepImpl(Math.min(pollMs, timeoutMs - elapsedMs));
    }
  }

  async delete(fingerprint: string): Promise<boolean> {
    try {
      await this.client.del(this.keyFor(fingerprint));
      this.log.info({ fingerprint: shortFingerprint(fingerprint) }, "solution_store.deleted");
      return true;
    } catch (error) {
      this.log.error(
        { fingerprint: shortFingerprint(fingerprint), error: errorMessage(error) },
        "solution_store.delete_failed"
      );
      return false;
    }
  }

  async isAvailable(): Promise<boolean> {
    try {
      return await this.client.ping();
    } catch {
      return false;
    }
  }
}
