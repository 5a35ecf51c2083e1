import { describe, it, expect, beforeEach } from "vitest";

import { MemoryKeyValueClient } from "../src/store/key_value_client";
import type { RelayLogger } from "../src/lib/log";
import { KeyValueSolutionStore } from "../src/store/solution_store";

const FP = "a".repeat(64);

describe("KeyValueSolutionStore", () => {
  let clock: number;
  let sleeps: number[];
  let client: MemoryKeyValueClient;
  let store: KeyValueSolutionStore;

  beforeEach(() => {
    clock = 1_000_000;
    sleeps = [];
    const now = () => clock;
    client = new MemoryKeyValueClient({ now });
    store = new KeyValueSolutionStore({
      client,
      namespace: "test",
      now,
      sleepImpl: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
    });
  });

  it("round-trips a payload under the namespaced key", async () => {
    expect(await store.put(FP, { reply: "done", artifact: "v2" }, 120)).toBe(true);
    expect(client.keys()).toEqual([`test:solution:${FP}`]);
    expect(await store.get(FP)).toEqual({ reply: "done", artifact: "v2" });
  });

  it("records fingerprint and store time", async () => {
    await store.put(FP, { reply: "r", artifact: "a" }, 120);
    const entry = await store.getEntry(FP);
    expect(entry).toEqual({
      fingerprint: FP,
      payload: { reply: "r", artifact: "a" },
      storedAt: new Date(1_000_000).toISOString(),
    });
  });

  it("expires entries after the ttl", async () => {
    await store.put(FP, { reply: "r", artifact: "a" }, 120);
    clock += 119_999;
    expect(await store.get(FP)).toEqual({ reply: "r", artifact: "a" });
    clock += 1;
    expect(await store.get(FP)).toBeNull();
  });

  it("overwrites on re-publish", async () => {
    await store.put(FP, { reply: "first", artifact: "a" }, 120);
    await store.put(FP, { reply: "second", artifact: "b" }, 120);
    expect(await store.get(FP)).toEqual({ reply: "second", artifact: "b" });
  });

  it("treats unparseable entries as absent", async () => {
    await client.setWithExpiry(`test:solution:${FP}`, "not json", 60);
    expect(await store.get(FP)).toBeNull();
  });

  it("fills a missing artifact with the sentinel", async () => {
    await client.setWithExpiry(`test:solution:${FP}`, JSON.stringify({ reply: "only reply" }), 60);
    expect(await store.get(FP)).toEqual({ reply: "only reply", artifact: "no update" });
  });

  it("deletes", async () => {
    await store.put(FP, { reply: "r", artifact: "a" }, 120);
    expect(await store.delete(FP)).toBe(true);
    expect(await store.get(FP)).toBeNull();
  });

  it("degrades to absent when the service is unreachable", async () => {
    client.available = false;
    expect(await store.put(FP, { reply: "r", artifact: "a" }, 120)).toBe(false);
    expect(await store.get(FP)).toBeNull();
    expect(await store.delete(FP)).toBe(false);
    expect(await store.isAvailable()).toBe(false);
  });

  describe("waitFor", () => {
    it("returns at once when the entry is already there", async () => {
      await store.put(FP, { reply: "cached", artifact: "v1" }, 120);
      expect(await store.waitFor(FP, 5, 0.5)).toEqual({ reply: "cached", artifact: "v1" });
      expect(sleeps).toEqual([]);
    });

    it("gives up at the deadline, never later", async () => {
      const startedAt = clock;
      expect(await store.waitFor(FP, 2, 0.5)).toBeNull();
      const elapsed = clock - startedAt;
      expect(elapsed).toBeGreaterThanOrEqual(2000);
      expect(elapsed).toBeLessThan(2500);
      expect(sleeps).toEqual([500, 500, 500, 500]);
      expect(client.calls.get).toBe(5);
    });

    it("shortens the last sleep to the deadline", async () => {
      expect(await store.waitFor(FP, 1.2, 0.5)).toBeNull();
      expect(sleeps).toEqual([500, 500, 200]);
    });

    it("ends the wait on the first failed read and logs it once", async () => {
      const events: string[] = [];
      const record = (_obj: Record<string, unknown>, msg?: string) => {
        events.push(msg ?? "");
      };
      const log: RelayLogger = { debug: () => undefined, info: record, warn: record, error: record };
      const waiting = new KeyValueSolutionStore({
        client,
        namespace: "test",
        log,
        now: () => clock,
        sleepImpl: async (ms) => {
          sleeps.push(ms);
          clock += ms;
          client.available = false;
        },
      });

      expect(await waiting.waitForSolution(FP, 55, 0.5)).toEqual({ status: "store_unavailable" });
      expect(sleeps).toEqual([500]);
      expect(events).toEqual(["solution_store.wait_started", "solution_store.wait_store_unavailable"]);
    });

    it("reports a miss at the deadline as a timeout", async () => {
      expect(await store.waitForSolution(FP, 1, 0.5)).toEqual({ status: "timeout" });
    });

    it("picks up an entry published while waiting", async () => {
      const waiting = new KeyValueSolutionStore({
        client,
        namespace: "test",
        now: () => clock,
        sleepImpl: async (ms) => {
          sleeps.push(ms);
          clock += ms;
          if (sleeps.length === 2) {
            await store.put(FP, { reply: "late", artifact: "v3" }, 120);
          }
        },
      });

      expect(await waiting.waitFor(FP, 10, 0.5)).toEqual({ reply: "late", artifact: "v3" });
      expect(sleeps).toEqual([500, 500]);
    });
  });
});
