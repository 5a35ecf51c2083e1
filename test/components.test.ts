import { describe, it, expect, beforeEach } from "vitest";

import { NO_UPDATE, type ComponentInput, type NodeRole } from "../src/contracts/component";
import { FEEDBACK_ACK, runComponent, type ComponentDeps } from "../src/control-plane/components";
import { PROMPT_TEMPLATES } from "../src/control-plane/prompt_pack";
import { fingerprint } from "../src/coordination/task_fingerprint";
import type { SearchResult, WebSearchClient } from "../src/evidence/web_search";
import { createDefaultLogger } from "../src/lib/log";
import { MemoryConversationStore } from "../src/memory/conversation_store";
import { FakeGenerator } from "../src/providers/fake_model";
import { GeneratorError } from "../src/providers/generator";
import { MemoryKeyValueClient } from "../src/store/key_value_client";
import { KeyValueSolutionStore } from "../src/store/solution_store";

class StubSearch implements WebSearchClient {
  configured = true;
  calls: Array<{ queries: string[]; num?: number }> = [];
  constructor(private results: SearchResult[]) {}

  async search(query: string, num?: number) {
    this.calls.push({ queries: [query], num });
    return this.results;
  }

  async searchMany(queries: string[], num?: number) {
    this.calls.push({ queries, num });
    return this.results;
  }
}

const input = (overrides: Partial<ComponentInput> = {}): ComponentInput => ({
  cid: "conv-1",
  task: "draft the plan",
  input: [{ query: "three steps" }],
  priorOutputs: [],
  useConversationHistory: true,
  ...overrides,
});

describe("runComponent", () => {
  let clock: number;
  let generator: FakeGenerator;
  let client: MemoryKeyValueClient;
  let store: KeyValueSolutionStore;
  let conversations: MemoryConversationStore;
  let search: StubSearch;

  const deps = (role: NodeRole = "solo"): ComponentDeps => ({
    role,
    generator,
    store,
    conversations,
    search,
    coordination: { ttlSeconds: 120, waitTimeoutSeconds: 2, pollIntervalSeconds: 0.5 },
    historyWindow: 5,
    log: createDefaultLogger(),
  });

  beforeEach(() => {
    clock = Date.parse("2026-03-01T00:00:00.000Z");
    const now = () => clock;
    generator = new FakeGenerator();
    client = new MemoryKeyValueClient({ now });
    store = new KeyValueSolutionStore({
      client,
      now,
      sleepImpl: async (ms) => {
        clock += ms;
      },
    });
    conversations = new MemoryConversationStore({ now });
    search = new StubSearch([]);
  });

  it("extracts the reply and artifact from generator output", async () => {
    generator.enqueue('<think>plan first</think>\n```json\n{"reply":"done","artifact":"v2"}\n```');

    const out = await runComponent("complete", input(), deps());

    expect(out).toEqual({
      cid: "conv-1",
      task: "draft the plan",
      input: [{ query: "three steps" }],
      component: "complete",
      output: { reply: "done", artifact: "v2" },
      coordination: {
        role: "solo",
        outcome: "generated",
        fingerprint: fingerprint("draft the plan", [{ query: "three steps" }]),
      },
    });
    expect(generator.calls[0]).toMatchObject({
      systemPrompt: PROMPT_TEMPLATES.complete.systemPrompt,
      temperature: 0.7,
      jsonMode: true,
      history: [],
    });
  });

  it("records the turn and replays it as history", async () => {
    generator.enqueue('{"reply":"first answer"}', '{"reply":"second answer"}');

    await runComponent("complete", input(), deps());
    await runComponent("refine", input(), deps());

    expect(generator.calls[1].history).toEqual([
      { role: "user", content: "Task: draft the plan\nQuery 1: three steps" },
      { role: "assistant", content: "first answer" },
    ]);
    const recent = await conversations.recentMessages("conv-1", 10);
    expect(recent.map((m) => m.content)).toEqual([
      "Task: draft the plan\nQuery 1: three steps",
      "first answer",
      "Refine task: draft the plan",
      "second answer",
    ]);
  });

  it("leaves history out when asked", async () => {
    await conversations.appendMessage("conv-1", { role: "user", content: "earlier" });
    generator.enqueue('{"reply":"x"}');

    await runComponent("complete", input({ useConversationHistory: false }), deps());

    expect(generator.calls[0].history).toEqual([]);
  });

  it("carries the prior artifact forward", async () => {
    generator.enqueue('{"reply":"kept","artifact":"no update"}');

    const out = await runComponent(
      "refine",
      input({
        priorOutputs: [
          { sourceName: "feedback", reply: "notes", artifact: NO_UPDATE },
          { sourceName: "complete", reply: "r", artifact: "DOC" },
        ],
      }),
      deps()
    );

    expect(out.output).toEqual({ reply: "kept", artifact: "DOC" });
  });

  it("returns feedback as plain text", async () => {
    generator.enqueue("Looks good\n\n\n\nShip it");

    const out = await runComponent(
      "feedback",
      input({ priorOutputs: [{ sourceName: "complete", reply: "r", artifact: "DOC" }] }),
      deps()
    );

    expect(out.output).toEqual({ reply: "Looks good\n\nShip it", artifact: NO_UPDATE });
    expect(generator.calls[0].jsonMode).toBe(false);
  });

  it("answers summary without prior outputs without generating", async () => {
    const out = await runComponent("summary", input(), deps());

    expect(out.output).toEqual({ reply: "No previous outputs to summarize.", artifact: NO_UPDATE });
    expect(out.coordination).toBeUndefined();
    expect(generator.calls).toHaveLength(0);
  });

  it("publishes as producer", async () => {
    generator.enqueue('```json\n{"reply":"done","artifact":"v2"}\n```');
    const fp = fingerprint("draft the plan", [{ query: "three steps" }]);

    const out = await runComponent("complete", input(), deps("producer"));

    expect(out.output).toEqual({ reply: "done", artifact: "v2" });
    expect(out.coordination?.outcome).toBe("published");
    expect(await store.get(fp)).toEqual({ reply: "done", artifact: "v2" });
  });

  it("reuses a published result as waiter", async () => {
    const fp = fingerprint("draft the plan", [{ query: "three steps" }]);
    await store.put(fp, { reply: "cached", artifact: "v1" }, 120);
    const startedAt = clock;

    const out = await runComponent("complete", input(), deps("waiter"));

    expect(out.output).toEqual({ reply: "cached", artifact: "v1" });
    expect(out.coordination?.outcome).toBe("reused");
    expect(generator.calls).toHaveLength(0);
    expect(clock - startedAt).toBeLessThan(500);
    expect((await conversations.recentMessages("conv-1", 1))[0].content).toBe("cached");
  });

  it("generates locally when the waiter cannot reach the store", async () => {
    client.available = false;
    generator.enqueue('{"reply":"local"}');

    const out = await runComponent("complete", input(), deps("waiter"));

    expect(out.output).toEqual({ reply: "local", artifact: NO_UPDATE });
    expect(out.coordination?.outcome).toBe("fallback_store_unavailable");
  });

  it("propagates generator failures", async () => {
    generator.enqueue(new GeneratorError("upstream down", { statusCode: 503 }));

    await expect(runComponent("complete", input(), deps())).rejects.toBeInstanceOf(GeneratorError);
    expect(await conversations.getConversation("conv-1")).toBeNull();
  });

  describe("human_feedback", () => {
    it("acknowledges and records feedback", async () => {
      const out = await runComponent(
        "human_feedback",
        input({ input: [{ query: "great" }, { query: "  " }, { query: "more detail" }] }),
        deps()
      );

      expect(out.output).toEqual({ reply: FEEDBACK_ACK, artifact: NO_UPDATE });
      const recent = await conversations.recentMessages("conv-1", 2);
      expect(recent.map((m) => m.content)).toEqual(["Feedback: great\nmore detail", FEEDBACK_ACK]);
    });

    it("needs some feedback text", async () => {
      const out = await runComponent("human_feedback", input({ input: [{ query: " " }] }), deps());
      expect(out.output.reply).toBe("No feedback text provided.");
    });
  });

  describe("internet_search", () => {
    it("searches one query for seven results", async () => {
      search = new StubSearch([{ title: "Tides", url: "https://sea.test", snippet: "water" }]);

      const out = await runComponent("internet_search", input({ input: [{ query: "tides" }] }), deps());

      expect(search.calls).toEqual([{ queries: ["tides"], num: 7 }]);
      expect(out.output).toEqual({
        reply: "Search results for: tides\n\n1. Tides\n   URL: https://sea.test\n   water\n",
        artifact: NO_UPDATE,
      });
    });

    it("fans out several queries", async () => {
      await runComponent("internet_search", input({ input: [{ query: "a" }, { query: "b" }] }), deps());
      expect(search.calls).toEqual([{ queries: ["a", "b"], num: 5 }]);
    });

    it("reports missing configuration", async () => {
      search.configured = false;
      const out = await runComponent("internet_search", input(), deps());
      expect(out.output.reply).toBe("Web search is not configured. Set GOOGLE_API_KEY and GOOGLE_CX_KEY.");
      expect(search.calls).toEqual([]);
    });

    it("needs a query", async () => {
      const out = await runComponent("internet_search", input({ input: [] }), deps());
      expect(out.output.reply).toBe("No search queries provided.");
    });
  });
});
