import type { FastifyInstance } from "fastify";

import { COMPONENT_NAMES, type NodeRole } from "../contracts/component";
import { DEFAULT_COORDINATION, type CoordinationSettings } from "../coordination/coordination_router";
import {
  DEFAULT_CONVERSATION_LIMITS,
  MemoryConversationStore,
  type ConversationLimits,
  type ConversationStore,
} from "../memory/conversation_store";
import type { Generator } from "../providers/generator";
import type { SolutionStore } from "../store/solution_store";

export type HealthRouteOptions = {
  nodeName?: string;
  role?: NodeRole;
  store?: SolutionStore;
  conversations?: ConversationStore;
  generator?: Pick<Generator, "provider" | "model">;
  coordination?: CoordinationSettings;
  limits?: ConversationLimits;
  historyWindow?: number;
};

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions = {}) {
  const nodeName = opts.nodeName ?? "relay-node";
  const role = opts.role ?? "solo";
  const conversations = opts.conversations ?? new MemoryConversationStore();

  app.get("/healthz", async () => ({
    ok: true,
    service: "solution-relay",
    ts: new Date().toISOString(),
  }));

  app.get("/health", async () => {
    // Solo nodes never touch the shared store, not even to probe it.
    const storeReachable = role === "solo" || !opts.store ? null : await opts.store.isAvailable();
    const degraded = role !== "solo" && storeReachable !== true;

    return {
      status: degraded ? "degraded" : "ok",
      node: nodeName,
      role,
      store: { reachable: storeReachable },
      generator: opts.generator
        ? { provider: opts.generator.provider, model: opts.generator.model }
        : null,
      conversations: await conversations.countConversations(),
      ts: new Date().toISOString(),
    };
  });

  app.get("/capabilities", async () => ({
    node: nodeName,
    role,
    components: COMPONENT_NAMES,
    coordination: opts.coordination ?? DEFAULT_COORDINATION,
    conversationHistory: {
      ...(opts.limits ?? DEFAULT_CONVERSATION_LIMITS),
      historyWindow: opts.historyWindow ?? 5,
    },
  }));
}
