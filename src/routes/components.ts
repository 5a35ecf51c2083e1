import type { FastifyInstance } from "fastify";

import { COMPONENT_NAMES, ComponentInput, type ComponentName } from "../contracts/component";
import { runComponent, type ComponentDeps } from "../control-plane/components";
import { DEFAULT_COORDINATION } from "../coordination/coordination_router";
import { GoogleSearchClient } from "../evidence/web_search";
import { MemoryConversationStore } from "../memory/conversation_store";
import { FakeGenerator } from "../providers/fake_model";
import { GeneratorError } from "../providers/generator";
import { MemoryKeyValueClient } from "../store/key_value_client";
import { KeyValueSolutionStore } from "../store/solution_store";

export type ComponentRouteOptions = Partial<Omit<ComponentDeps, "log">>;

export async function componentRoutes(app: FastifyInstance, opts: ComponentRouteOptions = {}) {
  const base: Omit<ComponentDeps, "log"> = {
    role: opts.role ?? "solo",
    generator: opts.generator ?? new FakeGenerator(),
    store: opts.store ?? new KeyValueSolutionStore({ client: new MemoryKeyValueClient() }),
    conversations: opts.conversations ?? new MemoryConversationStore(),
    search: opts.search ?? new GoogleSearchClient(),
    coordination: opts.coordination ?? DEFAULT_COORDINATION,
    historyWindow: opts.historyWindow ?? 5,
  };

  const register = (component: ComponentName) => {
    app.post(`/${component}`, async (req, reply) => {
      const parsed = ComponentInput.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({
          error: "invalid_request",
          details: parsed.error.flatten(),
        });
      }

      const log = req.log.child({ component, cid: parsed.data.cid });
      try {
        return await runComponent(component, parsed.data, { ...base, log });
      } catch (error) {
        if (error instanceof GeneratorError) {
          log.error(
            { statusCode: error.statusCode, retryable: error.retryable, error: error.message },
            "component.generator_failed"
          );
          return reply.code(502).send({
            error: "generator_failed",
            message: error.message,
            retryable: error.retryable,
            ...(error.retryAfterMs !== undefined ? { retryAfterMs: error.retryAfterMs } : {}),
          });
        }
        throw error;
      }
    });
  };

  COMPONENT_NAMES.forEach(register);
}
