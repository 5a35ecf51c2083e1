import Fastify, { type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";

import type { ComponentDeps } from "./control-plane/components";
import type { ConversationLimits } from "./memory/conversation_store";
import { componentRoutes } from "./routes/components";
import { conversationRoutes } from "./routes/conversations";
import { healthRoutes } from "./routes/healthz";

export type AppOptions = Omit<ComponentDeps, "log"> & {
  nodeName: string;
  limits: ConversationLimits;
  logger?: FastifyServerOptions["logger"];
};

export async function buildApp(opts: AppOptions) {
  const app = Fastify({
    logger: opts.logger ?? false,
    bodyLimit: 10 * 1024 * 1024,
  });

  // No auth on this surface; origins stay open.
  await app.register(cors, { origin: true });

  await app.register(healthRoutes, {
    nodeName: opts.nodeName,
    role: opts.role,
    store: opts.store,
    conversations: opts.conversations,
    generator: opts.generator,
    coordination: opts.coordination,
    limits: opts.limits,
    historyWindow: opts.historyWindow,
  });

  await app.register(componentRoutes, {
    prefix: "/v1",
    role: opts.role,
    generator: opts.generator,
    store: opts.store,
    conversations: opts.conversations,
    search: opts.search,
    coordination: opts.coordination,
    historyWindow: opts.historyWindow,
  });

  await app.register(conversationRoutes, { prefix: "/v1", conversations: opts.conversations });

  return app;
}
