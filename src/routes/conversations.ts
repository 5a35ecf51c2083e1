import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { MemoryConversationStore, type ConversationStore } from "../memory/conversation_store";

const ListQuery = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

const CidParams = z.object({
  cid: z.string().min(1).max(200),
});

export async function conversationRoutes(
  app: FastifyInstance,
  opts: { conversations?: ConversationStore } = {}
) {
  const conversations = opts.conversations ?? new MemoryConversationStore();

  app.get("/conversations", async (req, reply) => {
    const parsed = ListQuery.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const items = await conversations.listConversations(parsed.data.limit);
    return {
      total: await conversations.countConversations(),
      conversations: items,
    };
  });

  app.get("/conversations/:cid", async (req, reply) => {
    const parsed = CidParams.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const conversation = await conversations.getConversation(parsed.data.cid);
    if (!conversation) {
      return reply.code(404).send({ error: "not_found", cid: parsed.data.cid });
    }
    return conversation;
  });

  app.delete("/conversations/:cid", async (req, reply) => {
    const parsed = CidParams.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "invalid_request", details: parsed.error.flatten() });
    }

    const deleted = await conversations.deleteConversation(parsed.data.cid);
    if (!deleted) {
      return reply.code(404).send({ error: "not_found", cid: parsed.data.cid });
    }
    req.log.info({ cid: parsed.data.cid }, "conversations.deleted");
    return { deleted: true, cid: parsed.data.cid };
  });
}
