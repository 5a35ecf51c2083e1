import { buildApp } from "./app";
import { loadConfig } from "./config";
import { GoogleSearchClient } from "./evidence/web_search";
import { createLogger, errorMessage } from "./lib/log";
import { SqliteConversationStore } from "./memory/sqlite_conversation_store";
import { FakeGenerator } from "./providers/fake_model";
import type { Generator } from "./providers/generator";
import { OpenAIChatGenerator } from "./providers/openai_model";
import { RedisKeyValueClient } from "./store/key_value_client";
import { KeyValueSolutionStore } from "./store/solution_store";

async function main() {
  const config = loadConfig();
  const log = createLogger({ level: config.log.level, pretty: config.log.pretty });

  const generator: Generator =
    config.llm.provider === "openai"
      ? new OpenAIChatGenerator({
          apiKey: config.llm.apiKey,
          model: config.llm.model,
          baseUrl: config.llm.baseUrl,
          maxTokens: config.llm.maxTokens,
          timeoutMs: config.llm.timeoutMs,
          log: log.child({ plane: "generator" }),
        })
      : new FakeGenerator();

  const kv = new RedisKeyValueClient({
    host: config.redis.host,
    port: config.redis.port,
    db: config.redis.db,
    log: log.child({ plane: "kv" }),
  });
  if (config.role !== "solo") {
    // A node that cannot reach the store keeps serving; waiters fall back to generating.
    await kv.connect();
  }

  const store = new KeyValueSolutionStore({
    client: kv,
    namespace: config.redis.namespace,
    log: log.child({ plane: "solution_store" }),
  });

  const conversations = new SqliteConversationStore(config.conversations.dbPath, {
    limits: {
      maxMessages: config.conversations.maxMessages,
      retentionDays: config.conversations.retentionDays,
    },
    log: log.child({ plane: "conversations" }),
  });

  const search = new GoogleSearchClient({
    apiKey: config.search.apiKey,
    cx: config.search.cx,
    log: log.child({ plane: "web_search" }),
  });

  const app = await buildApp({
    nodeName: config.nodeName,
    role: config.role,
    generator,
    store,
    conversations,
    search,
    coordination: config.coordination,
    historyWindow: config.conversations.historyWindow,
    limits: {
      maxMessages: config.conversations.maxMessages,
      retentionDays: config.conversations.retentionDays,
    },
    logger: log,
  });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, "relay.shutdown");
    try {
      await app.close();
      await kv.close();
      conversations.close();
      process.exit(0);
    } catch (error) {
      log.error({ error: errorMessage(error) }, "relay.shutdown_failed");
      process.exit(1);
    }
  };
  process.once("SIGTERM", () => void shutdown("SIGTERM"));
  process.once("SIGINT", () => void shutdown("SIGINT"));

  await app.listen({ port: config.port, host: config.host });
  log.info(
    {
      node: config.nodeName,
      role: config.role,
      provider: generator.provider,
      model: generator.model,
      ttlSeconds: config.coordination.ttlSeconds,
      waitTimeoutSeconds: config.coordination.waitTimeoutSeconds,
    },
    "relay.started"
  );
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
