import {
  NO_UPDATE,
  type ComponentInput,
  type ComponentName,
  type ComponentOutput,
  type ComponentResult,
  type NodeRole,
} from "../contracts/component";
import { coordinate, type CoordinationSettings } from "../coordination/coordination_router";
import { fingerprint, shortFingerprint } from "../coordination/task_fingerprint";
import { formatSearchResults, type WebSearchClient } from "../evidence/web_search";
import { resolveArtifact } from "../gates/artifact_resolution";
import { stripReasoningTags } from "../gates/reasoning_tags";
import { extractResponse } from "../gates/response_extractor";
import type { RelayLogger } from "../lib/log";
import type { ConversationStore } from "../memory/conversation_store";
import type { ChatMessage, Generator } from "../providers/generator";
import type { SolutionStore } from "../store/solution_store";
import { PROMPT_TEMPLATES, buildPromptPack, type GeneratedComponent, type PromptPack } from "./prompt_pack";

export type ComponentDeps = {
  role: NodeRole;
  generator: Generator;
  store: SolutionStore;
  conversations: ConversationStore;
  search: WebSearchClient;
  coordination: CoordinationSettings;
  historyWindow: number;
  log: RelayLogger;
};

export const FEEDBACK_ACK = "Thank you for your feedback. It has been recorded for this conversation.";

const isGenerated = (component: ComponentName): component is GeneratedComponent =>
  component in PROMPT_TEMPLATES;

const reply = (input: ComponentInput, component: ComponentName, result: ComponentResult): ComponentOutput => ({
  cid: input.cid,
  task: input.task,
  input: input.input,
  component,
  output: result,
});

async function recordTurn(deps: ComponentDeps, cid: string, userTurn: string, assistantTurn: string, component: ComponentName) {
  await deps.conversations.appendMessage(cid, { role: "user", content: userTurn, meta: { component } });
  await deps.conversations.appendMessage(cid, { role: "assistant", content: assistantTurn, meta: { component } });
}

async function loadHistory(deps: ComponentDeps, input: ComponentInput): Promise<ChatMessage[]> {
  if (!input.useConversationHistory) return [];
  const messages = await deps.conversations.recentMessages(input.cid, deps.historyWindow);
  return messages.map((message) => ({ role: message.role, content: message.content }));
}

async function generateResult(deps: ComponentDeps, input: ComponentInput, pack: PromptPack): Promise<ComponentResult> {
  const history = await loadHistory(deps, input);
  const generated = await deps.generator.generate({
    prompt: pack.prompt,
    systemPrompt: pack.systemPrompt,
    history,
    temperature: pack.temperature,
    jsonMode: pack.jsonMode,
  });
  const text = stripReasoningTags(generated.text);

  if (!pack.jsonMode) {
    return { reply: text, artifact: NO_UPDATE };
  }

  const extracted = extractResponse(text);
  const artifact = resolveArtifact(extracted.artifact, input.priorOutputs);
  deps.log.debug(
    {
      component: pack.component,
      strategy: extracted.strategy,
      carriedForward: artifact !== extracted.artifact,
    },
    "component.extracted"
  );
  return { reply: extracted.reply, artifact };
}

async function runGenerated(
  component: GeneratedComponent,
  input: ComponentInput,
  deps: ComponentDeps
): Promise<ComponentOutput> {
  const pack = buildPromptPack(component, input);
  if (!pack) {
    const emptyReply = PROMPT_TEMPLATES[component].emptyPriorReply ?? "";
    return reply(input, component, { reply: emptyReply, artifact: NO_UPDATE });
  }

  const fp = fingerprint(
    input.task,
    input.input.map((item) => ({ query: item.query, artifact: item.artifact }))
  );

  const { result, outcome } = await coordinate({
    role: deps.role,
    fingerprint: fp,
    store: deps.store,
    generate: () => generateResult(deps, input, pack),
    settings: deps.coordination,
    log: deps.log,
  });

  await recordTurn(deps, input.cid, pack.historyTurn, result.reply, component);

  deps.log.info(
    { component, cid: input.cid, role: deps.role, outcome, fingerprint: shortFingerprint(fp) },
    "component.completed"
  );

  return {
    ...reply(input, component, result),
    coordination: { role: deps.role, outcome, fingerprint: fp },
  };
}

async function runHumanFeedback(input: ComponentInput, deps: ComponentDeps): Promise<ComponentOutput> {
  const feedback = input.input
    .map((item) => item.query)
    .filter((query) => query.trim())
    .join("\n");

  if (!feedback.trim()) {
    return reply(input, "human_feedback", { reply: "No feedback text provided.", artifact: NO_UPDATE });
  }

  await recordTurn(deps, input.cid, `Feedback: ${feedback}`, FEEDBACK_ACK, "human_feedback");
  deps.log.info({ cid: input.cid, chars: feedback.length }, "component.human_feedback.recorded");
  return reply(input, "human_feedback", { reply: FEEDBACK_ACK, artifact: NO_UPDATE });
}

async function runInternetSearch(input: ComponentInput, deps: ComponentDeps): Promise<ComponentOutput> {
  const queries = input.input.map((item) => item.query.trim()).filter(Boolean);

  if (queries.length === 0) {
    return reply(input, "internet_search", { reply: "No search queries provided.", artifact: NO_UPDATE });
  }

  let text: string;
  if (!deps.search.configured) {
    deps.log.error({ cid: input.cid }, "component.internet_search.not_configured");
    text = "Web search is not configured. Set GOOGLE_API_KEY and GOOGLE_CX_KEY.";
  } else {
    const results =
      queries.length === 1 ? await deps.search.search(queries[0], 7) : await deps.search.searchMany(queries, 5);
    text = formatSearchResults(queries, results);
    deps.log.info({ cid: input.cid, queries: queries.length, results: results.length }, "component.internet_search.completed");
  }

  await recordTurn(deps, input.cid, `Search: ${queries.join(", ")}`, text, "internet_search");
  return reply(input, "internet_search", { reply: text, artifact: NO_UPDATE });
}

/**
 * Runs one component request. Generated components go through the
 * coordination router; generator failures propagate to the caller.
 */
export async function runComponent(
  component: ComponentName,
  input: ComponentInput,
  deps: ComponentDeps
): Promise<ComponentOutput> {
  if (isGenerated(component)) {
    return runGenerated(component, input, deps);
  }
  if (component === "human_feedback") {
    return runHumanFeedback(input, deps);
  }
  return runInternetSearch(input, deps);
}
