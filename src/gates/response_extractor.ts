import { NO_UPDATE } from "../contracts/component";
import {
  FALLBACK_STRATEGIES,
  braceSpan,
  firstParseableFence,
  isJsonObject,
  labelledFence,
  parseJsonObject,
  type JsonObject,
  type RecoveryStrategyId,
} from "./recovery_strategies";

export type ExtractionStrategy = RecoveryStrategyId | "direct" | "raw_text";

export type ExtractedResponse = {
  reply: string;
  artifact: string;
  strategy: ExtractionStrategy;
};

const REPLY_KEY = "reply";
const ARTIFACT_KEY = "artifact";

const stringifyItem = (item: unknown): string =>
  typeof item === "string" ? item : JSON.stringify(item);

/**
 * Flattens whatever the model put in the artifact slot into text.
 * JSON-looking strings are parsed and flattened; if they don't parse they are kept.
 */
export function normalizeArtifact(value: unknown): string {
  if (typeof value === "string") {
    const trimmed = value.trim();
    const looksStructured =
      (trimmed.startsWith("{") || trimmed.startsWith("[")) &&
      (trimmed.endsWith("}") || trimmed.endsWith("]"));
    if (!looksStructured) return value;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      return normalizeArtifact(parsed);
    } catch {
      return value;
    }
  }

  if (Array.isArray(value)) {
    return value.map(stringifyItem).join("\n\n");
  }

  if (isJsonObject(value)) {
    if ("content" in value) {
      const content = value.content;
      return Array.isArray(content) ? content.map(stringifyItem).join("\n\n") : stringifyItem(content);
    }
    return JSON.stringify(value, null, 2);
  }

  return String(value);
}

function replyText(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  if (typeof value === "string") return value;
  return typeof value === "object" ? JSON.stringify(value, null, 2) : String(value);
}

/** One level of `{"reply": "{\"reply\": ...}"}`. */
function unwrapReply(reply: string): JsonObject | null {
  const trimmed = reply.trim();
  if (!trimmed.startsWith("{") || !trimmed.endsWith("}")) return null;
  const inner = parseJsonObject(trimmed);
  if (!inner) return null;
  const hasField =
    (inner[REPLY_KEY] !== undefined && inner[REPLY_KEY] !== null) ||
    (inner[ARTIFACT_KEY] !== undefined && inner[ARTIFACT_KEY] !== null);
  return hasField ? inner : null;
}

function fromObject(obj: JsonObject, raw: string, strategy: ExtractionStrategy): ExtractedResponse {
  let reply = replyText(obj[REPLY_KEY], raw);
  let artifactValue: unknown = obj[ARTIFACT_KEY] ?? NO_UPDATE;

  const inner = unwrapReply(reply);
  if (inner) {
    reply = replyText(inner[REPLY_KEY], reply);
    if (inner[ARTIFACT_KEY] !== undefined && inner[ARTIFACT_KEY] !== null) {
      artifactValue = inner[ARTIFACT_KEY];
    }
  }

  return { reply, artifact: normalizeArtifact(artifactValue), strategy };
}

function primaryCandidate(text: string): { candidate: string; strategy: ExtractionStrategy } {
  const labelled = labelledFence(text);
  if (labelled !== null) {
    return sliceIfNeeded(labelled, "labelled_fence");
  }
  const fenced = firstParseableFence(text);
  if (fenced !== null) {
    return sliceIfNeeded(fenced, "fenced_block");
  }
  return sliceIfNeeded(text, "direct");
}

function sliceIfNeeded(
  candidate: string,
  strategy: ExtractionStrategy
): { candidate: string; strategy: ExtractionStrategy } {
  if (candidate.startsWith("{")) return { candidate, strategy };
  const span = braceSpan(candidate);
  if (span === null) return { candidate, strategy };
  return { candidate: span, strategy: strategy === "direct" ? "brace_span" : strategy };
}

/**
 * Recovers `{reply, artifact}` from free-form generator output. Never throws:
 * text with no recoverable object comes back as the reply with a "no update" artifact.
 */
export function extractResponse(raw: string): ExtractedResponse {
  const text = raw.trim();

  const { candidate, strategy } = primaryCandidate(text);
  const primary = parseJsonObject(candidate);
  if (primary) return fromObject(primary, raw, strategy);

  for (const fallback of FALLBACK_STRATEGIES) {
    const located = fallback.locate(raw);
    if (located === null) continue;
    const obj = parseJsonObject(located);
    if (obj) return fromObject(obj, raw, fallback.id);
  }

  return { reply: raw, artifact: NO_UPDATE, strategy: "raw_text" };
}
