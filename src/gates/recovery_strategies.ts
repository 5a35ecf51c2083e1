/**
 * Candidate locators for structured objects embedded in model output.
 * Each one is pure: text in, candidate slice (or null) out. None of them
 * parses strings-aware JSON; braces inside string literals count.
 */

export type JsonObject = { [key: string]: unknown };

export type RecoveryStrategyId =
  | "labelled_fence"
  | "fenced_block"
  | "brace_span"
  | "last_balanced_object"
  | "first_balanced_object";

export type RecoveryStrategy = {
  id: RecoveryStrategyId;
  locate: (text: string) => string | null;
};

const FENCE = "```";
const JSON_LABEL = /^json\b/i;

export const isJsonObject = (value: unknown): value is JsonObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export function parseJsonObject(text: string): JsonObject | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Interior of the first ```json fence; an unterminated fence runs to the end. */
export function labelledFence(text: string): string | null {
  const match = /```json/i.exec(text);
  if (!match) return null;
  const after = text.slice(match.index + match[0].length);
  const end = after.indexOf(FENCE);
  return (end === -1 ? after : after.slice(0, end)).trim();
}

/** First fenced block whose interior parses as an object. */
export function firstParseableFence(text: string): string | null {
  if (!text.includes(FENCE)) return null;
  const parts = text.split(FENCE);
  for (let i = 1; i < parts.length; i += 2) {
    let interior = parts[i].trim();
    if (JSON_LABEL.test(interior)) {
      interior = interior.slice(4).trim();
    }
    if (parseJsonObject(interior)) return interior;
  }
  return null;
}

/** From the first `{` to the last `}`. */
export function braceSpan(text: string): string | null {
  const first = text.indexOf("{");
  const last = text.lastIndexOf("}");
  if (first === -1 || last === -1 || last <= first) return null;
  return text.slice(first, last + 1);
}

/** Walks back from the last `}` to the `{` that balances it. */
export function lastBalancedObject(text: string): string | null {
  const last = text.lastIndexOf("}");
  if (last === -1) return null;

  let depth = 0;
  for (let i = last; i >= 0; i -= 1) {
    const ch = text[i];
    if (ch === "}") {
      depth += 1;
    } else if (ch === "{") {
      depth -= 1;
      if (depth === 0) return text.slice(i, last + 1);
    }
  }
  return null;
}

/** Walks forward from the first `{` to the `}` that balances it. */
export function firstBalancedObject(text: string): string | null {
  const first = text.indexOf("{");
  if (first === -1) return null;

  let depth = 0;
  for (let i = first; i < text.length; i += 1) {
    const ch = text[i];
    if (ch === "{") {
      depth += 1;
    } else if (ch === "}") {
      depth -= 1;
      if (depth === 0) return text.slice(first, i + 1);
    }
  }
  return null;
}

// Tried in order against the raw text once the primary candidate fails to parse.
export const FALLBACK_STRATEGIES: readonly RecoveryStrategy[] = [
  { id: "brace_span", locate: braceSpan },
  { id: "last_balanced_object", locate: lastBalancedObject },
  { id: "first_balanced_object", locate: firstBalancedObject },
];
