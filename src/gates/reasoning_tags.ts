const REASONING_TAGS = ["redacted_reasoning", "think", "reasoning", "thought", "thinking"] as const;

// Tag names end at whitespace, "/" or ">", so <think> never opens on <thinking>.
const PAIRED = REASONING_TAGS.map((tag) => new RegExp(`<${tag}(?=[\\s/>])[^>]*>[\\s\\S]*?</${tag}>`, "gi"));
const SELF_CLOSING = REASONING_TAGS.map((tag) => new RegExp(`<${tag}(?=[\\s/>])[^>]*/>`, "gi"));

/** Removes model reasoning blocks and collapses the blank runs they leave behind. */
export function stripReasoningTags(text: string): string {
  if (!text) return text;

  let cleaned = text;
  for (const pattern of PAIRED) {
    cleaned = cleaned.replace(pattern, "");
  }
  for (const pattern of SELF_CLOSING) {
    cleaned = cleaned.replace(pattern, "");
  }

  return cleaned.replace(/\n\s*\n\s*\n+/g, "\n\n").trim();
}
