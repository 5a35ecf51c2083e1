import { createHash } from "node:crypto";

export type FingerprintInput = {
  query: string;
  artifact?: string | null;
};

type JsonPrimitive = null | boolean | number | string;
type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export class FingerprintInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FingerprintInputError";
  }
}

// Code-point order, so every node sorts keys identically regardless of locale.
const compareKeys = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

function canonicalize(value: JsonValue): string {
  if (value === null || typeof value !== "object") {
    return JSON.stringify(value);
  }
  if (Array.isArray(value)) {
    return "[" + value.map((entry) => canonicalize(entry)).join(",") + "]";
  }
  const entries = Object.entries(value).sort(([a], [b]) => compareKeys(a, b));
  return (
    "{" +
    entries.map(([key, entry]) => JSON.stringify(key) + ":" + canonicalize(entry)).join(",") +
    "}"
  );
}

/**
 * Sorted-key, whitespace-free JSON. Two structurally equal values always
 * serialize to the same string.
 */
export function canonicalStringify(value: JsonValue): string {
  return canonicalize(value);
}

export function canonicalTask(task: string, inputs: FingerprintInput[]): JsonValue {
  if (typeof task !== "string") {
    throw new FingerprintInputError("fingerprint.task must be a string");
  }
  if (!Array.isArray(inputs)) {
    throw new FingerprintInputError("fingerprint.inputs must be an array");
  }

  return {
    task: task.trim(),
    inputs: inputs.map((item, index) => {
      if (!item || typeof item.query !== "string") {
        throw new FingerprintInputError(`fingerprint.inputs[${index}].query is required`);
      }
      const artifact = item.artifact ?? "";
      if (typeof artifact !== "string") {
        throw new FingerprintInputError(`fingerprint.inputs[${index}].artifact must be a string`);
      }
      return { query: item.query.trim(), artifact: artifact.trim() };
    }),
  };
}

/**
 * Identity of a task across nodes: SHA-256 over the canonical form, lowercase hex.
 */
export function fingerprint(task: string, inputs: FingerprintInput[]): string {
  const canonical = canonicalStringify(canonicalTask(task, inputs));
  return createHash("sha256").update(canonical, "utf8").digest("hex");
}

export const shortFingerprint = (value: string) => value.slice(0, 16);
