import { z } from "zod";

// Sentinel meaning "leave the artifact as it was".
export const NO_UPDATE = "no update";

export const COMPONENT_NAMES = [
  "complete",
  "refine",
  "feedback",
  "summary",
  "aggregate",
  "human_feedback",
  "internet_search",
] as const;

export const ComponentName = z.enum(COMPONENT_NAMES);
export type ComponentName = z.infer<typeof ComponentName>;

export const NodeRole = z.enum(["solo", "producer", "waiter"]);
export type NodeRole = z.infer<typeof NodeRole>;

export const InputItem = z.object({
  query: z.string(),
  artifact: z.string().optional(),
});

export type InputItem = z.infer<typeof InputItem>;

export const ComponentResult = z.object({
  reply: z.string(),
  artifact: z.string(),
});

export type ComponentResult = z.infer<typeof ComponentResult>;

export const PriorOutput = z.object({
  sourceName: z.string().min(1),
  task: z.string().optional(),
  reply: z.string(),
  artifact: z.string().default(NO_UPDATE),
});

export type PriorOutput = z.infer<typeof PriorOutput>;

export const ComponentInput = z.object({
  cid: z.string().min(1).max(200),
  task: z.string().max(20_000).default(""),
  input: z.array(InputItem).max(50).default([]),
  priorOutputs: z.array(PriorOutput).max(50).default([]),
  useConversationHistory: z.boolean().default(true),
});

export type ComponentInput = z.infer<typeof ComponentInput>;

export type CoordinationOutcome =
  | "generated"
  | "published"
  | "publish_failed"
  | "reused"
  | "fallback_timeout"
  | "fallback_store_unavailable";

export type ComponentOutput = {
  cid: string;
  task: string;
  input: InputItem[];
  component: ComponentName;
  output: ComponentResult;
  coordination?: {
    role: NodeRole;
    outcome: CoordinationOutcome;
    fingerprint: string;
  };
};
