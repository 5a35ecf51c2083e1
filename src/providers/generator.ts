import type { RelayLogger } from "../lib/log";

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

export type GenerateRequest = {
  prompt: string;
  history?: ChatMessage[];
  systemPrompt?: string;
  temperature?: number;
  jsonMode?: boolean;
  maxTokens?: number;
};

export type GenerateResult = {
  text: string;
  model: string;
  tokensUsed?: number;
  finishReason?: string;
};

export interface Generator {
  readonly provider: string;
  readonly model: string;
  generate(request: GenerateRequest): Promise<GenerateResult>;
}

export class GeneratorError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "GeneratorError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

/**
 * System prompt first, then history with blank turns dropped, then the prompt
 * itself unless it is blank.
 */
export function buildMessages(request: GenerateRequest, log?: RelayLogger): ChatMessage[] {
  const messages: ChatMessage[] = [];

  if (request.systemPrompt) {
    messages.push({ role: "system", content: request.systemPrompt });
  }

  (request.history ?? []).forEach((message, index) => {
    if (!message.content.trim()) {
      log?.warn({ index }, "generator.history.empty_message_skipped");
      return;
    }
    messages.push({ role: message.role, content: message.content });
  });

  if (request.prompt.trim()) {
    messages.push({ role: "user", content: request.prompt });
  }

  return messages;
}

export function parseRetryAfter(header: string | null, now: number = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - now);
  }
  return undefined;
}
