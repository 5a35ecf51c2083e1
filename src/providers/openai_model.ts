import { z } from "zod";

import { createDefaultLogger, errorMessage, type RelayLogger } from "../lib/log";
import {
  GeneratorError,
  buildMessages,
  parseRetryAfter,
  type GenerateRequest,
  type GenerateResult,
  type Generator,
} from "./generator";

const ChatCompletion = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
        finish_reason: z.string().nullable().optional(),
      })
    )
    .default([]),
  usage: z.object({ total_tokens: z.number().optional() }).optional(),
});

const ErrorBody = z.object({
  error: z
    .object({
      type: z.string().optional(),
      code: z.string().nullable().optional(),
      message: z.string().optional(),
    })
    .optional(),
});

export type OpenAIChatOptions = {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  maxTokens?: number;
  defaultTemperature?: number;
  timeoutMs?: number;
  log?: RelayLogger;
  fetchImpl?: typeof fetch;
};

// Reasoning models take max_completion_tokens and only their default temperature.
const isReasoningModel = (model: string) => /gpt-5|(^|[^a-z])o1/i.test(model);

/**
 * Chat Completions client. Works against any OpenAI-compatible base URL.
 */
export class OpenAIChatGenerator implements Generator {
  readonly provider = "openai";
  readonly model: string;
  private apiKey?: string;
  private baseUrl: string;
  private maxTokens: number;
  private defaultTemperature: number;
  private timeoutMs: number;
  private log: RelayLogger;
  private fetchImpl: typeof fetch;

  constructor(opts: OpenAIChatOptions) {
    this.model = opts.model;
    this.apiKey = opts.apiKey;
    this.baseUrl = (opts.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "");
    this.maxTokens = opts.maxTokens ?? 4000;
    this.defaultTemperature = opts.defaultTemperature ?? 0.7;
    this.timeoutMs = opts.timeoutMs ?? 120_000;
    this.log = opts.log ?? createDefaultLogger();
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    if (!this.apiKey) {
      throw new GeneratorError("OPENAI_API_KEY missing", { statusCode: 500, retryable: false });
    }

    const messages = buildMessages(request, this.log);
    const body: Record<string, unknown> = { model: this.model, messages };
    const maxTokens = request.maxTokens ?? this.maxTokens;
    if (isReasoningModel(this.model)) {
      body.max_completion_tokens = maxTokens;
    } else {
      body.max_tokens = maxTokens;
      body.temperature = request.temperature ?? this.defaultTemperature;
    }
    if (request.jsonMode) {
      body.response_format = { type: "json_object" };
    }

    this.log.debug(
      { model: this.model, messages: messages.length, jsonMode: Boolean(request.jsonMode) },
      "openai.request"
    );

    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === "TimeoutError";
      this.log.error({ error: errorMessage(error), timedOut }, "openai.request_error");
      throw new GeneratorError(
        timedOut ? `OpenAI request timed out after ${this.timeoutMs}ms` : `OpenAI request failed: ${errorMessage(error)}`,
        { statusCode: timedOut ? 504 : 502, retryable: true }
      );
    }

    if (!res.ok) {
      throw await this.toError(res);
    }

    const parsed = ChatCompletion.safeParse(await res.json());
    const choice = parsed.success ? parsed.data.choices[0] : undefined;
    const content = choice?.message?.content;

    if (!parsed.success || typeof content !== "string") {
      throw new GeneratorError("OpenAI response missing content", { statusCode: 502, retryable: true });
    }

    const result: GenerateResult = {
      text: content,
      model: parsed.data.model ?? this.model,
      tokensUsed: parsed.data.usage?.total_tokens,
      finishReason: choice?.finish_reason ?? undefined,
    };
    this.log.info(
      { model: result.model, tokensUsed: result.tokensUsed, finishReason: result.finishReason },
      "openai.response"
    );
    return result;
  }

  private async toError(res: Response): Promise<GeneratorError> {
    const text = await res.text();
    let errorBody: z.infer<typeof ErrorBody> | null = null;
    try {
      const parsed = ErrorBody.safeParse(JSON.parse(text));
      errorBody = parsed.success ? parsed.data : null;
    } catch {
      errorBody = null;
    }

    const errorType = errorBody?.error?.type;
    const errorCode = errorBody?.error?.code ?? undefined;
    const bodySnippet = (errorBody?.error?.message ?? text).slice(0, 500);
    const requestId = res.headers.get("x-request-id") ?? undefined;
    const statusCode = res.status;
    const retryable = errorType !== "invalid_request_error" && statusCode !== 401 && statusCode !== 403;

    this.log.error({ statusCode, requestId, bodySnippet, errorType, errorCode }, "openai.request_failed");

    return new GeneratorError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
      statusCode,
      retryable,
      errorType,
      errorCode,
      retryAfterMs: parseRetryAfter(res.headers.get("retry-after")),
    });
  }
}
