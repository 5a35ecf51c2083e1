import { NO_UPDATE } from "../contracts/component";
import { GeneratorError, type GenerateRequest, type GenerateResult, type Generator } from "./generator";

type Script = string | GeneratorError | ((request: GenerateRequest) => string);

/**
 * Deterministic generator for local runs and tests. Scripted replies are
 * consumed in order; once they run out the stub reply is used.
 */
export class FakeGenerator implements Generator {
  readonly provider = "fake";
  readonly model: string;
  readonly calls: GenerateRequest[] = [];
  private script: Script[];

  constructor(opts: { model?: string; script?: Script[] } = {}) {
    this.model = opts.model ?? "fake-model";
    this.script = [...(opts.script ?? [])];
  }

  enqueue(...entries: Script[]) {
    this.script.push(...entries);
  }

  async generate(request: GenerateRequest): Promise<GenerateResult> {
    this.calls.push(request);
    const next = this.script.shift();

    if (next instanceof GeneratorError) throw next;

    const text =
      next === undefined ? stubReply(request) : typeof next === "function" ? next(request) : next;
    return { text, model: this.model, tokensUsed: 0, finishReason: "stop" };
  }
}

export function stubReply(request: GenerateRequest): string {
  const reply = `Stub response: I received ${request.prompt.length} chars.`;
  return request.jsonMode ? JSON.stringify({ reply, artifact: NO_UPDATE }) : reply;
}
