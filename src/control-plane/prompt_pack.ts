import { NO_UPDATE, type ComponentName, type InputItem, type PriorOutput } from "../contracts/component";

/**
 * Prompt templates for the generated components. Everything that differs
 * between components lives in this table; `buildPromptPack` is shared.
 */

export type GeneratedComponent = Extract<ComponentName, "complete" | "refine" | "feedback" | "summary" | "aggregate">;

export type PriorStyle = "listed" | "blocks" | "numbered";

export type ComponentPromptTemplate = {
  systemPrompt: string;
  temperature: number;
  jsonMode: boolean;
  // Placeholders: {{task}}, {{input}}, {{prior}}
  taskPrompt: string;
  historyTurn: string;
  priorStyle: PriorStyle;
  priorHeading?: string;
  // Reply returned without generating when there are no prior outputs.
  emptyPriorReply?: string;
};

const JSON_CONTRACT = (replyHint: string, artifactHint: string) => `CRITICAL: You MUST respond with ONLY valid JSON. No markdown code blocks, no explanations outside JSON, no extra text.

Required JSON format:
{
  "reply": "${replyHint}",
  "artifact": "${artifactHint} OR '${NO_UPDATE}'"
}`;

const JSON_ONLY = "Your response must be ONLY the JSON object, nothing else.";

export const PROMPT_TEMPLATES: Record<GeneratedComponent, ComponentPromptTemplate> = {
  complete: {
    systemPrompt: `You are an intelligent AI assistant that helps users complete tasks.

${JSON_CONTRACT("Your natural language explanation of what you did or your answer", "Updated artifact content")}

Guidelines for the artifact field:
- If the task is conversational only: Return "${NO_UPDATE}"
- If there's ONE artifact and no changes are needed: Return "${NO_UPDATE}"
- If there's ONE artifact and changes are needed: Return the updated version
- If there are MULTIPLE artifacts: You MUST create new content (combine/choose/merge) - NEVER "${NO_UPDATE}"
- If creating a new artifact: Return the full content

${JSON_ONLY}`,
    temperature: 0.7,
    jsonMode: true,
    taskPrompt: "Task: {{task}}\n\nInput:\n{{input}}\n{{prior}}\n\nComplete this task and respond in JSON format.",
    historyTurn: "Task: {{task}}\n{{input}}",
    priorStyle: "listed",
    priorHeading: "Previous component outputs:",
  },
  refine: {
    systemPrompt: `You are an AI assistant that refines and improves outputs.

${JSON_CONTRACT("Explanation of what you refined and why", "The refined/improved content")}

Guidelines for the artifact field:
- If providing feedback only: Set the artifact to "${NO_UPDATE}"
- If there's ONE artifact and no improvements are needed: Set it to "${NO_UPDATE}"
- If there's ONE artifact and improvements are needed: Write the improved version
- If there are MULTIPLE artifacts: You MUST create new content (refine one, combine, or merge) - NEVER "${NO_UPDATE}"

${JSON_ONLY}`,
    temperature: 0.7,
    jsonMode: true,
    taskPrompt: "Task: {{task}}\n\nOriginal Input:\n{{input}}\n{{prior}}\n\nRefine and improve the outputs. Respond in JSON format.",
    historyTurn: "Refine task: {{task}}",
    priorStyle: "listed",
    priorHeading: "Previous outputs to refine:",
  },
  feedback: {
    systemPrompt: "You are an AI assistant that provides constructive feedback.",
    temperature: 0.7,
    jsonMode: false,
    taskPrompt: `Task: {{task}}
{{prior}}

Analyze the outputs and provide structured feedback:

For each output, identify:
1. Strengths (what works well)
2. Weaknesses (what could be improved)
3. Specific suggestions for improvement

Format your feedback clearly with sections.`,
    historyTurn: "Feedback request: {{task}}",
    priorStyle: "listed",
    priorHeading: "Outputs to analyze:",
  },
  summary: {
    systemPrompt: `You are an AI assistant that creates concise, comprehensive summaries.

${JSON_CONTRACT("Your summary explanation", "Summarized artifact content")}

Guidelines for the artifact field:
- If there's NO artifact content in the inputs: Return "${NO_UPDATE}"
- If there's ONE artifact to summarize: Return the summarized version
- If there are MULTIPLE artifacts: Create a combined summary

${JSON_ONLY}`,
    temperature: 0.5,
    jsonMode: true,
    taskPrompt: `Task: {{task}}

Content to summarize:
{{prior}}

Create a comprehensive summary that:
1. Captures the main points and key insights
2. Maintains important details
3. Removes redundancy
4. Organizes information logically

Respond in JSON format.`,
    historyTurn: "Summarize: {{task}}",
    priorStyle: "blocks",
    emptyPriorReply: "No previous outputs to summarize.",
  },
  aggregate: {
    systemPrompt: `You are an AI assistant that aggregates multiple outputs using majority voting.

${JSON_CONTRACT("Your explanation of the consensus and voting results", "The aggregated/consensus artifact content")}

Guidelines for the artifact field:
- If there's NO artifact content in the inputs: Return "${NO_UPDATE}"
- If there's ONE artifact: Return it as-is (or "${NO_UPDATE}" if there are no changes)
- If there are MULTIPLE artifacts: Create an aggregated version using majority voting
- Use majority voting: Choose the most common content or merge agreements

${JSON_ONLY}`,
    temperature: 0.3,
    jsonMode: true,
    taskPrompt: `Task: {{task}}

Multiple outputs to aggregate:
{{prior}}

Analyze these outputs and determine the consensus answer by:
1. Identifying common themes and agreements
2. Noting where outputs differ
3. Using majority voting logic to determine the most supported answer
4. Highlighting any important minority opinions

Respond in JSON format.`,
    historyTurn: "Aggregate: {{task}}",
    priorStyle: "numbered",
    emptyPriorReply: "No previous outputs to aggregate.",
  },
};

export const hasArtifact = (artifact: string | undefined): artifact is string =>
  Boolean(artifact) && artifact !== NO_UPDATE;

export function formatInputText(input: InputItem[]): string {
  return input.map((item, index) => `Query ${index + 1}: ${item.query}`).join("\n\n");
}

const heading = (prior: PriorOutput) => `[${prior.sourceName}] ${prior.task ?? ""}`.trimEnd();

export function formatPriorOutputs(priorOutputs: PriorOutput[], style: PriorStyle, title?: string): string {
  if (priorOutputs.length === 0) return "";

  switch (style) {
    case "listed": {
      let text = `\n\n${title ?? "Previous outputs:"}\n`;
      for (const prior of priorOutputs) {
        text += `\n${heading(prior)}:\n`;
        text += `  Response: ${prior.reply}\n`;
        if (hasArtifact(prior.artifact)) {
          text += `  Artifact: ${prior.artifact}\n`;
        }
      }
      return text;
    }
    case "blocks":
    case "numbered": {
      return priorOutputs
        .map((prior, index) => {
          const label = style === "numbered" ? `Output ${index + 1} [${prior.sourceName}]` : heading(prior);
          let block = `${label}:\nResponse: ${prior.reply}\n`;
          if (hasArtifact(prior.artifact)) {
            block += `Artifact: ${prior.artifact}\n`;
          }
          return block;
        })
        .join("\n\n---\n\n");
    }
  }
}

export function fillTemplate(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}

export type PromptPack = {
  component: GeneratedComponent;
  systemPrompt: string;
  prompt: string;
  historyTurn: string;
  temperature: number;
  jsonMode: boolean;
};

export type PromptPackInput = {
  task: string;
  input: InputItem[];
  priorOutputs: PriorOutput[];
};

/** Null when the component has nothing to work on; the caller replies with `emptyPriorReply`. */
export function buildPromptPack(component: GeneratedComponent, input: PromptPackInput): PromptPack | null {
  const template = PROMPT_TEMPLATES[component];
  if (template.emptyPriorReply !== undefined && input.priorOutputs.length === 0) {
    return null;
  }

  const values = {
    task: input.task,
    input: formatInputText(input.input),
    prior: formatPriorOutputs(input.priorOutputs, template.priorStyle, template.priorHeading),
  };

  return {
    component,
    systemPrompt: template.systemPrompt,
    prompt: fillTemplate(template.taskPrompt, values),
    historyTurn: fillTemplate(template.historyTurn, values),
    temperature: template.temperature,
    jsonMode: template.jsonMode,
  };
}
