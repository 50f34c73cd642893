import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";

// LLM Provider types
export type LLMProvider = "anthropic" | "openai";

/** What a generation is for; each category carries its own sampling defaults. */
export type UsageCategory = "dialogue" | "planning" | "analytics";

export interface AgentConfig {
  provider: LLMProvider;
  model: string;
  embeddingModel?: string;
  apiKey?: string;
  timeoutMs?: number;
  maxRetries?: number;
}

export interface Message {
  role: "user" | "assistant" | "system";
  content: string;
}

export interface GenerateRequest {
  category: UsageCategory;
  messages: Message[];
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  content: string;
  category: UsageCategory;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface TextGenerator {
  generate(request: GenerateRequest): Promise<LLMResponse>;
  /** Resolves to null when the provider has no embedding model. */
  embed(text: string): Promise<number[] | null>;
}

export const CATEGORY_SAMPLING: Record<
  UsageCategory,
  { temperature: number; maxTokens: number }
> = {
  dialogue: { temperature: 0.9, maxTokens: 400 },
  planning: { temperature: 0.7, maxTokens: 300 },
  analytics: { temperature: 0.2, maxTokens: 500 },
};

export class GenerationError extends Error {
  constructor(
    message: string,
    readonly category: UsageCategory,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "GenerationError";
  }
}

/**
 * Sampling for one request: explicit values win over the category defaults.
 */
export function samplingFor(request: GenerateRequest): {
  temperature: number;
  maxTokens: number;
} {
  const defaults = CATEGORY_SAMPLING[request.category];
  return {
    temperature: request.temperature ?? defaults.temperature,
    maxTokens: Math.max(1, Math.floor(request.maxTokens ?? defaults.maxTokens)),
  };
}

/**
 * Split messages into a system prompt and the user/assistant turns.
 * Consecutive turns of the same role are merged, and the turns always open
 * with a user message, which the Anthropic API requires.
 */
export function toConversationTurns(
  messages: Message[],
  fallbackSystem: string,
): {
  system: string;
  turns: Array<{ role: "user" | "assistant"; content: string }>;
} {
  const systemParts = messages
    .filter((m) => m.role === "system")
    .map((m) => m.content.trim())
    .filter(Boolean);

  const turns: Array<{ role: "user" | "assistant"; content: string }> = [];
  for (const message of messages) {
    if (message.role === "system") continue;
    const last = turns[turns.length - 1];
    if (last && last.role === message.role) {
      last.content = `${last.content}\n\n${message.content}`;
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }
  if (turns.length === 0 || turns[0].role !== "user") {
    turns.unshift({ role: "user", content: "(continue)" });
  }

  return {
    system: systemParts.length > 0 ? systemParts.join("\n\n") : fallbackSystem,
    turns,
  };
}

// Agent class: one provider client plus embeddings where the provider has them
export class Agent implements TextGenerator {
  private config: AgentConfig;
  private systemPrompt: string;
  private anthropicClient?: Anthropic;
  private openaiClient?: OpenAI;

  constructor(config: AgentConfig, systemPrompt?: string) {
    this.config = config;
    this.systemPrompt = systemPrompt || "You are a warm, attentive companion.";

    const timeout = config.timeoutMs ?? 30_000;
    const maxRetries = config.maxRetries ?? 2;

    // Initialize client based on provider
    if (config.provider === "anthropic") {
      this.anthropicClient = new Anthropic({
        apiKey: config.apiKey || process.env.ANTHROPIC_API_KEY,
        timeout,
        maxRetries,
      });
    } else {
      this.openaiClient = new OpenAI({
        apiKey: config.apiKey || process.env.OPENAI_API_KEY,
        timeout,
        maxRetries,
      });
    }
  }

  getProvider(): LLMProvider {
    return this.config.provider;
  }

  getModel(): string {
    return this.config.model;
  }

  /**
   * Generate a completion for one usage category. Upstream failures are
   * rethrown as GenerationError.
   */
  async generate(request: GenerateRequest): Promise<LLMResponse> {
    const sampling = samplingFor(request);
    try {
      if (this.anthropicClient) {
        return await this.generateAnthropic(request, sampling);
      }
      if (this.openaiClient) {
        return await this.generateOpenAI(request, sampling);
      }
    } catch (error) {
      throw new GenerationError(
        `${this.config.provider} ${request.category} generation failed: ${
          error instanceof Error ? error.message : String(error)
        }`,
        request.category,
        error,
      );
    }
    throw new GenerationError("Provider not supported", request.category);
  }

  async embed(text: string): Promise<number[] | null> {
    if (!this.openaiClient) return null;
    const response = await this.openaiClient.embeddings.create({
      model: this.config.embeddingModel || "text-embedding-3-small",
      input: text,
    });
    return response.data[0]?.embedding ?? null;
  }

  /**
   * Anthropic messages API
   */
  private async generateAnthropic(
    request: GenerateRequest,
    sampling: { temperature: number; maxTokens: number },
  ): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new Error("Anthropic client not initialized");
    }
    const { system, turns } = toConversationTurns(
      request.messages,
      this.systemPrompt,
    );

    const response = await this.anthropicClient.messages.create({
      model: this.config.model || "claude-3-5-sonnet-20241022",
      max_tokens: sampling.maxTokens,
      temperature: sampling.temperature,
      system,
      messages: turns,
    });

    let content = "";
    for (const block of response.content) {
      if (block.type === "text") content += block.text;
    }

    return {
      content: content.trim(),
      category: request.category,
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  /**
   * OpenAI chat completions
   */
  private async generateOpenAI(
    request: GenerateRequest,
    sampling: { temperature: number; maxTokens: number },
  ): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new Error("OpenAI client not initialized");
    }
    const { system, turns } = toConversationTurns(
      request.messages,
      this.systemPrompt,
    );

    const response = await this.openaiClient.chat.completions.create({
      model: this.config.model || "gpt-4o-mini",
      temperature: sampling.temperature,
      max_tokens: sampling.maxTokens,
      messages: [
        { role: "system", content: system },
        ...turns.map((turn) =>
          turn.role === "user"
            ? { role: "user" as const, content: turn.content }
            : { role: "assistant" as const, content: turn.content },
        ),
      ],
    });

    const choice = response.choices[0];
    return {
      content: (choice?.message?.content || "").trim(),
      category: request.category,
      usage: {
        inputTokens: response.usage?.prompt_tokens || 0,
        outputTokens: response.usage?.completion_tokens || 0,
      },
    };
  }
}
