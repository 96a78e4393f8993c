/**
 * API-backed Chat Model
 *
 * Chat completions through hosted providers (Anthropic, OpenAI).
 *
 * @module
 */

import Anthropic from "@anthropic-ai/sdk";
import OpenAI from "openai";

import type { ChatMessage, ChatModel, ChatResponse } from "../interfaces/IChatModel.js";
import { ConfigurationError } from "../errors.js";
import { createLogger } from "../../utils/logger.js";

const logger = createLogger("api-chat-model");

// =============================================================================
// Types
// =============================================================================

export type APIProvider = "anthropic" | "openai";

export const API_PROVIDERS: readonly APIProvider[] = ["anthropic", "openai"];

export interface ApiChatModelConfig {
  provider: APIProvider;
  /** API key (reads from env if not provided) */
  apiKey?: string;
  modelId?: string;
  /** Max retries for failed requests */
  maxRetries?: number;
  /** Completion budget per call (default: 2048) */
  maxTokens?: number;
  /** Sampling temperature (default: 0) */
  temperature?: number;
}

const DEFAULT_MODELS: Record<APIProvider, string> = {
  anthropic: "claude-sonnet-4-20250514",
  openai: "gpt-4o",
};

const API_KEY_ENV: Record<APIProvider, string> = {
  anthropic: "ANTHROPIC_API_KEY",
  openai: "OPENAI_API_KEY",
};

export function isApiProvider(value: string): value is APIProvider {
  return API_PROVIDERS.some((provider) => provider === value);
}

/**
 * Joins system messages into one instruction string and keeps the rest in order.
 */
export function splitSystemMessages(messages: readonly ChatMessage[]): {
  system: string;
  turns: Array<{ role: "user" | "assistant"; content: string }>;
} {
  const system: string[] = [];
  const turns: Array<{ role: "user" | "assistant"; content: string }> = [];
  for (const message of messages) {
    if (message.role === "system") {
      system.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }
  return { system: system.join("\n\n"), turns };
}

// =============================================================================
// Chat Model
// =============================================================================

export class ApiChatModel implements ChatModel {
  private readonly config: Required<ApiChatModelConfig>;
  private anthropicClient: Anthropic | null = null;
  private openaiClient: OpenAI | null = null;

  /**
   * @throws {ConfigurationError} When no API key is configured for the provider
   */
  constructor(config: ApiChatModelConfig, env: Record<string, string | undefined> = process.env) {
    const apiKey = config.apiKey || env[API_KEY_ENV[config.provider]];
    if (!apiKey) {
      throw new ConfigurationError(
        `API key not found. Set ${API_KEY_ENV[config.provider]} or provide apiKey in config.`,
        [API_KEY_ENV[config.provider]]
      );
    }
    this.config = {
      provider: config.provider,
      apiKey,
      modelId: config.modelId || DEFAULT_MODELS[config.provider],
      maxRetries: config.maxRetries ?? 3,
      maxTokens: config.maxTokens ?? 2048,
      temperature: config.temperature ?? 0,
    };
  }

  get modelId(): string {
    return this.config.modelId;
  }

  async invoke(messages: ChatMessage[]): Promise<ChatResponse> {
    const startTime = Date.now();
    const { system, turns } = splitSystemMessages(messages);

    try {
      const content =
        this.config.provider === "anthropic" ? await this.invokeAnthropic(system, turns) : await this.invokeOpenAI(system, turns);
      logger.debug(
        { provider: this.config.provider, durationMs: Date.now() - startTime, chars: content.length },
        "Chat completion received"
      );
      return { content };
    } catch (error) {
      logger.error({ err: error, provider: this.config.provider }, "Chat completion failed");
      throw error;
    }
  }

  private async invokeAnthropic(
    system: string,
    turns: Array<{ role: "user" | "assistant"; content: string }>
  ): Promise<string> {
    this.anthropicClient ??= new Anthropic({ apiKey: this.config.apiKey, maxRetries: this.config.maxRetries });

    const response = await this.anthropicClient.messages.create({
      model: this.config.modelId,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      system: system || undefined,
      messages: turns,
    });

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");
  }

  private async invokeOpenAI(
    system: string,
    turns: Array<{ role: "user" | "assistant"; content: string }>
  ): Promise<string> {
    this.openaiClient ??= new OpenAI({ apiKey: this.config.apiKey, maxRetries: this.config.maxRetries });

    const messages: OpenAI.ChatCompletionMessageParam[] = [];
    if (system) {
      messages.push({ role: "system", content: system });
    }
    for (const turn of turns) {
      messages.push(turn.role === "user" ? { role: "user", content: turn.content } : { role: "assistant", content: turn.content });
    }

    const response = await this.openaiClient.chat.completions.create({
      model: this.config.modelId,
      max_tokens: this.config.maxTokens,
      temperature: this.config.temperature,
      messages,
    });

    return response.choices[0]?.message?.content ?? "";
  }
}
