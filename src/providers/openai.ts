/**
 * OpenAI-compatible model client for ticketplan
 * Serves both OpenAI and DeepSeek, which share the chat completions API.
 */

import OpenAI, { APIError } from "openai";
import type { Completion, CompletionRequest, FinishReason, ModelClient } from "./types.js";
import type { ModelConfig } from "../config/schema.js";
import { getApiKey, getBaseUrl } from "../config/env.js";
import { ProviderError } from "../utils/errors.js";

/**
 * Models that reject the temperature parameter
 */
const MODELS_WITHOUT_TEMPERATURE: string[] = ["o1", "o1-mini", "o3-mini", "deepseek-reasoner"];

/**
 * OpenAI-compatible client implementation
 */
export class OpenAIModelClient implements ModelClient {
  readonly id: string;

  private readonly client: OpenAI;
  private readonly model: string;

  constructor(config: Pick<ModelConfig, "provider" | "apiKey" | "baseUrl" | "model" | "timeout">) {
    this.id = config.provider;
    this.model = config.model;

    const apiKey = config.apiKey ?? getApiKey(config.provider);
    if (!apiKey) {
      throw new ProviderError(`${config.provider} API key not provided`, {
        provider: config.provider,
      });
    }

    this.client = new OpenAI({
      apiKey,
      baseURL: config.baseUrl ?? getBaseUrl(config.provider),
      timeout: config.timeout,
      // Retries are the caller's decision
      maxRetries: 0,
    });
  }

  /**
   * Check if a model supports temperature parameter
   */
  private supportsTemperature(model: string): boolean {
    return !MODELS_WITHOUT_TEMPERATURE.some((m) => model.toLowerCase() === m);
  }

  async complete(request: CompletionRequest): Promise<Completion> {
    const model = request.model ?? this.model;

    try {
      const response = await this.client.chat.completions.create({
        model,
        max_tokens: request.maxTokens,
        messages: [
          { role: "system", content: request.system },
          { role: "user", content: request.user },
        ],
        ...(this.supportsTemperature(model) && { temperature: request.temperature }),
      });

      const choice = response.choices[0];

      return {
        text: choice?.message?.content ?? "",
        tokensIn: response.usage?.prompt_tokens ?? 0,
        tokensOut: response.usage?.completion_tokens ?? 0,
        finishReason: this.mapFinishReason(choice?.finish_reason),
        model: response.model,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  /**
   * Map API finish reason
   */
  private mapFinishReason(reason?: string | null): FinishReason {
    switch (reason) {
      case "stop":
        return "stop";
      case "length":
        return "length";
      case "content_filter":
        return "content_filter";
      default:
        return "other";
    }
  }

  /**
   * Handle API errors
   */
  private handleError(error: unknown): never {
    if (error instanceof APIError) {
      const retryable = error.status === 429 || (error.status ?? 0) >= 500;
      throw new ProviderError(error.message, {
        provider: this.id,
        statusCode: error.status,
        retryable,
        cause: error,
      });
    }

    throw new ProviderError(error instanceof Error ? error.message : String(error), {
      provider: this.id,
      cause: error instanceof Error ? error : undefined,
    });
  }
}

/**
 * Create the configured model client
 */
export function createModelClient(config: ModelConfig): ModelClient {
  return new OpenAIModelClient(config);
}

/**
 * Defer client construction, and with it the API key check, to the first call
 */
export function createLazyModelClient(config: ModelConfig): ModelClient {
  let client: ModelClient | undefined;
  return {
    id: config.provider,
    complete(request) {
      client ??= createModelClient(config);
      return client.complete(request);
    },
  };
}
