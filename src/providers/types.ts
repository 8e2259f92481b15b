/**
 * Generative model client types for ticketplan
 */

/**
 * One single-turn completion request
 */
export interface CompletionRequest {
  system: string;
  user: string;
  temperature: number;
  maxTokens: number;
  /** Overrides the client's configured model */
  model?: string;
}

/**
 * Why generation stopped
 */
export type FinishReason = "stop" | "length" | "content_filter" | "other";

/**
 * Completion result with usage
 */
export interface Completion {
  text: string;
  tokensIn: number;
  tokensOut: number;
  finishReason: FinishReason;
  model: string;
}

/**
 * Model client interface. Failures reject with ProviderError and are not
 * retried here; callers decide what a failed call means.
 */
export interface ModelClient {
  readonly id: string;
  complete(request: CompletionRequest): Promise<Completion>;
}
