/**
 * Model client exports
 */

export type { ModelClient, CompletionRequest, Completion, FinishReason } from "./types.js";
export { OpenAIModelClient, createModelClient, createLazyModelClient } from "./openai.js";
