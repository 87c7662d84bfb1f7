import { ChatOpenAI } from "@langchain/openai";
import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { ConfigurationError } from "../errors";

export interface ChatModelOptions {
  model: string;
  apiKey?: string;
  timeoutMs: number;
  /** Ask the provider for a JSON object body. */
  json?: boolean;
}

/**
 * Creates the chat model used by the text chains.
 */
export function createChatModel({
  model,
  apiKey,
  timeoutMs,
  json = false,
}: ChatModelOptions): BaseChatModel {
  if (!apiKey) {
    throw new ConfigurationError("OPENAI_API_KEY is required for the text chains.");
  }

  return new ChatOpenAI({
    model,
    apiKey,
    timeout: timeoutMs,
    maxRetries: 0,
    ...(json ? { modelKwargs: { response_format: { type: "json_object" } } } : {}),
  });
}
