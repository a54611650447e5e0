/**
 * OpenAI-compatible chat completion client.
 * Works against api.openai.com or any server speaking the same protocol
 * (set OPENAI_BASE_URL).
 */

import OpenAI from "openai";
import { ConfigError, type Settings } from "../config/settings";
import logger from "../lib/logger";
import type { CompletionClient, CompletionRequest } from "./types";

export function createCompletionClient(settings: Settings["openai"]): CompletionClient {
  if (!settings.apiKey) {
    throw new ConfigError("OPENAI_API_KEY environment variable not set");
  }

  const client = new OpenAI({
    apiKey: settings.apiKey,
    baseURL: settings.baseUrl,
  });
  const model = settings.model;

  logger.debug(`[LLM] Using model ${model}${settings.baseUrl ? ` at ${settings.baseUrl}` : ""}`);

  return {
    model,
    async complete(request: CompletionRequest): Promise<string> {
      const completion = await client.chat.completions.create({
        model,
        messages: [{ role: "user", content: request.prompt }],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      });

      return completion.choices[0]?.message?.content?.trim() ?? "";
    },
  };
}
