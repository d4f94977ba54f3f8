import { createOpenAICompatible } from "@ai-sdk/openai-compatible";

export interface OpenAICompatibleProviderConfig {
  baseURL: string;
  apiKey?: string;
  name?: string;
}

/**
 * Chat and embedding models from any endpoint speaking the OpenAI HTTP API.
 */
export const createOpenAICompatibleProvider = ({
  baseURL,
  apiKey,
  name = "openai-compatible",
}: OpenAICompatibleProviderConfig) =>
  createOpenAICompatible({
    name,
    baseURL,
    apiKey,
  });

export type OpenAICompatibleProvider = ReturnType<typeof createOpenAICompatibleProvider>;
