import { generateText, type LanguageModel } from "ai";

export interface CompletionRequestOptions {
  signal?: AbortSignal;
}

/** Prompt in, text out. Step bodies depend on this rather than on a model. */
export interface TextCompletion {
  complete(prompt: string, options?: CompletionRequestOptions): Promise<string>;
}

export interface TextCompletionConfig {
  model: LanguageModel;
  system?: string;
  temperature?: number;
  maxRetries?: number;
}

export const createTextCompletion = ({
  model,
  system,
  temperature,
  maxRetries,
}: TextCompletionConfig): TextCompletion => ({
  async complete(prompt, options = {}) {
    const { text } = await generateText({
      model,
      system,
      prompt,
      temperature,
      maxRetries,
      abortSignal: options.signal,
    });

    return text;
  },
});
