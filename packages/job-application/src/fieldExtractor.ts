import { createSilentLogger, type TextCompletion } from "@formpilot/core";
import { z } from "zod";

import { formFieldsPrompt } from "./prompts.js";
import { JobApplicationError, type FieldExtractor, type ServiceLoggerOption } from "./services.js";

const fieldListSchema = z.object({
  fields: z.array(z.string()),
});

const FENCE = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?```$/;

/** Removes a surrounding markdown code fence, if the model added one anyway. */
export const stripCodeFence = (text: string) => {
  const trimmed = text.trim();
  const match = FENCE.exec(trimmed);
  return match ? match[1].trim() : trimmed;
};

export const parseFieldList = (raw: string): string[] => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(raw));
  } catch (error) {
    throw new JobApplicationError("Form field list is not valid JSON", error);
  }

  const result = fieldListSchema.safeParse(parsed);
  if (!result.success) {
    throw new JobApplicationError("Form field list must look like { fields: string[] }", result.error);
  }

  const seen = new Set<string>();
  const fields: string[] = [];
  for (const entry of result.data.fields) {
    const field = entry.trim();
    if (field !== "" && !seen.has(field)) {
      seen.add(field);
      fields.push(field);
    }
  }
  return fields;
};

export interface CompletionFieldExtractorOptions extends ServiceLoggerOption {
  completion: TextCompletion;
}

export const createCompletionFieldExtractor = ({
  completion,
  logger = createSilentLogger(),
}: CompletionFieldExtractorOptions): FieldExtractor => ({
  async extractFields(formText, options = {}) {
    const raw = await completion.complete(formFieldsPrompt(formText), { signal: options.signal });
    const fields = parseFieldList(raw);
    logger.debug("Extracted form fields", { count: fields.length });
    return fields;
  },
});
