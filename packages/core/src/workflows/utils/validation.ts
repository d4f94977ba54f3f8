import type { SchemaLike } from "../types.js";
import { WorkflowSchemaError } from "../errors.js";

export const hasFunction = <T extends object, K extends keyof T>(
  value: T | undefined,
  key: K,
): value is T & Record<K, (...args: unknown[]) => unknown> => {
  return Boolean(value && typeof value[key] === "function");
};

export const parseWithSchema = <T>(schema: SchemaLike<T>, value: unknown, context: string): T => {
  if (hasFunction(schema, "safeParse")) {
    const result = schema.safeParse(value);
    if (result.success) {
      return result.data;
    }

    throw new WorkflowSchemaError(`Schema validation failed for ${context}`, result.error);
  }

  if (hasFunction(schema, "parse")) {
    try {
      return schema.parse(value);
    } catch (error) {
      throw new WorkflowSchemaError(`Schema validation failed for ${context}`, error);
    }
  }

  throw new WorkflowSchemaError(
    `Schema validation failed for ${context}`,
    new Error("Schema must expose parse or safeParse"),
  );
};

/**
 * Names of the keys whose value is absent, `null` or a blank string.
 */
export const findMissingKeys = (value: unknown, required: readonly string[]): string[] => {
  if (typeof value !== "object" || value === null) {
    return [...required];
  }

  const record = new Map<string, unknown>(Object.entries(value));

  return required.filter((key) => {
    const candidate = record.get(key);
    return candidate === undefined || candidate === null || (typeof candidate === "string" && candidate.trim() === "");
  });
};
