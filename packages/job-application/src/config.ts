import { LOG_LEVELS, type LogLevel } from "@formpilot/core";
import { z } from "zod";

const DEFAULT_BASE_URL = "https://api.openai.com/v1";

const envSchema = z.object({
  LLM_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  LLM_MODEL: z.string().min(1).default("gpt-4o-mini"),
  EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),
  WORKFLOW_TIMEOUT_MS: z.coerce.number().int().positive().default(600_000),
  STORAGE_DIR: z.string().min(1).default("./storage"),
  UPLOAD_DIR: z.string().min(1).default("./data"),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8000),
  HOST: z.string().min(1).default("0.0.0.0"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface AppConfig {
  llm: {
    apiKey?: string;
    baseURL: string;
    model: string;
    embeddingModel: string;
  };
  workflow: {
    timeoutMs: number;
  };
  storageDir: string;
  uploadDir: string;
  server: {
    host: string;
    port: number;
  };
  logLevel: LogLevel;
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// Unset and blank variables both fall back to their defaults.
const withoutBlanks = (env: NodeJS.ProcessEnv) =>
  Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const result = envSchema.safeParse(withoutBlanks(env));
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const values = result.data;
  return {
    llm: {
      apiKey: values.LLM_API_KEY ?? values.OPENAI_API_KEY,
      baseURL: values.LLM_BASE_URL,
      model: values.LLM_MODEL,
      embeddingModel: values.EMBEDDING_MODEL,
    },
    workflow: { timeoutMs: values.WORKFLOW_TIMEOUT_MS },
    storageDir: values.STORAGE_DIR,
    uploadDir: values.UPLOAD_DIR,
    server: { host: values.HOST, port: values.PORT },
    logLevel: values.LOG_LEVEL,
  };
};
