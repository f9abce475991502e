import { z } from "zod";
import { ConfigError } from "./errors";

const DEFAULT_MODEL = "gpt-4";

const emptyToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim().length === 0 ? undefined : value;

const envSchema = z.object({
  OPENAI_API_KEY: z
    .string({ required_error: "OPENAI_API_KEY is not set." })
    .trim()
    .min(1, "OPENAI_API_KEY is empty."),
  OPENAI_MODEL: z.preprocess(emptyToUndefined, z.string().trim().optional()),
  OPENAI_BASE_URL: z.preprocess(
    emptyToUndefined,
    z.string().url("OPENAI_BASE_URL must be a URL.").optional()
  ),
});

interface AppConfig {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

type Env = Record<string, string | undefined>;

const loadConfig = (env: Env = process.env): AppConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue ? String(issue.path[0]) : "environment";
    const message = issue ? issue.message : "Invalid environment.";
    throw new ConfigError(variable, message);
  }

  return {
    apiKey: parsed.data.OPENAI_API_KEY,
    model: parsed.data.OPENAI_MODEL,
    baseUrl: parsed.data.OPENAI_BASE_URL,
  };
};

const resolveModel = (requested: string | undefined, config: AppConfig) => {
  const fromArgs = requested?.trim();
  if (fromArgs) {
    return fromArgs;
  }
  return config.model ?? DEFAULT_MODEL;
};

export { DEFAULT_MODEL, loadConfig, resolveModel };
export type { AppConfig, Env };
