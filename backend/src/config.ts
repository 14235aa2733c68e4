import "dotenv/config";
import { createHash } from "node:crypto";
import type { ModelDefaultsKey } from "@shared";
import { z } from "zod";
import { ConfigurationError, formatZodIssues } from "@/errors";

const DEFAULT_TEMPERATURE = 0.7;

const DEFAULT_MAX_TOKENS: Record<ModelDefaultsKey, number> = {
  openai: 1024,
  claude: 2048,
  titan: 512,
  ai21: 2048,
  cohere: 2048,
  meta: 2048,
  mistral: 4096,
  stability: 2048,
  writer: 2048,
  nova: 4096,
};

const EnvSchema = z.object({
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8000),
  BODY_LIMIT_BYTES: z.coerce
    .number()
    .int()
    .positive()
    .default(50 * 1024 * 1024),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  AWS_REGION: z.string().min(1).optional(),
  AWS_DEFAULT_REGION: z.string().min(1).optional(),
  AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
  AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),
  AWS_SESSION_TOKEN: z.string().min(1).optional(),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(0).default(3),
  S3_FILES_BUCKET: z.string().min(1).optional(),
  METRICS_ENABLED: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

const MaxTokensSchema = z.coerce.number().int().positive();
const TemperatureSchema = z.coerce.number().min(0).max(2);

/**
 * Generation defaults applied when a request leaves max_tokens / temperature unset
 */
export interface ModelDefaults {
  maxTokens: number;
  temperature: number;
}

/**
 * Configuration provider injected into every Strategy
 */
export interface ProviderDefaults {
  get(provider: ModelDefaultsKey): ModelDefaults;
  /** Stable digest of the table, part of the adapter cache key */
  readonly fingerprint: string;
}

export function createProviderDefaults(
  table: Record<ModelDefaultsKey, ModelDefaults>,
): ProviderDefaults {
  const fingerprint = createHash("sha256")
    .update(JSON.stringify(table))
    .digest("hex")
    .slice(0, 16);
  return {
    get: (provider) => table[provider],
    fingerprint,
  };
}

function parseOverride(
  env: NodeJS.ProcessEnv,
  name: string,
  schema: z.ZodNumber,
  fallback: number,
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid value for ${name}: ${formatZodIssues(parsed.error.issues)}`,
    );
  }
  return parsed.data;
}

function loadModelDefaults(
  env: NodeJS.ProcessEnv,
): Record<ModelDefaultsKey, ModelDefaults> {
  const defaultsFor = (provider: ModelDefaultsKey): ModelDefaults => {
    const prefix = provider.toUpperCase();
    return {
      maxTokens: parseOverride(
        env,
        `${prefix}_DEFAULT_MAX_TOKENS`,
        MaxTokensSchema,
        DEFAULT_MAX_TOKENS[provider],
      ),
      temperature: parseOverride(
        env,
        `${prefix}_DEFAULT_TEMPERATURE`,
        TemperatureSchema,
        DEFAULT_TEMPERATURE,
      ),
    };
  };

  return {
    openai: defaultsFor("openai"),
    claude: defaultsFor("claude"),
    titan: defaultsFor("titan"),
    nova: defaultsFor("nova"),
    ai21: defaultsFor("ai21"),
    cohere: defaultsFor("cohere"),
    meta: defaultsFor("meta"),
    mistral: defaultsFor("mistral"),
    stability: defaultsFor("stability"),
    writer: defaultsFor("writer"),
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  // Empty assignments in .env files count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== ""),
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid environment: ${formatZodIssues(parsed.error.issues)}`,
    );
  }
  const vars = parsed.data;

  return {
    api: {
      host: vars.HOST,
      port: vars.PORT,
      bodyLimit: vars.BODY_LIMIT_BYTES,
    },
    logging: {
      level: vars.LOG_LEVEL,
    },
    llm: {
      openai: {
        apiKey: vars.OPENAI_API_KEY,
        baseUrl: vars.OPENAI_BASE_URL,
      },
      bedrock: {
        region: vars.AWS_REGION ?? vars.AWS_DEFAULT_REGION ?? "us-east-1",
        accessKeyId: vars.AWS_ACCESS_KEY_ID,
        secretAccessKey: vars.AWS_SECRET_ACCESS_KEY,
        sessionToken: vars.AWS_SESSION_TOKEN,
      },
      retry: {
        maxAttempts: vars.RETRY_MAX_ATTEMPTS,
      },
      defaults: loadModelDefaults(env),
    },
    files: {
      bucket: vars.S3_FILES_BUCKET,
    },
    metrics: {
      enabled: vars.METRICS_ENABLED,
    },
  };
}

export type Config = ReturnType<typeof loadConfig>;
export type BedrockConfig = Config["llm"]["bedrock"];
export type OpenAiConfig = Config["llm"]["openai"];

const config = loadConfig();

export const configProviderDefaults = createProviderDefaults(
  config.llm.defaults,
);

export default config;
