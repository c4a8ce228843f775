import { config as loadEnv } from "dotenv";
import { z } from "zod";

export const isTruthy = (value?: string) =>
  value !== undefined && ["1", "true", "yes", "on"].includes(value.toLowerCase());

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// `FOO=` in a .env file means unset.
const blankAsUndefined = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (typeof value === "string" && value.trim() === "" ? undefined : value), schema);

const EnvSchema = z.object({
  NODE_ENV: blankAsUndefined(z.string().default("development")),
  APP_ENV: blankAsUndefined(z.string().optional()),
  PORT: blankAsUndefined(z.coerce.number().int().min(1).max(65535).default(8000)),
  HOST: blankAsUndefined(z.string().default("0.0.0.0")),
  API_PREFIX: blankAsUndefined(z.string().regex(/^\/\S*$/, "must start with /").default("/api/v1")),
  LOG_LEVEL: blankAsUndefined(
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional()
  ),
  DEBUG: blankAsUndefined(z.string().optional()),
  PINO_PRETTY: blankAsUndefined(z.string().optional()),

  LLM_PROVIDER: blankAsUndefined(z.enum(["fake", "openai"]).default("fake")),
  OPENAI_API_KEY: blankAsUndefined(z.string().optional()),
  OPENAI_MODEL: blankAsUndefined(z.string().optional()),
  OPENAI_BASE_URL: blankAsUndefined(z.string().url().default("https://api.openai.com/v1")),
  OPENAI_MAX_OUTPUT_TOKENS: blankAsUndefined(z.coerce.number().int().positive().optional()),
  OPENAI_TEMPERATURE: blankAsUndefined(z.coerce.number().min(0).max(2).optional()),

  RAG_SERVICE_URL: blankAsUndefined(z.string().url().optional()),
  RAG_TOP_K: blankAsUndefined(z.coerce.number().int().positive().default(5)),
  RAG_MIN_SCORE: blankAsUndefined(z.coerce.number().min(0).max(1).default(0.7)),
  RAG_TIMEOUT_MS: blankAsUndefined(z.coerce.number().int().positive().default(30_000)),

  MATTERMOST_URL: blankAsUndefined(z.string().url().optional()),
  MATTERMOST_BOT_TOKEN: blankAsUndefined(z.string().optional()),
  MATTERMOST_USER_MAP: blankAsUndefined(z.string().default("{}")),

  CONVERSATION_DB_PATH: blankAsUndefined(z.string().optional()),
  HISTORY_WINDOW: blankAsUndefined(z.coerce.number().int().min(0).default(10)),
  STREAM_POLICY_PATH: blankAsUndefined(z.string().optional()),
  CORS_ORIGINS: blankAsUndefined(z.string().default("*")),
});

const UserMap = z.record(z.string(), z.string());

export type LlmProviderName = "fake" | "openai";

export type AppConfig = {
  nodeEnv: string;
  appEnv?: string;
  port: number;
  host: string;
  apiPrefix: string;
  logLevel?: string;
  debug: boolean;
  prettyLogs: boolean;
  llm: {
    provider: LlmProviderName;
    openai: {
      apiKey?: string;
      model?: string;
      baseUrl: string;
      maxOutputTokens?: number;
      temperature?: number;
    };
  };
  retrieval: {
    serviceUrl?: string;
    topK: number;
    minScore: number;
    timeoutMs: number;
  };
  mattermost: {
    url?: string;
    botToken?: string;
    userMap: Record<string, string>;
  };
  conversationDbPath?: string;
  historyWindow: number;
  streamPolicyPath?: string;
  // true allows any origin
  corsOrigins: true | string[];
};

const formatIssues = (error: z.ZodError) =>
  error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");

function parseUserMap(raw: string): Record<string, string> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`MATTERMOST_USER_MAP is not valid JSON: ${reason}`);
  }
  const parsed = UserMap.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`MATTERMOST_USER_MAP must map names to usernames: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/** Load `.env` outside production. Real environment variables win. */
export function loadEnvFile(env: NodeJS.ProcessEnv = process.env): void {
  if (env.NODE_ENV !== "production") {
    loadEnv();
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const e = parsed.data;

  if (e.LLM_PROVIDER === "openai" && !e.OPENAI_API_KEY) {
    throw new ConfigError("LLM_PROVIDER=openai requires OPENAI_API_KEY");
  }

  const origins = e.CORS_ORIGINS.split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    nodeEnv: e.NODE_ENV,
    appEnv: e.APP_ENV,
    port: e.PORT,
    host: e.HOST,
    apiPrefix: e.API_PREFIX.replace(/\/+$/, ""),
    logLevel: e.LOG_LEVEL,
    debug: isTruthy(e.DEBUG),
    prettyLogs: e.PINO_PRETTY === "1",
    llm: {
      provider: e.LLM_PROVIDER,
      openai: {
        apiKey: e.OPENAI_API_KEY,
        model: e.OPENAI_MODEL,
        baseUrl: e.OPENAI_BASE_URL.replace(/\/+$/, ""),
        maxOutputTokens: e.OPENAI_MAX_OUTPUT_TOKENS,
        temperature: e.OPENAI_TEMPERATURE,
      },
    },
    retrieval: {
      serviceUrl: e.RAG_SERVICE_URL,
      topK: e.RAG_TOP_K,
      minScore: e.RAG_MIN_SCORE,
      timeoutMs: e.RAG_TIMEOUT_MS,
    },
    mattermost: {
      url: e.MATTERMOST_URL,
      botToken: e.MATTERMOST_BOT_TOKEN,
      userMap: parseUserMap(e.MATTERMOST_USER_MAP),
    },
    conversationDbPath: e.CONVERSATION_DB_PATH,
    historyWindow: e.HISTORY_WINDOW,
    streamPolicyPath: e.STREAM_POLICY_PATH,
    corsOrigins: origins.length === 0 || origins.includes("*") ? true : origins,
  };
}
