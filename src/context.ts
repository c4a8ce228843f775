import type { FastifyBaseLogger } from "fastify";

import type { AppConfig } from "./config/app_config";
import { loadStreamPolicy, type StreamPolicy } from "./gates/stream_policy";
import {
  HttpRetrievalClient,
  StaticRetrievalClient,
  type RetrievalClient,
} from "./evidence/retrieval_client";
import { HttpMattermostClient, type MattermostClient } from "./mattermost/mattermost_client";
import { FakeModelProvider } from "./providers/fake_model";
import type { ModelProvider } from "./providers/model_provider";
import { OpenAIModelProvider } from "./providers/openai_model";
import { selectModel } from "./providers/provider_config";
import { MemoryConversationStore, type ConversationStore } from "./store/conversation_store";
import { MeetingContextStore } from "./store/meeting_context_store";
import { SqliteConversationStore } from "./store/sqlite_conversation_store";

export const MAX_DOCUMENTS = 5;

/** Every long-lived service, created once at startup. */
export type AppContext = {
  config: AppConfig;
  log: FastifyBaseLogger;
  conversations: ConversationStore;
  meetingContexts: MeetingContextStore;
  model: ModelProvider;
  retrieval: RetrievalClient;
  mattermost?: MattermostClient;
  policy: StreamPolicy;
};

export type AppContextOverrides = Partial<
  Pick<AppContext, "conversations" | "model" | "retrieval" | "mattermost" | "policy">
>;

export function createModelProvider(config: AppConfig, log: FastifyBaseLogger): ModelProvider {
  if (config.llm.provider === "fake") {
    return new FakeModelProvider();
  }

  const selection = selectModel({
    appEnv: config.appEnv,
    nodeEnv: config.nodeEnv,
    configuredModel: config.llm.openai.model,
  });
  log.info({ provider: "openai", model: selection.model, source: selection.source }, "provider.selected");

  return new OpenAIModelProvider({
    apiKey: config.llm.openai.apiKey,
    model: selection.model,
    baseUrl: config.llm.openai.baseUrl,
    maxOutputTokens: config.llm.openai.maxOutputTokens,
    temperature: config.llm.openai.temperature,
    log: log.child({ component: "openai" }),
  });
}

export function createAppContext(
  config: AppConfig,
  log: FastifyBaseLogger,
  overrides: AppContextOverrides = {}
): AppContext {
  const retrievalUrl = config.retrieval.serviceUrl;
  if (!retrievalUrl && !overrides.retrieval) {
    log.warn("retrieval.not_configured");
  }

  const { url: mattermostUrl, botToken } = config.mattermost;
  const mattermost =
    "mattermost" in overrides
      ? overrides.mattermost
      : mattermostUrl && botToken
        ? new HttpMattermostClient({
            url: mattermostUrl,
            botToken,
            log: log.child({ component: "mattermost" }),
          })
        : undefined;

  return {
    config,
    log,
    conversations:
      overrides.conversations ??
      (config.conversationDbPath
        ? new SqliteConversationStore(config.conversationDbPath)
        : new MemoryConversationStore()),
    meetingContexts: new MeetingContextStore(),
    model: overrides.model ?? createModelProvider(config, log),
    retrieval:
      overrides.retrieval ??
      (retrievalUrl
        ? new HttpRetrievalClient({
            baseUrl: retrievalUrl,
            timeoutMs: config.retrieval.timeoutMs,
            log: log.child({ component: "retrieval" }),
          })
        : new StaticRetrievalClient()),
    mattermost,
    policy:
      overrides.policy ??
      loadStreamPolicy({ path: config.streamPolicyPath, exposeErrorDetails: config.debug }),
  };
}

export async function closeAppContext(context: AppContext): Promise<void> {
  await context.conversations.close();
  context.meetingContexts.clearAll();
}
