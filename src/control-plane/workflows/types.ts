import type { BaseLogger } from "pino";

import type { ChatRequest, IntentClassification, MeetingContext } from "../../contracts/chat";
import type { UpstreamEvent } from "../../contracts/upstream_event";
import type { RetrievalClient } from "../../evidence/retrieval_client";
import type { MattermostClient } from "../../mattermost/mattermost_client";
import type { ModelProvider } from "../../providers/model_provider";
import type { ConversationEntry } from "../../store/conversation_store";

export type WorkflowSettings = {
  topK: number;
  minScore: number;
  maxDocuments: number;
  // participant display name → Mattermost username
  mattermostUserMap: Record<string, string>;
};

export type WorkflowServices = {
  model: ModelProvider;
  retrieval: RetrievalClient;
  mattermost?: MattermostClient;
  settings: WorkflowSettings;
};

export type WorkflowContext = {
  sessionId: string;
  request: ChatRequest;
  classification: IntentClassification;
  history: ConversationEntry[];
  meetingContext?: MeetingContext;
  services: WorkflowServices;
  log: BaseLogger;
  signal?: AbortSignal;
};

export type Workflow = (ctx: WorkflowContext) => AsyncGenerator<UpstreamEvent>;
