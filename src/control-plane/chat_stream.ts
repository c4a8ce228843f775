import { randomUUID } from "node:crypto";

import type { BaseLogger } from "pino";

import type { ChatRequest, Intent } from "../contracts/chat";
import type { Envelope } from "../contracts/envelope";
import { runStreamPipeline } from "../gates/stream_pipeline";
import type { StreamPolicy } from "../gates/stream_policy";
import type { ConversationStore } from "../store/conversation_store";
import type { MeetingContextStore } from "../store/meeting_context_store";
import { dispatchChat } from "./dispatcher";
import type { WorkflowServices } from "./workflows/types";

export type ChatStreamDeps = {
  conversations: ConversationStore;
  meetingContexts: MeetingContextStore;
  services: WorkflowServices;
  policy: StreamPolicy;
  historyWindow: number;
};

export type ChatStream = {
  sessionId: string;
  envelopes: AsyncGenerator<Envelope>;
};

export const newSessionId = () => `sess_${randomUUID()}`;

/**
 * Session bookkeeping plus the envelope stream for one request. The user turn
 * is stored before streaming; the answer only after a normal completion.
 */
export async function openChatStream(args: {
  request: ChatRequest;
  deps: ChatStreamDeps;
  log: BaseLogger;
  signal?: AbortSignal;
}): Promise<ChatStream> {
  const { request, deps } = args;
  const sessionId = request.session_id ?? newSessionId();
  const log = args.log;

  if (request.meeting_context) {
    deps.meetingContexts.set(sessionId, request.meeting_context);
  }
  const meetingContext = deps.meetingContexts.get(sessionId);

  const history = await deps.conversations.recent(sessionId, deps.historyWindow);
  await deps.conversations.append({ sessionId, role: "user", content: request.query });

  log.info(
    {
      sessionId,
      queryChars: request.query.length,
      historyCount: history.length,
      hasMeetingContext: Boolean(meetingContext),
    },
    "chat.stream_started"
  );

  let intent: Intent | undefined;
  const source = dispatchChat({
    sessionId,
    request,
    history,
    meetingContext,
    services: deps.services,
    log,
    signal: args.signal,
    onClassified: (classification) => {
      intent = classification.intent;
    },
  });

  const envelopes = runStreamPipeline({
    sessionId,
    source,
    policy: deps.policy,
    log,
    onSettled: async ({ outcome, answerText }) => {
      if (outcome !== "completed") return;
      await deps.conversations.append({
        sessionId,
        role: "assistant",
        content: answerText,
        ...(intent ? { metadata: { intent } } : {}),
      });
    },
  });

  return { sessionId, envelopes };
}
