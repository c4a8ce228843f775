import type { UpstreamEvent } from "../../contracts/upstream_event";
import { buildQnaPromptPack, promptPackLogShape, toSinglePromptText } from "../prompt_pack";
import { findRelevantDocuments } from "./documents";
import type { WorkflowContext } from "./types";

export const QNA_END_MESSAGE = "Q&A response complete";

export async function* qnaWorkflow(ctx: WorkflowContext): AsyncGenerator<UpstreamEvent> {
  const documents = yield* findRelevantDocuments(ctx);

  const pack = buildQnaPromptPack({
    query: ctx.request.query,
    history: ctx.history,
    meetingContext: ctx.meetingContext,
    documents,
  });
  ctx.log.info({ sessionId: ctx.sessionId, promptPack: promptPackLogShape(pack) }, "qna.prompt_built");

  yield { type: "thinking", stepDescription: "Generating answer" };

  for await (const chunk of ctx.services.model.streamReply({
    promptText: toSinglePromptText(pack),
    signal: ctx.signal,
  })) {
    yield { type: "text", text: chunk };
  }

  yield { type: "end", message: QNA_END_MESSAGE };
}
