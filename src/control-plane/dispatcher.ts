import type { Intent, IntentClassification } from "../contracts/chat";
import type { UpstreamEvent } from "../contracts/upstream_event";
import { classifyIntent } from "./intent";
import { minutesWorkflow } from "./workflows/minutes";
import { qnaWorkflow } from "./workflows/qna";
import type { Workflow, WorkflowContext } from "./workflows/types";
import { visualizationWorkflow } from "./workflows/visualization";

export const UNSUPPORTED_MESSAGE = "This request is not supported.";

const INTENT_DESCRIPTIONS: Record<Intent, string> = {
  qna: "Answer a question from documents",
  send_mattermost_minutes: "Send meeting minutes through Mattermost",
  visualize: "Visualize document data as a chart",
  unsupported: "Unsupported request",
  unknown: "Unclassified request; answering as a question",
};

const WORKFLOWS: Record<Exclude<Intent, "unsupported">, Workflow> = {
  qna: qnaWorkflow,
  unknown: qnaWorkflow,
  send_mattermost_minutes: minutesWorkflow,
  visualize: visualizationWorkflow,
};

export type DispatchArgs = Omit<WorkflowContext, "classification"> & {
  onClassified?: (classification: IntentClassification) => void;
};

/**
 * Raw event stream for one chat request:
 * start → intent_classified (+ classification steps) → workflow → end.
 */
export async function* dispatchChat(args: DispatchArgs): AsyncGenerator<UpstreamEvent> {
  const { onClassified, ...base } = args;

  yield { type: "start" };

  const classification = await classifyIntent({
    query: base.request.query,
    model: base.services.model,
    log: base.log,
    signal: base.signal,
  });
  onClassified?.(classification);
  base.log.info(
    {
      sessionId: base.sessionId,
      intent: classification.intent,
      source: classification.source,
      entityNames: Object.keys(classification.entities),
    },
    "chat.intent_classified"
  );

  yield {
    type: "intent_classified",
    intent: classification.intent,
    entities: classification.entities,
    description: INTENT_DESCRIPTIONS[classification.intent],
  };
  for (const step of classification.reasoningSteps) {
    yield { type: "reasoning_step", stepDescription: step.stepDescription, details: step.details };
  }

  if (classification.intent === "unsupported") {
    yield { type: "error", message: UNSUPPORTED_MESSAGE };
    return;
  }

  yield* WORKFLOWS[classification.intent]({ ...base, classification });
  yield { type: "end" };
}
