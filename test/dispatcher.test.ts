import { describe, it, expect } from "vitest";
import pino from "pino";

import { ChatRequest, type IntentClassification } from "../src/contracts/chat";
import type { UpstreamEvent } from "../src/contracts/upstream_event";
import { UNSUPPORTED_MESSAGE, dispatchChat } from "../src/control-plane/dispatcher";
import { QNA_END_MESSAGE } from "../src/control-plane/workflows/qna";
import { StaticRetrievalClient } from "../src/evidence/retrieval_client";
import { FakeModelProvider } from "../src/providers/fake_model";

const log = pino({ level: "silent" });

function dispatch(query: string, model = new FakeModelProvider(), onClassified?: (c: IntentClassification) => void) {
  return dispatchChat({
    sessionId: "s1",
    request: ChatRequest.parse({ query }),
    history: [],
    services: {
      model,
      retrieval: new StaticRetrievalClient(),
      settings: { topK: 5, minScore: 0.7, maxDocuments: 5, mattermostUserMap: {} },
    },
    log,
    onClassified,
  });
}

async function collect(stream: AsyncIterable<UpstreamEvent>): Promise<UpstreamEvent[]> {
  const out: UpstreamEvent[] = [];
  for await (const event of stream) out.push(event);
  return out;
}

describe("dispatchChat", () => {
  it("rejects unsupported requests after classification", async () => {
    const seen: string[] = [];
    const events = await collect(dispatch("오늘 날씨 어때?", undefined, (c) => seen.push(c.intent)));

    expect(seen).toEqual(["unsupported"]);
    expect(events.map((event) => event.type)).toEqual([
      "start",
      "intent_classified",
      "reasoning_step",
      "reasoning_step",
      "reasoning_step",
      "error",
    ]);
    expect(events[1]).toEqual({
      type: "intent_classified",
      intent: "unsupported",
      entities: {},
      description: "Unsupported request",
    });
    expect(events.at(-1)).toEqual({ type: "error", message: UNSUPPORTED_MESSAGE });
  });

  it("routes questions to the Q&A workflow and closes with end", async () => {
    const model = new FakeModelProvider({ replies: ["Ten million."], chunkSize: 100 });
    const events = await collect(dispatch("What is the budget?", model));

    expect(events.slice(-3)).toEqual([
      { type: "text", text: "Ten million." },
      { type: "end", message: QNA_END_MESSAGE },
      { type: "end" },
    ]);
  });

  it("treats an unknown intent as a question", async () => {
    const model = new FakeModelProvider({
      replies: ["Answer."],
      json: { intent_classification: '{"intent":"smalltalk","entities":[]}' },
    });
    const events = await collect(dispatch("hello", model));

    expect(events[1]).toEqual({
      type: "intent_classified",
      intent: "unknown",
      entities: {},
      description: "Unclassified request; answering as a question",
    });
    expect(events.some((event) => event.type === "text" && event.text === "Answer.")).toBe(true);
  });
});
