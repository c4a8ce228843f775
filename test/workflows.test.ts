import { describe, it, expect } from "vitest";
import pino from "pino";

import { ChatRequest, type MeetingContext } from "../src/contracts/chat";
import type { UpstreamEvent } from "../src/contracts/upstream_event";
import { classifyByKeywords } from "../src/control-plane/intent";
import { SEARCH_FAILED_MESSAGE } from "../src/control-plane/workflows/documents";
import { MINUTES_TASK, minutesWorkflow, splitParticipants } from "../src/control-plane/workflows/minutes";
import { QNA_END_MESSAGE, qnaWorkflow } from "../src/control-plane/workflows/qna";
import type { WorkflowContext, WorkflowServices } from "../src/control-plane/workflows/types";
import {
  VISUALIZATION_TASK,
  VisualizationError,
  parseChartSpec,
  visualizationWorkflow,
} from "../src/control-plane/workflows/visualization";
import { StaticRetrievalClient } from "../src/evidence/retrieval_client";
import { MattermostError, type MattermostClient } from "../src/mattermost/mattermost_client";
import { FakeModelProvider } from "../src/providers/fake_model";

const log = pino({ level: "silent" });

class RecordingMattermost implements MattermostClient {
  readonly sent: Array<[string, string]> = [];

  constructor(private readonly unknownUsers: string[] = []) {}

  async sendDirectMessage(username: string, message: string) {
    this.sent.push([username, message]);
    if (this.unknownUsers.includes(username)) {
      throw new MattermostError(`unknown user ${username}`, { statusCode: 404 });
    }
    return { userId: `id-${username}`, channelId: "chan-1", postId: "post-1" };
  }
}

const budgetDoc = {
  documentId: "doc-1",
  contentChunk: "The approved budget is 10M.",
  score: 0.9,
  metadata: { title: "Budget review" },
};
const weakDoc = { documentId: "doc-2", contentChunk: "Lunch menu", score: 0.5, metadata: {} };

function makeContext(args: {
  query?: string;
  services?: Partial<WorkflowServices>;
  meetingContext?: MeetingContext;
} = {}): WorkflowContext {
  const request = ChatRequest.parse({ query: args.query ?? "What is the budget?" });
  return {
    sessionId: "s1",
    request,
    classification: classifyByKeywords(request.query),
    history: [],
    meetingContext: args.meetingContext,
    services: {
      model: new FakeModelProvider(),
      retrieval: new StaticRetrievalClient(),
      settings: {
        topK: 5,
        minScore: 0.7,
        maxDocuments: 5,
        mattermostUserMap: { "Kim Minji": "minji" },
      },
      ...args.services,
    },
    log,
  };
}

async function collect(stream: AsyncIterable<UpstreamEvent>): Promise<UpstreamEvent[]> {
  const out: UpstreamEvent[] = [];
  for await (const event of stream) out.push(event);
  return out;
}

const weeklySync: MeetingContext = {
  title: "Weekly sync",
  participantNames: ["Kim Minji, Lee Jun"],
  minutesUrl: "https://files.test/minutes.pdf",
};

describe("qnaWorkflow", () => {
  it("searches, keeps relevant documents and streams the answer", async () => {
    const model = new FakeModelProvider({ replies: ["<think>plan</think>The budget is 10M."], chunkSize: 100 });
    const retrieval = new StaticRetrievalClient([budgetDoc, weakDoc]);

    const events = await collect(qnaWorkflow(makeContext({ services: { model, retrieval } })));

    expect(events).toEqual([
      {
        type: "thinking",
        stepDescription: "Searching documents",
        details: { search_in_meeting_documents_only: false, target_document_ids: null },
      },
      { type: "thinking", stepDescription: "Document search complete: 2 documents received" },
      { type: "retrieved_document", document: budgetDoc },
      { type: "thinking", stepDescription: "Generating answer" },
      { type: "text", text: "<think>plan</think>The budget is 10M." },
      { type: "end", message: QNA_END_MESSAGE },
    ]);
    expect(retrieval.calls).toEqual([
      { query: "What is the budget?", topK: 5, meetingDocumentsOnly: false, documentIds: undefined },
    ]);

    const prompt = model.prompts[0] ?? "";
    expect(prompt).toContain("[1] Budget review (id: doc-1, score: 0.90)");
    expect(prompt).not.toContain("Lunch menu");
    expect(prompt.endsWith("Query: What is the budget?")).toBe(true);
  });

  it("continues without documents when the search fails", async () => {
    const model = new FakeModelProvider({ replies: ["No documents."] });
    const retrieval = new StaticRetrievalClient([], "search down");

    const events = await collect(qnaWorkflow(makeContext({ services: { model, retrieval } })));

    expect(events[1]).toEqual({
      type: "warning",
      message: SEARCH_FAILED_MESSAGE,
      details: { reason: "search down" },
    });
    expect(events.at(-1)).toEqual({ type: "end", message: QNA_END_MESSAGE });
    expect(model.prompts[0]).toContain("(no relevant documents)");
  });
});

describe("visualizationWorkflow", () => {
  it("emits the chart, its explanation and a completion marker", async () => {
    const retrieval = new StaticRetrievalClient([budgetDoc]);

    const events = await collect(
      visualizationWorkflow(makeContext({ query: "Chart the action items", services: { retrieval } }))
    );

    expect(events.map((event) => event.type)).toEqual([
      "thinking",
      "thinking",
      "retrieved_document",
      "thinking",
      "visualization",
      "text",
      "task_complete",
    ]);
    expect(events[4]).toEqual({
      type: "visualization",
      chart: {
        chart_type: "bar",
        title: "Action items per team",
        labels: ["Design", "Backend", "QA"],
        series: [{ name: "Action items", values: [3, 5, 2] }],
        explanation: "Backend owns the most follow-ups from the meeting.",
      },
    });
    expect(events[5]).toEqual({ type: "text", text: "Backend owns the most follow-ups from the meeting." });
    expect(events[6]).toEqual({
      type: "task_complete",
      task: VISUALIZATION_TASK,
      details: { chart_type: "bar", series_count: 1 },
    });
  });

  it("throws on a chart whose series do not match the labels", async () => {
    const model = new FakeModelProvider({
      json: {
        chart_spec:
          '{"chart_type":"bar","title":"T","labels":["a"],"series":[{"name":"s","values":[1,2]}],"explanation":""}',
      },
    });

    await expect(collect(visualizationWorkflow(makeContext({ services: { model } })))).rejects.toThrow(
      VisualizationError
    );
  });
});

describe("parseChartSpec", () => {
  it("reports why a spec was rejected", () => {
    expect(() => parseChartSpec("not json")).toThrow("Chart specification is not valid JSON");
    expect(() =>
      parseChartSpec(
        '```json\n{"chart_type":"pie","title":"T","labels":["a","b"],"series":[{"name":"s","values":[1]}],"explanation":""}\n```'
      )
    ).toThrow('Invalid chart specification: series.0.values: series "s" has 1 values for 2 labels');
  });
});

describe("minutesWorkflow", () => {
  it("sends a direct message to every participant and reports partial delivery", async () => {
    const mattermost = new RecordingMattermost(["Lee Jun"]);

    const events = await collect(
      minutesWorkflow(makeContext({ services: { mattermost }, meetingContext: weeklySync }))
    );

    const message = "[Weekly sync] Meeting minutes are ready. Open them here:\n\nhttps://files.test/minutes.pdf";
    expect(mattermost.sent).toEqual([
      ["minji", message],
      ["Lee Jun", message],
    ]);
    expect(events).toEqual([
      { type: "text", text: "Preparing to send the meeting minutes...\n" },
      { type: "text", text: "Participants of 'Weekly sync': Kim Minji, Lee Jun\n" },
      { type: "text", text: "Sending the minutes of 'Weekly sync' to 2 participants...\n" },
      { type: "text", text: "Sending minutes to 'Kim Minji'...\n" },
      { type: "text", text: "Minutes sent to 'Kim Minji'.\n" },
      { type: "text", text: "Sending minutes to 'Lee Jun'...\n" },
      { type: "text", text: "Could not send minutes to 'Lee Jun'.\n" },
      { type: "text", text: "The minutes of 'Weekly sync' were sent to 1 participants.\n" },
      { type: "task_complete", task: MINUTES_TASK, details: { success_count: 1, total_count: 2 } },
      { type: "text", text: "Could not deliver to: Lee Jun\n" },
      {
        type: "result",
        success: true,
        partial: true,
        message:
          "The minutes of 'Weekly sync' were sent to 1 participants through Mattermost. 1 deliveries failed.",
      },
    ]);
  });

  it("reports full success", async () => {
    const mattermost = new RecordingMattermost();

    const events = await collect(
      minutesWorkflow(makeContext({ services: { mattermost }, meetingContext: weeklySync }))
    );

    expect(events.at(-1)).toEqual({
      type: "result",
      success: true,
      partial: false,
      message: "The minutes of 'Weekly sync' were sent to all participants through Mattermost.",
    });
  });

  it("reports total failure", async () => {
    const mattermost = new RecordingMattermost(["minji", "Lee Jun"]);

    const events = await collect(
      minutesWorkflow(makeContext({ services: { mattermost }, meetingContext: weeklySync }))
    );

    expect(events.some((event) => event.type === "task_complete")).toBe(false);
    expect(events.at(-1)).toEqual({
      type: "result",
      success: false,
      message: "Sending the minutes failed. Check that the participants are registered in Mattermost.",
    });
  });

  it("errors without a meeting context", async () => {
    const events = await collect(minutesWorkflow(makeContext()));

    expect(events.map((event) => event.type)).toEqual(["text", "text", "error"]);
    expect(events[2]).toEqual({
      type: "error",
      message: "Meeting context is missing.",
      details: "A meeting context is required.",
    });
  });

  it("errors without a minutes URL", async () => {
    const events = await collect(
      minutesWorkflow(makeContext({ meetingContext: { title: "Weekly sync", participantNames: ["A"] } }))
    );

    expect(events.at(-1)).toEqual({
      type: "error",
      message: "Minutes URL is missing.",
      details: "A minutes URL is required.",
    });
  });

  it("warns when there is nobody to send to", async () => {
    const mattermost = new RecordingMattermost();
    const events = await collect(
      minutesWorkflow(
        makeContext({
          services: { mattermost },
          meetingContext: { ...weeklySync, participantNames: [" , "] },
        })
      )
    );

    expect(events.at(-1)).toEqual({ type: "warning", message: "No meeting participants; nothing was sent." });
    expect(mattermost.sent).toEqual([]);
  });

  it("errors when Mattermost is not configured", async () => {
    const events = await collect(minutesWorkflow(makeContext({ meetingContext: weeklySync })));

    expect(events.at(-1)).toEqual({
      type: "error",
      message: "Mattermost is not configured.",
      details: "Set MATTERMOST_URL and MATTERMOST_BOT_TOKEN.",
    });
  });
});

describe("splitParticipants", () => {
  it("splits a single comma-separated entry", () => {
    expect(splitParticipants(["Kim, Lee ,Park"])).toEqual(["Kim", "Lee", "Park"]);
    expect(splitParticipants(["Kim", " Lee "])).toEqual(["Kim", "Lee"]);
    expect(splitParticipants(undefined)).toEqual([]);
  });
});
