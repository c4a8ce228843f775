import { describe, it, expect } from "vitest";
import pino from "pino";

import { MALFORMED_EVENT_MESSAGE, normalizeItem } from "../src/gates/normalize_event";

const ctx = { sessionId: "s1", log: pino({ level: "silent" }) };

describe("normalizeItem", () => {
  it("turns bare strings into content", () => {
    expect(normalizeItem("hi", ctx)).toEqual({ kind: "content", sessionId: "s1", text: "hi" });
  });

  it("maps aliases and flattens nested data", () => {
    const envelope = normalizeItem(
      {
        type: "llm_reasoning_step",
        data: { type: "llm_reasoning_step", step_description: "Searching", timestamp: "2024-01-01T00:00:00Z" },
      },
      ctx
    );
    expect(envelope).toEqual({
      kind: "reasoning_step",
      sessionId: "s1",
      payload: { step_description: "Searching" },
    });

    expect(normalizeItem({ kind: "token", delta: "He" }, ctx)).toEqual({
      kind: "content",
      sessionId: "s1",
      text: "He",
    });
    expect(normalizeItem({ type: "done" }, ctx)).toEqual({ kind: "end", sessionId: "s1", payload: {} });
  });

  it("drops keepalives", () => {
    expect(normalizeItem({ type: "ping" }, ctx)).toBeNull();
    expect(normalizeItem({ type: "heartbeat", ts: 1 }, ctx)).toBeNull();
  });

  it("stringifies unknown types into content", () => {
    expect(normalizeItem({ type: "mystery", value: 1 }, ctx)).toEqual({
      kind: "content",
      sessionId: "s1",
      text: '{"type":"mystery","value":1}',
    });
    expect(normalizeItem(42, ctx)).toEqual({ kind: "content", sessionId: "s1", text: "42" });
  });

  it("reads snake_case documents", () => {
    const envelope = normalizeItem(
      {
        type: "retrieved_document",
        data: { source_document_id: "doc-1", page_content: "chunk", score: 0.9 },
      },
      ctx
    );
    expect(envelope?.payload).toEqual({
      document_id: "doc-1",
      content_chunk: "chunk",
      score: 0.9,
      metadata: {},
    });
  });

  it("reads typed events", () => {
    expect(
      normalizeItem(
        { type: "intent_classified", intent: "visualize", entities: { chart: "bar" }, description: "d" },
        ctx
      )?.payload
    ).toEqual({ intent: "visualize", entities: { chart: "bar" }, description: "d" });

    expect(normalizeItem({ type: "task_complete", task: "t", success_count: 2 }, ctx)?.payload).toEqual({
      task: "t",
      success_count: 2,
    });

    expect(normalizeItem({ type: "error", error_message: "boom" }, ctx)).toEqual({
      kind: "error",
      sessionId: "s1",
      payload: { message: "boom" },
    });
  });

  it("turns malformed items into warnings", () => {
    expect(normalizeItem(null, ctx)).toEqual({
      kind: "warning",
      sessionId: "s1",
      payload: { message: MALFORMED_EVENT_MESSAGE, reason: "received null instead of an event" },
    });

    expect(normalizeItem({ type: "retrieved_document", data: { score: 0.5 } }, ctx)?.payload).toEqual({
      message: MALFORMED_EVENT_MESSAGE,
      reason: "invalid retrieved document: document requires an id and a content chunk",
    });

    expect(normalizeItem({ type: "result", message: "x" }, ctx)?.kind).toBe("warning");
  });
});
