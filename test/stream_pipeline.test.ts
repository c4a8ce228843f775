import { describe, it, expect } from "vitest";
import pino from "pino";

import type { Envelope } from "../src/contracts/envelope";
import type { UpstreamItem } from "../src/contracts/upstream_event";
import { runStreamPipeline, type StreamSettled } from "../src/gates/stream_pipeline";
import { DEFAULT_STREAM_POLICY } from "../src/gates/stream_policy";

const log = pino({ level: "silent" });

async function drain(
  source: AsyncIterable<UpstreamItem>
): Promise<{ out: Envelope[]; settled: StreamSettled[] }> {
  const settled: StreamSettled[] = [];
  const out: Envelope[] = [];
  const stream = runStreamPipeline({
    sessionId: "s1",
    source,
    policy: DEFAULT_STREAM_POLICY,
    log,
    onSettled: (s) => {
      settled.push(s);
    },
  });
  for await (const envelope of stream) out.push(envelope);
  return { out, settled };
}

describe("runStreamPipeline", () => {
  it("normalizes, filters and stops pulling after end", async () => {
    let pulledAfterEnd = false;
    async function* source(): AsyncGenerator<UpstreamItem> {
      yield "Hello";
      yield { type: "reasoning_step", stepDescription: "LLM raw response for intent/entity" };
      yield "<think>plan</think>";
      yield { type: "text", text: "world" };
      yield { type: "end" };
      pulledAfterEnd = true;
      yield "ignored";
    }

    const { out, settled } = await drain(source());

    expect(out.map((e) => e.kind)).toEqual(["content", "reasoning_step", "content", "end"]);
    expect(out[1]?.text).toBe("plan");
    expect(pulledAfterEnd).toBe(false);
    expect(settled).toEqual([{ outcome: "completed", answerText: "Helloworld", envelopeCount: 4 }]);
  });

  it("keeps paragraph breaks and spaces that arrive as their own deltas", async () => {
    async function* source(): AsyncGenerator<UpstreamItem> {
      yield "First paragraph.";
      yield "\n\n";
      yield "Second";
      yield " ";
      yield "paragraph.";
    }

    const { out, settled } = await drain(source());

    const texts = out.filter((e) => e.kind === "content").map((e) => e.text);
    expect(texts).toEqual(["First paragraph.", "\n\nSecond", " paragraph."]);
    expect(texts.join("")).toBe("First paragraph.\n\nSecond paragraph.");
    expect(settled).toEqual([
      { outcome: "completed", answerText: "First paragraph.\n\nSecond paragraph.", envelopeCount: 4 },
    ]);
  });

  it("closes with error and end when the source throws", async () => {
    async function* source(): AsyncGenerator<UpstreamItem> {
      yield "a";
      yield "b";
      throw new Error("upstream broke");
    }

    const { out, settled } = await drain(source());

    expect(out).toEqual([
      { kind: "content", sessionId: "s1", text: "a" },
      { kind: "content", sessionId: "s1", text: "b" },
      { kind: "error", sessionId: "s1", payload: { message: "upstream broke", is_final: true } },
      { kind: "end", sessionId: "s1", payload: { message: "Stream complete", is_final: true } },
    ]);
    expect(settled[0]?.outcome).toBe("failed");
  });

  it("synthesizes end and the fallback for an empty source", async () => {
    async function* source(): AsyncGenerator<UpstreamItem> {
      yield { type: "ping" };
    }

    const { out, settled } = await drain(source());

    expect(out).toEqual([
      { kind: "content", sessionId: "s1", text: "No response could be generated. Please try again." },
      { kind: "end", sessionId: "s1", payload: { message: "Stream complete", is_final: true } },
    ]);
    expect(settled[0]?.answerText).toBe("");
  });

  it("returns the source when the consumer stops early", async () => {
    let sourceClosed = false;
    async function* source(): AsyncGenerator<UpstreamItem> {
      try {
        for (let i = 0; ; i++) yield `chunk ${i}`;
      } finally {
        sourceClosed = true;
      }
    }

    const settled: StreamSettled[] = [];
    const stream = runStreamPipeline({
      sessionId: "s1",
      source: source(),
      policy: DEFAULT_STREAM_POLICY,
      log,
      onSettled: (s) => {
        settled.push(s);
      },
    });

    const seen: Envelope[] = [];
    for await (const envelope of stream) {
      seen.push(envelope);
      if (seen.length === 2) break;
    }

    expect(seen.map((e) => e.text)).toEqual(["chunk 0", "chunk 1"]);
    expect(sourceClosed).toBe(true);
    expect(settled).toEqual([{ outcome: "cancelled", answerText: "chunk 0chunk 1", envelopeCount: 2 }]);
  });
});
