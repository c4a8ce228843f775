import { describe, it, expect } from "vitest";

import { FakeModelError, FakeModelProvider, lastQueryLine } from "../src/providers/fake_model";
import { INTENT_JSON_SCHEMA, INTENT_SCHEMA_NAME } from "../src/control-plane/intent";

async function collect(stream: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const chunk of stream) out.push(chunk);
  return out;
}

describe("lastQueryLine", () => {
  it("finds the last query line", () => {
    expect(lastQueryLine("## Instructions\nbe brief\n\n## Question\nQuery: hello there\n")).toBe(
      "hello there"
    );
    expect(lastQueryLine("user: hi\nassistant: hey")).toBe("hi");
    expect(lastQueryLine("just text")).toBe("just text");
  });
});

describe("FakeModelProvider", () => {
  it("streams a deterministic default reply", async () => {
    const model = new FakeModelProvider();
    const chunks = await collect(model.streamReply({ promptText: "## Question\nQuery: hello" }));

    expect(chunks.join("")).toBe(
      "<think>The user asked 5 chars.</think>Stub answer: I received 5 chars."
    );
    expect(chunks[0]).toBe("<think>The user ");
    expect(model.prompts).toEqual(["## Question\nQuery: hello"]);
  });

  it("cycles through scripted replies", async () => {
    const model = new FakeModelProvider({ replies: ["one", "two"], chunkSize: 10 });

    expect(await collect(model.streamReply({ promptText: "a" }))).toEqual(["one"]);
    expect(await collect(model.streamReply({ promptText: "b" }))).toEqual(["two"]);
    expect(await collect(model.streamReply({ promptText: "c" }))).toEqual(["one"]);
  });

  it("fails after the configured number of chunks", async () => {
    const model = new FakeModelProvider({
      replies: ["abcdef"],
      chunkSize: 2,
      failAfterChunks: 2,
      failWith: "boom",
    });

    const seen: string[] = [];
    const run = async () => {
      for await (const chunk of model.streamReply({ promptText: "x" })) seen.push(chunk);
    };
    await expect(run()).rejects.toThrow(FakeModelError);
    expect(seen).toEqual(["ab", "cd"]);
  });

  it("answers intent JSON from keywords", async () => {
    const model = new FakeModelProvider();
    const raw = await model.completeJson({
      promptText: "Classify.\nQuery: 차트로 보여줘",
      schemaName: INTENT_SCHEMA_NAME,
      schema: INTENT_JSON_SCHEMA,
    });

    expect(JSON.parse(raw)).toEqual({ intent: "visualize", entities: [] });
  });

  it("prefers canned JSON and reports unknown schemas", async () => {
    const model = new FakeModelProvider({ json: { custom: '{"ok":true}' } });

    await expect(model.completeJson({ promptText: "x", schemaName: "custom", schema: {} })).resolves.toBe(
      '{"ok":true}'
    );
    await expect(model.completeJson({ promptText: "x", schemaName: "other", schema: {} })).rejects.toThrow(
      "No canned JSON for schema other"
    );
  });
});
