import { classifyByKeywords, INTENT_SCHEMA_NAME } from "../control-plane/intent";
import { CHART_SCHEMA_NAME } from "../contracts/visualization";
import type { CompleteJsonInput, ModelProvider, StreamReplyInput } from "./model_provider";

export class FakeModelError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FakeModelError";
  }
}

export type FakeModelOptions = {
  // Full replies, used in turn; without them the reply echoes the query size.
  replies?: string[];
  chunkSize?: number;
  // Throw after this many chunks of a streamed reply (0 fails before the first).
  failAfterChunks?: number;
  failWith?: string;
  // Canned JSON per schema name.
  json?: Record<string, string>;
  jsonError?: string;
};

export function lastQueryLine(promptText: string): string {
  const lines = promptText
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);

  for (let i = lines.length - 1; i >= 0; i--) {
    const l = lines[i] ?? "";
    if (l.toLowerCase().startsWith("query:")) return l.slice(6).trim();
    if (l.toLowerCase().startsWith("user:")) return l.slice(5).trim();
  }

  return lines.at(-1) ?? "";
}

const DEFAULT_CHART = {
  chart_type: "bar",
  title: "Action items per team",
  labels: ["Design", "Backend", "QA"],
  series: [{ name: "Action items", values: [3, 5, 2] }],
  explanation: "Backend owns the most follow-ups from the meeting.",
};

/** Deterministic provider for local runs and tests. Records every prompt it sees. */
export class FakeModelProvider implements ModelProvider {
  readonly name = "fake";
  readonly prompts: string[] = [];
  private replyIndex = 0;

  constructor(private readonly options: FakeModelOptions = {}) {}

  private nextReply(promptText: string): string {
    const replies = this.options.replies;
    if (replies && replies.length > 0) {
      const reply = replies[this.replyIndex % replies.length] ?? "";
      this.replyIndex += 1;
      return reply;
    }
    const query = lastQueryLine(promptText);
    return `<think>The user asked ${query.length} chars.</think>Stub answer: I received ${query.length} chars.`;
  }

  async *streamReply(input: StreamReplyInput): AsyncGenerator<string> {
    this.prompts.push(input.promptText);
    const reply = this.nextReply(input.promptText);
    const size = Math.max(1, this.options.chunkSize ?? 16);

    let sent = 0;
    for (let i = 0; i < reply.length; i += size) {
      if (this.options.failAfterChunks !== undefined && sent >= this.options.failAfterChunks) {
        throw new FakeModelError(this.options.failWith ?? "fake model failure");
      }
      yield reply.slice(i, i + size);
      sent += 1;
    }
  }

  async completeJson(input: CompleteJsonInput): Promise<string> {
    this.prompts.push(input.promptText);
    if (this.options.jsonError) {
      throw new FakeModelError(this.options.jsonError);
    }

    const canned = this.options.json?.[input.schemaName];
    if (canned !== undefined) return canned;

    if (input.schemaName === INTENT_SCHEMA_NAME) {
      const guess = classifyByKeywords(lastQueryLine(input.promptText));
      return JSON.stringify({
        intent: guess.intent,
        entities: Object.entries(guess.entities).map(([name, value]) => ({ name, value })),
      });
    }
    if (input.schemaName === CHART_SCHEMA_NAME) {
      return JSON.stringify(DEFAULT_CHART);
    }
    throw new FakeModelError(`No canned JSON for schema ${input.schemaName}`);
  }
}
