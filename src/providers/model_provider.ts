export type JsonSchema = { readonly [key: string]: unknown };

export type StreamReplyInput = {
  promptText: string;
  signal?: AbortSignal;
};

export type CompleteJsonInput = {
  promptText: string;
  schemaName: string;
  schema: JsonSchema;
  signal?: AbortSignal;
};

/**
 * What the workflows need from a language model: streamed free text and a
 * strict JSON completion. Implementations throw on failure; the stream
 * pipeline turns that into an `error` envelope.
 */
export interface ModelProvider {
  readonly name: string;
  streamReply(input: StreamReplyInput): AsyncIterable<string>;
  completeJson(input: CompleteJsonInput): Promise<string>;
}
