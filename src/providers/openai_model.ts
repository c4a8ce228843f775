import { createParser, type ParseEvent } from "eventsource-parser";
import type { BaseLogger } from "pino";
import { z } from "zod";

import type {
  CompleteJsonInput,
  ModelProvider,
  StreamReplyInput,
} from "./model_provider";

export class OpenAIProviderError extends Error {
  statusCode: number;
  retryable: boolean;
  errorType?: string;
  errorCode?: string;
  retryAfterMs?: number;

  constructor(
    message: string,
    args: {
      statusCode?: number;
      retryable?: boolean;
      errorType?: string;
      errorCode?: string;
      retryAfterMs?: number;
    } = {}
  ) {
    super(message);
    this.name = "OpenAIProviderError";
    this.statusCode = args.statusCode ?? 502;
    this.retryable = args.retryable ?? true;
    this.errorType = args.errorType;
    this.errorCode = args.errorCode;
    this.retryAfterMs = args.retryAfterMs;
  }
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/** Strict mode wants `additionalProperties: false` on every object. */
export const sanitizeJsonSchema = (schema: unknown): unknown => {
  if (Array.isArray(schema)) return schema.map(sanitizeJsonSchema);
  if (!isRecord(schema)) return schema;

  const copy: Record<string, unknown> = { ...schema };

  if (copy.type === "object") {
    if (copy.additionalProperties === undefined) {
      copy.additionalProperties = false;
    }
    if (isRecord(copy.properties)) {
      const nextProps: Record<string, unknown> = {};
      for (const [key, value] of Object.entries(copy.properties)) {
        nextProps[key] = sanitizeJsonSchema(value);
      }
      copy.properties = nextProps;
    }
  }

  if (copy.items) {
    copy.items = sanitizeJsonSchema(copy.items);
  }
  for (const key of ["anyOf", "oneOf", "allOf"]) {
    const branches = copy[key];
    if (Array.isArray(branches)) {
      copy[key] = branches.map(sanitizeJsonSchema);
    }
  }

  return copy;
};

const ErrorBody = z.object({
  error: z
    .object({
      type: z.string().nullish(),
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .nullish(),
});

const ResponseBody = z.object({
  output: z
    .array(
      z.object({
        content: z.array(z.object({ text: z.string().optional() }).passthrough()).optional(),
      }).passthrough()
    )
    .optional(),
  output_text: z.string().optional(),
});

const StreamEvent = z
  .object({
    type: z.string(),
    delta: z.string().optional(),
    message: z.string().optional(),
    code: z.string().nullish(),
    response: z
      .object({
        error: z.object({ message: z.string().optional(), code: z.string().nullish() }).nullish(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

export function parseRetryAfter(header: string | null, now = Date.now()): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (!Number.isNaN(seconds)) {
    return Math.max(0, Math.floor(seconds * 1000));
  }
  const retryDate = Date.parse(header);
  if (!Number.isNaN(retryDate)) {
    return Math.max(0, retryDate - now);
  }
  return undefined;
}

export type OpenAIModelOptions = {
  apiKey?: string;
  model: string;
  baseUrl?: string;
  maxOutputTokens?: number;
  temperature?: number;
  fetchImpl?: typeof fetch;
  log?: BaseLogger;
};

/** OpenAI Responses API: streamed text for answers, strict JSON for extraction. */
export class OpenAIModelProvider implements ModelProvider {
  readonly name = "openai";
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OpenAIModelOptions) {
    this.baseUrl = options.baseUrl ?? "https://api.openai.com/v1";
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  get model(): string {
    return this.options.model;
  }

  private requireKey(): string {
    const apiKey = this.options.apiKey;
    if (!apiKey) {
      throw new OpenAIProviderError("OPENAI_API_KEY missing", {
        statusCode: 500,
        retryable: false,
      });
    }
    return apiKey;
  }

  private async post(body: Record<string, unknown>, signal?: AbortSignal): Promise<Response> {
    const apiKey = this.requireKey();
    const payload: Record<string, unknown> = { model: this.options.model, store: false, ...body };
    if (typeof this.options.maxOutputTokens === "number") {
      payload.max_output_tokens = this.options.maxOutputTokens;
    }
    if (typeof this.options.temperature === "number") {
      payload.temperature = this.options.temperature;
    }

    return this.fetchImpl(`${this.baseUrl}/responses`, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        authorization: `Bearer ${apiKey}`,
        ...(body.stream ? { accept: "text/event-stream" } : {}),
      },
      body: JSON.stringify(payload),
      signal,
    });
  }

  private async toProviderError(res: Response, logMessage: string): Promise<OpenAIProviderError> {
    const text = await res.text();
    let json: unknown = null;
    try {
      json = JSON.parse(text);
    } catch {
      json = null;
    }
    const parsed = ErrorBody.safeParse(json);
    const error = parsed.success ? parsed.data.error : undefined;
    const errorType = error?.type ?? undefined;
    const errorCode = error?.code ?? undefined;
    const requestId = res.headers.get("x-request-id") ?? undefined;
    const bodySnippet = (error?.message ?? text).slice(0, 500);
    const isInvalidSchema =
      errorType === "invalid_request_error" && errorCode === "invalid_json_schema";
    const statusCode = res.status;

    this.options.log?.error(
      { statusCode, requestId, bodySnippet, errorType, errorCode },
      logMessage
    );
    return new OpenAIProviderError(`OpenAI error ${statusCode}: ${bodySnippet}`, {
      statusCode,
      retryable: errorType !== "invalid_request_error",
      errorType,
      errorCode,
      retryAfterMs: isInvalidSchema ? undefined : parseRetryAfter(res.headers.get("retry-after")),
    });
  }

  async *streamReply(input: StreamReplyInput): AsyncGenerator<string> {
    const res = await this.post({ stream: true, input: input.promptText }, input.signal);
    if (!res.ok) {
      throw await this.toProviderError(res, "openai.stream_failed");
    }
    if (!res.body) {
      throw new OpenAIProviderError("OpenAI stream missing body", { statusCode: 502 });
    }

    const log = this.options.log;
    const pending: string[] = [];
    const state: { failure?: OpenAIProviderError; completed: boolean } = { completed: false };

    const parser = createParser((event: ParseEvent) => {
      if (event.type !== "event") return;
      const data = event.data.trim();
      if (!data || data === "[DONE]") return;

      let json: unknown;
      try {
        json = JSON.parse(data);
      } catch (err) {
        log?.warn({ err, size: data.length }, "openai.stream_event_unparseable");
        return;
      }
      const parsed = StreamEvent.safeParse(json);
      if (!parsed.success) return;
      const streamEvent = parsed.data;

      switch (streamEvent.type) {
        case "response.output_text.delta":
          if (streamEvent.delta) pending.push(streamEvent.delta);
          break;
        case "response.completed":
        case "response.incomplete":
          state.completed = true;
          break;
        case "response.failed":
          state.failure = new OpenAIProviderError(
            streamEvent.response?.error?.message ?? "OpenAI response failed",
            { errorCode: streamEvent.response?.error?.code ?? undefined }
          );
          break;
        case "error":
          state.failure = new OpenAIProviderError(streamEvent.message ?? "OpenAI stream error", {
            errorCode: streamEvent.code ?? undefined,
          });
          break;
        default:
          break;
      }
    });

    const reader = res.body.getReader();
    const decoder = new TextDecoder();
    let chunkCount = 0;
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        parser.feed(decoder.decode(value, { stream: true }));

        for (const delta of pending.splice(0)) {
          chunkCount += 1;
          yield delta;
        }
        if (state.failure) throw state.failure;
        if (state.completed) break;
      }
      if (state.failure) throw state.failure;
    } finally {
      log?.debug({ chunkCount, completed: state.completed }, "openai.stream_closed");
      try {
        await reader.cancel();
      } catch (err) {
        log?.debug({ err }, "openai.stream_cancel_failed");
      }
    }
  }

  async completeJson(input: CompleteJsonInput): Promise<string> {
    const res = await this.post(
      {
        stream: false,
        input: input.promptText,
        text: {
          format: {
            type: "json_schema",
            name: input.schemaName,
            strict: true,
            schema: sanitizeJsonSchema(input.schema),
          },
        },
      },
      input.signal
    );

    if (!res.ok) {
      throw await this.toProviderError(res, "openai.json_schema_failed");
    }

    const parsed = ResponseBody.safeParse(await res.json());
    let content: string | undefined;
    if (parsed.success) {
      for (const item of parsed.data.output ?? []) {
        content = item.content?.find((part) => typeof part.text === "string")?.text;
        if (content) break;
      }
      if (!content) content = parsed.data.output_text;
    }

    if (!content) {
      throw new OpenAIProviderError("OpenAI response missing content", {
        statusCode: 502,
        retryable: true,
      });
    }
    return content;
  }
}
