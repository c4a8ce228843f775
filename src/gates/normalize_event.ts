import type { BaseLogger } from "pino";

import { INTENTS, type Intent } from "../contracts/chat";
import { buildEnvelope, contentEnvelope, type Envelope } from "../contracts/envelope";
import {
  RetrievedDocumentLike,
  toDocumentPayload,
  type RetrievedDocument,
} from "../contracts/retrieval";
import type { UpstreamEvent, UpstreamEventType } from "../contracts/upstream_event";
import { ChartSpec } from "../contracts/visualization";

export type NormalizeContext = {
  sessionId: string;
  log: BaseLogger;
};

export class MalformedUpstreamEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedUpstreamEventError";
  }
}

export const MALFORMED_EVENT_MESSAGE = "Skipped a malformed upstream event";

type Loose = Record<string, unknown>;

// Loose type names seen on the wire, mapped onto the UpstreamEvent union.
const TYPE_ALIASES: Record<string, UpstreamEventType> = {
  start: "start",
  text: "text",
  content: "text",
  token: "text",
  delta: "text",
  message: "text",
  thinking: "thinking",
  reasoning: "thinking",
  info: "thinking",
  reasoning_step: "reasoning_step",
  llm_reasoning_step: "reasoning_step",
  retrieved_document: "retrieved_document",
  retrieved_documents: "retrieved_documents",
  intent_classified: "intent_classified",
  task_complete: "task_complete",
  result: "result",
  visualization: "visualization",
  warning: "warning",
  error: "error",
  end: "end",
  done: "end",
  complete: "end",
  ping: "ping",
  heartbeat: "ping",
  keepalive: "ping",
  keep_alive: "ping",
};

const META_KEYS = new Set(["type", "kind", "data", "timestamp", "ts", "created_at", "createdAt"]);

const isRecord = (value: unknown): value is Loose =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isIntent = (value: string): value is Intent =>
  INTENTS.some((intent) => intent === value);

function withoutMeta(record: Loose): Loose {
  const out: Loose = {};
  for (const [key, value] of Object.entries(record)) {
    if (!META_KEYS.has(key)) out[key] = value;
  }
  return out;
}

function readString(fields: Loose, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = fields[key];
    if (typeof value === "string") return value;
  }
  return undefined;
}

function readRecord(fields: Loose, ...keys: string[]): Loose | undefined {
  for (const key of keys) {
    const value = fields[key];
    if (isRecord(value)) return value;
  }
  return undefined;
}

function requireString(fields: Loose, type: string, ...keys: string[]): string {
  const value = readString(fields, ...keys);
  if (value === undefined) {
    throw new MalformedUpstreamEventError(`${type} event is missing ${keys[0]}`);
  }
  return value;
}

function parseDocument(raw: unknown): RetrievedDocument {
  const parsed = RetrievedDocumentLike.safeParse(raw);
  if (!parsed.success) {
    const reason = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new MalformedUpstreamEventError(`invalid retrieved document: ${reason}`);
  }
  return parsed.data;
}

function readEntities(value: unknown): Record<string, string> {
  const entities: Record<string, string> = {};
  if (Array.isArray(value)) {
    for (const entry of value) {
      if (isRecord(entry) && typeof entry.name === "string" && entry.value !== undefined) {
        entities[entry.name] = String(entry.value);
      }
    }
  } else if (isRecord(value)) {
    for (const [key, entry] of Object.entries(value)) {
      if (entry !== undefined && entry !== null) entities[key] = String(entry);
    }
  }
  return entities;
}

/**
 * Lift one record keyed by `type` (or `kind`) into the union.
 * Fields are read from the record merged with its nested `data` record.
 */
function liftRecord(record: Loose): UpstreamEvent {
  const rawType = readString(record, "type", "kind");
  if (rawType === undefined) {
    return { type: "other", rawType: "(untyped)", raw: record };
  }

  const type = TYPE_ALIASES[rawType.trim().toLowerCase()];
  if (type === undefined) {
    return { type: "other", rawType, raw: record };
  }

  const nested = isRecord(record.data) ? withoutMeta(record.data) : {};
  const fields: Loose = { ...withoutMeta(record), ...nested };
  // Bare string payloads: { type: "token", data: "Hel" }
  const dataText = typeof record.data === "string" ? record.data : undefined;

  switch (type) {
    case "start":
      return { type };
    case "ping":
      return { type };
    case "text": {
      const text = readString(fields, "text", "content", "delta", "token", "message") ?? dataText;
      if (text === undefined) {
        throw new MalformedUpstreamEventError(`${rawType} event carries no text`);
      }
      return { type, text };
    }
    case "thinking": {
      const text = readString(fields, "text", "content", "thinking") ?? dataText;
      const stepDescription = readString(fields, "stepDescription", "step_description", "message");
      const details = readRecord(fields, "details");
      if (text === undefined && stepDescription === undefined) {
        throw new MalformedUpstreamEventError(`${rawType} event carries neither text nor a step`);
      }
      return {
        type,
        ...(text !== undefined ? { text } : {}),
        ...(stepDescription !== undefined ? { stepDescription } : {}),
        ...(details ? { details } : {}),
      };
    }
    case "reasoning_step": {
      const stepDescription = requireString(
        fields,
        rawType,
        "stepDescription",
        "step_description",
        "step",
        "description"
      );
      const details = readRecord(fields, "details");
      return { type, stepDescription, ...(details ? { details } : {}) };
    }
    case "retrieved_document":
      return { type, document: parseDocument(fields.document ?? fields) };
    case "retrieved_documents": {
      const documents = fields.documents;
      if (!Array.isArray(documents)) {
        throw new MalformedUpstreamEventError(`${rawType} event carries no documents array`);
      }
      return { type, documents: documents.map(parseDocument) };
    }
    case "intent_classified": {
      const intent = readString(fields, "intent") ?? "unknown";
      return {
        type,
        intent: isIntent(intent) ? intent : "unknown",
        entities: readEntities(fields.entities),
        description: readString(fields, "description") ?? "",
      };
    }
    case "task_complete": {
      const task = requireString(fields, rawType, "task");
      const explicit = readRecord(fields, "details");
      const rest: Loose = {};
      for (const [key, value] of Object.entries(fields)) {
        if (key !== "task" && key !== "details") rest[key] = value;
      }
      const details = explicit ?? rest;
      return { type, task, ...(Object.keys(details).length > 0 ? { details } : {}) };
    }
    case "result": {
      if (typeof fields.success !== "boolean") {
        throw new MalformedUpstreamEventError(`${rawType} event is missing success`);
      }
      const message = requireString(fields, rawType, "message");
      const partial = typeof fields.partial === "boolean" ? fields.partial : undefined;
      return {
        type,
        success: fields.success,
        message,
        ...(partial !== undefined ? { partial } : {}),
      };
    }
    case "visualization": {
      const parsed = ChartSpec.safeParse(fields.chart);
      if (!parsed.success) {
        throw new MalformedUpstreamEventError(`${rawType} event carries an invalid chart`);
      }
      return { type, chart: parsed.data };
    }
    case "warning": {
      const message = readString(fields, "message", "warning_message", "warning") ?? dataText;
      if (message === undefined) {
        throw new MalformedUpstreamEventError(`${rawType} event is missing message`);
      }
      const details = readRecord(fields, "details");
      return { type, message, ...(details ? { details } : {}) };
    }
    case "error": {
      const message =
        readString(fields, "message", "error_message", "error") ?? dataText ?? "Upstream error";
      const details = readString(fields, "details", "detail");
      return { type, message, ...(details !== undefined ? { details } : {}) };
    }
    case "end": {
      const message = readString(fields, "message") ?? dataText;
      return { type, ...(message !== undefined ? { message } : {}) };
    }
    case "other":
      return { type: "other", rawType, raw: record };
  }
}

/** Lift any raw upstream item into the UpstreamEvent union. */
export function liftUpstreamItem(item: unknown): UpstreamEvent {
  if (typeof item === "string") return { type: "text", text: item };
  if (item === null || item === undefined) {
    throw new MalformedUpstreamEventError(`received ${String(item)} instead of an event`);
  }
  if (isRecord(item)) return liftRecord(item);
  return { type: "other", rawType: typeof item, raw: item };
}

function stringifyUnknown(raw: unknown): string {
  if (typeof raw === "string") return raw;
  const json = JSON.stringify(raw);
  return json === undefined ? String(raw) : json;
}

/** Map one lifted event to its envelope; `ping` has none. */
export function toEnvelope(event: UpstreamEvent, ctx: NormalizeContext): Envelope | null {
  const sessionId = ctx.sessionId;

  switch (event.type) {
    case "ping":
      return null;
    case "start":
      return buildEnvelope({ kind: "start", sessionId, payload: { session_id: sessionId } });
    case "text":
      return contentEnvelope(sessionId, event.text);
    case "thinking": {
      if (event.stepDescription === undefined) {
        return buildEnvelope({ kind: "thinking", sessionId, text: event.text });
      }
      return buildEnvelope({
        kind: "thinking",
        sessionId,
        text: event.text,
        payload: {
          step_description: event.stepDescription,
          ...(event.details ? { details: event.details } : {}),
        },
      });
    }
    case "reasoning_step":
      return buildEnvelope({
        kind: "reasoning_step",
        sessionId,
        payload: {
          step_description: event.stepDescription,
          ...(event.details ? { details: event.details } : {}),
        },
      });
    case "retrieved_document":
      return buildEnvelope({
        kind: "retrieved_document",
        sessionId,
        payload: toDocumentPayload(event.document),
      });
    case "retrieved_documents":
      return buildEnvelope({
        kind: "retrieved_documents",
        sessionId,
        payload: { documents: event.documents.map(toDocumentPayload) },
      });
    case "intent_classified":
      return buildEnvelope({
        kind: "intent_classified",
        sessionId,
        payload: {
          intent: event.intent,
          entities: event.entities,
          description: event.description,
        },
      });
    case "task_complete":
      return buildEnvelope({
        kind: "task_complete",
        sessionId,
        payload: { ...event.details, task: event.task },
      });
    case "result":
      return buildEnvelope({
        kind: "result",
        sessionId,
        payload: {
          success: event.success,
          ...(event.partial !== undefined ? { partial: event.partial } : {}),
          message: event.message,
        },
      });
    case "visualization":
      return buildEnvelope({ kind: "visualization", sessionId, payload: { chart: event.chart } });
    case "warning":
      return buildEnvelope({
        kind: "warning",
        sessionId,
        payload: { ...event.details, message: event.message },
      });
    case "error":
      return buildEnvelope({
        kind: "error",
        sessionId,
        payload: {
          message: event.message,
          ...(event.details !== undefined ? { details: event.details } : {}),
        },
      });
    case "end":
      return buildEnvelope({
        kind: "end",
        sessionId,
        payload: event.message !== undefined ? { message: event.message } : {},
      });
    case "other": {
      const text = stringifyUnknown(event.raw);
      ctx.log.warn(
        { sessionId, rawType: event.rawType, size: text.length },
        "normalizer.unknown_event_type"
      );
      return contentEnvelope(sessionId, text);
    }
  }
}

/**
 * Normalize one raw upstream item into at most one envelope.
 * Never throws: a malformed item becomes a `warning` envelope.
 */
export function normalizeItem(item: unknown, ctx: NormalizeContext): Envelope | null {
  try {
    return toEnvelope(liftUpstreamItem(item), ctx);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    ctx.log.warn({ sessionId: ctx.sessionId, reason }, "normalizer.malformed_event");
    return buildEnvelope({
      kind: "warning",
      sessionId: ctx.sessionId,
      payload: { message: MALFORMED_EVENT_MESSAGE, reason },
    });
  }
}
