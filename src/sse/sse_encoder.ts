import { inspect } from "node:util";

import type { BaseLogger } from "pino";

import type { Envelope } from "../contracts/envelope";

export type SSEWireEvent = {
  type: Envelope["kind"];
  session_id: string;
  data: Record<string, unknown>;
  content?: string;
};

const frame = (event: SSEWireEvent): string => `data: ${JSON.stringify(event)}\n\n`;

/**
 * One envelope → one `data: <json>\n\n` frame.
 * Never throws: a payload that cannot be serialized is sent as `{ raw }`.
 */
export function encodeSSE(envelope: Envelope, log?: BaseLogger): string {
  const event: SSEWireEvent = {
    type: envelope.kind,
    session_id: envelope.sessionId,
    data: envelope.payload ?? {},
    ...(envelope.text !== undefined ? { content: envelope.text } : {}),
  };

  try {
    return frame(event);
  } catch (err) {
    log?.warn(
      { sessionId: envelope.sessionId, kind: envelope.kind, err },
      "sse.payload_unserializable"
    );
    return frame({ ...event, data: { raw: inspect(envelope.payload, { depth: 4 }) } });
  }
}
