export const ENVELOPE_KINDS = [
  "start",
  "content",
  "reasoning_step",
  "retrieved_document",
  "retrieved_documents",
  "thinking",
  "intent_classified",
  "task_complete",
  "result",
  "warning",
  "error",
  "end",
  "visualization",
] as const;

export type EnvelopeKind = (typeof ENVELOPE_KINDS)[number];

export type Envelope = {
  kind: EnvelopeKind;
  sessionId: string;
  text?: string;
  payload?: Record<string, unknown>;
};

export const buildEnvelope = (args: {
  kind: EnvelopeKind;
  sessionId: string;
  text?: string;
  payload?: Record<string, unknown>;
}): Envelope => ({
  kind: args.kind,
  sessionId: args.sessionId,
  ...(args.text !== undefined ? { text: args.text } : {}),
  ...(args.payload ? { payload: args.payload } : {}),
});

export const contentEnvelope = (sessionId: string, text: string): Envelope =>
  buildEnvelope({ kind: "content", sessionId, text });

export const DEFAULT_END_MESSAGE = "Stream complete";

export const endEnvelope = (sessionId: string, message = DEFAULT_END_MESSAGE): Envelope =>
  buildEnvelope({ kind: "end", sessionId, payload: { message, is_final: true } });

export const readStepDescription = (envelope: Envelope): string | undefined => {
  const value = envelope.payload?.step_description;
  return typeof value === "string" ? value : undefined;
};
