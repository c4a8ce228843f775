import { Readable } from "node:stream";

import type { FastifyInstance } from "fastify";
import { z } from "zod";

import { ChatRequest } from "../contracts/chat";
import type { Envelope } from "../contracts/envelope";
import { openChatStream } from "../control-plane/chat_stream";
import type { AppContext } from "../context";
import { MAX_DOCUMENTS } from "../context";
import { encodeSSE } from "../sse/sse_encoder";

const SessionParams = z.object({ sessionId: z.string().trim().min(1) });
const HistoryQuery = z.object({ limit: z.coerce.number().int().min(1).max(200).optional() });

export async function chatRoutes(app: FastifyInstance, opts: { context: AppContext }) {
  const { context } = opts;
  const deps = {
    conversations: context.conversations,
    meetingContexts: context.meetingContexts,
    services: {
      model: context.model,
      retrieval: context.retrieval,
      mattermost: context.mattermost,
      settings: {
        topK: context.config.retrieval.topK,
        minScore: context.config.retrieval.minScore,
        maxDocuments: MAX_DOCUMENTS,
        mattermostUserMap: context.config.mattermost.userMap,
      },
    },
    policy: context.policy,
    historyWindow: context.config.historyWindow,
  };

  app.post("/chat/rag/stream", async (req, reply) => {
    const parsed = ChatRequest.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: parsed.error.flatten(),
      });
    }

    // Aborted when the client goes away before the stream finished.
    const abort = new AbortController();
    reply.raw.on("close", () => {
      if (!reply.raw.writableFinished) abort.abort();
    });

    const baseLog = req.log.child({ plane: "chat" });
    const { sessionId, envelopes } = await openChatStream({
      request: parsed.data,
      deps,
      log: baseLog,
      signal: abort.signal,
    });
    const log = baseLog.child({ sessionId });

    async function* frames(stream: AsyncIterable<Envelope>) {
      for await (const envelope of stream) {
        yield encodeSSE(envelope, log);
      }
    }

    return reply
      .code(200)
      .headers({
        "content-type": "text/event-stream; charset=utf-8",
        "cache-control": "no-store",
        connection: "keep-alive",
        "x-accel-buffering": "no",
        "x-session-id": sessionId,
      })
      .send(Readable.from(frames(envelopes)));
  });

  app.get("/chat/sessions/:sessionId/history", async (req, reply) => {
    const params = SessionParams.safeParse(req.params);
    const query = HistoryQuery.safeParse(req.query);
    if (!params.success || !query.success) {
      return reply.code(400).send({
        error: "invalid_request",
        details: params.success ? query.error?.flatten() : params.error.flatten(),
      });
    }

    const limit = query.data.limit ?? context.config.historyWindow;
    const entries = await context.conversations.recent(params.data.sessionId, limit);
    return {
      session_id: params.data.sessionId,
      entries,
      meeting_context: context.meetingContexts.get(params.data.sessionId) ?? null,
    };
  });

  app.delete("/chat/sessions/:sessionId/history", async (req, reply) => {
    const params = SessionParams.safeParse(req.params);
    if (!params.success) {
      return reply.code(400).send({ error: "invalid_request", details: params.error.flatten() });
    }

    await context.conversations.clear(params.data.sessionId);
    context.meetingContexts.remove(params.data.sessionId);
    req.log.info({ plane: "chat", sessionId: params.data.sessionId }, "chat.history_cleared");
    return { ok: true, session_id: params.data.sessionId };
  });
}
