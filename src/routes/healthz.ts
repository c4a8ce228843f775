import type { FastifyInstance } from "fastify";

export const SERVICE_NAME = "rag-chat-server";

export async function healthRoutes(app: FastifyInstance, opts: { apiPrefix?: string } = {}) {
  const apiPrefix = opts.apiPrefix ?? "/api/v1";

  app.get("/", async () => ({
    message: `Welcome to ${SERVICE_NAME}. Stream chat at POST ${apiPrefix}/chat/rag/stream.`,
  }));

  app.get("/healthz", async () => ({
    ok: true,
    service: SERVICE_NAME,
    ts: new Date().toISOString(),
  }));
}
