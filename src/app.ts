import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";

import { closeAppContext, type AppContext } from "./context";
import { chatRoutes } from "./routes/chat";
import { healthRoutes } from "./routes/healthz";

export function buildApp(context: AppContext): FastifyInstance {
  const app = Fastify({ logger: context.log });

  app.register(cors, {
    origin: context.config.corsOrigins,
    exposedHeaders: ["X-Session-Id"],
    // bare OPTIONS probes get the same 204 as browser preflights
    strictPreflight: false,
  });

  app.setErrorHandler((err, req, reply) => {
    const statusCode = err.statusCode ?? 500;
    if (statusCode < 500) {
      req.log.info({ err }, "http.client_error");
      return reply.code(statusCode).send({ error: err.code ?? "bad_request", message: err.message });
    }
    req.log.error({ err }, "http.unhandled_error");
    return reply.code(500).send({ error: "internal_error" });
  });

  app.register(healthRoutes, { apiPrefix: context.config.apiPrefix });
  app.register(chatRoutes, { prefix: context.config.apiPrefix, context });

  app.addHook("onClose", async () => {
    await closeAppContext(context);
  });

  return app;
}
