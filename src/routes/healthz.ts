import type { FastifyInstance } from "fastify";

export async function healthRoutes(app: FastifyInstance) {
  app.get("/healthz", async () => ({ ok: true, service: "rank-trace-report", ts: new Date().toISOString() }));
}
