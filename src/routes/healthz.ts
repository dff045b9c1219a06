import type { FastifyInstance } from "fastify";

export async function healthRoutes(app: FastifyInstance) {
  app.get("/healthz", async () => ({
    ok: true,
    service: "annotation-experiments-api",
    ts: new Date().toISOString(),
  }));
}
