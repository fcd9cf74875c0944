import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import type { ReviewScheduler } from "../scheduler/pollLoop.js";
import type { ReviewStateStore } from "../state/store.js";

const ReviewQuerySchema = z.object({ pr: z.string().min(1) });

export function buildStatusServer(params: {
  scheduler: ReviewScheduler;
  store: ReviewStateStore;
  repository: string;
  logLevel: string;
}): FastifyInstance {
  const app = Fastify({
    logger: {
      level: params.logLevel
    }
  });

  app.get("/healthz", async () => ({ ok: true }));

  app.get("/status", async () => ({
    repository: params.repository,
    state: params.scheduler.state,
    pending: params.scheduler.pending,
    reviewedPullRequests: params.store.list().length,
    lastCycle: params.scheduler.lastCycle
  }));

  app.get("/reviews", async (request, reply) => {
    const query = ReviewQuerySchema.safeParse(request.query);
    if (!query.success) {
      reply.code(400).send({ error: "Missing required query parameter: pr" });
      return;
    }
    const record = params.store.getRecord(query.data.pr);
    if (!record) {
      reply.code(404).send({ error: "Not found" });
      return;
    }
    return record;
  });

  return app;
}
