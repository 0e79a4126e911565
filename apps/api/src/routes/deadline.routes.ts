/**
 * Admin sub-module: application deadline windows. At most one is active;
 * activating or creating an active window deactivates the others.
 */
import { FastifyInstance } from "fastify";
import { DeadlineInputSchema } from "@bursary/shared";
import { parseOrThrow } from "../errors";
import { logInfo } from "../logger";
import type { Services } from "../services";
import { deadlineBodySchema, emptyQuerySchema, idParamsSchema } from "./schemas";

type IdParams = { id: number };

export async function registerDeadlineRoutes(app: FastifyInstance, services: Services) {
  const { deadlines, clock } = services;

  app.get("/api/v1/admin/deadlines", { schema: { querystring: emptyQuerySchema } }, async () => ({
    deadlines: await deadlines.list(),
  }));

  app.post("/api/v1/admin/deadlines", { schema: { body: deadlineBodySchema } }, async (request, reply) => {
    const input = parseOrThrow(DeadlineInputSchema, request.body, "Invalid deadline");
    const deadline = await deadlines.create(input, clock());
    logInfo("Deadline created", { deadlineId: deadline.id, isActive: deadline.isActive });
    reply.code(201);
    return deadline;
  });

  app.post<{ Params: IdParams }>(
    "/api/v1/admin/deadlines/:id/activate",
    { schema: { params: idParamsSchema }, config: { skipStrictMutationBodySchema: true } },
    async (request) => {
      const deadline = await deadlines.activate(request.params.id, clock());
      logInfo("Deadline activated", { deadlineId: deadline.id });
      return deadline;
    }
  );

  app.post<{ Params: IdParams }>(
    "/api/v1/admin/deadlines/:id/deactivate",
    { schema: { params: idParamsSchema }, config: { skipStrictMutationBodySchema: true } },
    async (request) => {
      const deadline = await deadlines.deactivate(request.params.id, clock());
      logInfo("Deadline deactivated", { deadlineId: deadline.id });
      return deadline;
    }
  );
}
