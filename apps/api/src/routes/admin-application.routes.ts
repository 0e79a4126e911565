/**
 * Admin sub-module: application review (list, detail, history, status
 * changes, deletion). Reads are open to officers; the auth hook limits
 * mutations to administrators.
 */
import { FastifyInstance } from "fastify";
import { actorOf } from "../middleware/auth";
import type { Services } from "../services";
import {
  bulkStatusBodySchema,
  emptyQuerySchema,
  listQuerySchema,
  referenceParamsSchema,
  statusBodySchema,
} from "./schemas";

type ReferenceParams = { referenceNumber: string };
type StatusBody = { status: string; reason?: string | null };
type BulkStatusBody = StatusBody & { referenceNumbers: string[] };

export async function registerAdminApplicationRoutes(app: FastifyInstance, services: Services) {
  const { applications, transitions } = services;

  app.get(
    "/api/v1/admin/applications",
    { schema: { querystring: listQuerySchema } },
    async (request) => applications.list(request.query)
  );

  app.get<{ Params: ReferenceParams }>(
    "/api/v1/admin/applications/:referenceNumber",
    { schema: { params: referenceParamsSchema, querystring: emptyQuerySchema } },
    async (request) => applications.get(request.params.referenceNumber)
  );

  app.get<{ Params: ReferenceParams }>(
    "/api/v1/admin/applications/:referenceNumber/history",
    { schema: { params: referenceParamsSchema, querystring: emptyQuerySchema } },
    async (request) => applications.history(request.params.referenceNumber)
  );

  app.post<{ Params: ReferenceParams; Body: StatusBody }>(
    "/api/v1/admin/applications/:referenceNumber/status",
    { schema: { params: referenceParamsSchema, body: statusBodySchema } },
    async (request) => {
      const result = await transitions.transition(
        request.params.referenceNumber,
        request.body.status,
        actorOf(request),
        request.body.reason
      );
      return {
        message: result.changed
          ? `Status updated from ${result.oldStatus} to ${result.newStatus}`
          : `Status is already ${result.newStatus}`,
        referenceNumber: result.referenceNumber,
        oldStatus: result.oldStatus,
        newStatus: result.newStatus,
        changed: result.changed,
      };
    }
  );

  app.post<{ Body: BulkStatusBody }>(
    "/api/v1/admin/applications/bulk-status",
    { schema: { body: bulkStatusBodySchema } },
    async (request) =>
      transitions.bulkTransition(request.body.referenceNumbers, request.body.status, actorOf(request), request.body.reason)
  );

  app.delete<{ Params: ReferenceParams }>(
    "/api/v1/admin/applications/:referenceNumber",
    { schema: { params: referenceParamsSchema }, config: { skipStrictMutationBodySchema: true } },
    async (request) => applications.delete(request.params.referenceNumber)
  );
}
