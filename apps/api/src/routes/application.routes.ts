import { FastifyInstance } from "fastify";
import { describeDeadline } from "../deadlines";
import type { Services } from "../services";
import {
  duplicateCheckBodySchema,
  editBodySchema,
  emptyQuerySchema,
  intakeBodySchema,
  ownershipBodySchema,
  referenceParamsSchema,
} from "./schemas";

type ReferenceParams = { referenceNumber: string };

/** Applicant-facing routes. No login; edits and uploads are gated on the applicant's email. */
export async function registerApplicationRoutes(app: FastifyInstance, services: Services) {
  const { applications } = services;

  app.post("/api/v1/applications", { schema: { body: intakeBodySchema } }, async (request, reply) => {
    const result = await applications.submit(request.body);
    reply.code(201);
    return result;
  });

  app.post(
    "/api/v1/applications/check-duplicate",
    { schema: { body: duplicateCheckBodySchema } },
    async (request) => applications.checkDuplicate(request.body)
  );

  app.post(
    "/api/v1/applications/check-edit-eligibility",
    { schema: { body: ownershipBodySchema } },
    async (request) => applications.checkEditEligibility(request.body)
  );

  app.post(
    "/api/v1/applications/get-for-edit",
    { schema: { body: ownershipBodySchema } },
    async (request) => applications.getForEdit(request.body)
  );

  app.patch<{ Params: ReferenceParams }>(
    "/api/v1/applications/:referenceNumber",
    { schema: { params: referenceParamsSchema, body: editBodySchema } },
    async (request) => applications.edit(request.params.referenceNumber, request.body)
  );

  app.get<{ Params: ReferenceParams }>(
    "/api/v1/applications/:referenceNumber/status",
    { schema: { params: referenceParamsSchema, querystring: emptyQuerySchema } },
    async (request) => applications.trackStatus(request.params.referenceNumber)
  );

  app.get("/api/v1/deadline", { schema: { querystring: emptyQuerySchema } }, async () =>
    describeDeadline(await services.deadlines.getActive(), services.clock())
  );
}
