/**
 * Admin sub-module: exports and analytics.
 */
import { FastifyInstance, FastifyReply } from "fastify";
import type { ExportFile } from "../exports";
import { ListQuerySchema } from "../applications";
import { parseOrThrow } from "../errors";
import type { Services } from "../services";
import { emptyQuerySchema, filterQuerySchema } from "./schemas";

function sendFile(reply: FastifyReply, file: ExportFile) {
  reply.header("content-type", file.contentType);
  reply.header("content-disposition", `attachment; filename="${file.fileName}"`);
  reply.header("cache-control", "no-store");
  return reply.send(file.body);
}

export async function registerAdminReportRoutes(app: FastifyInstance, services: Services) {
  const { exports, analytics } = services;

  app.get(
    "/api/v1/admin/exports/applications.csv",
    { schema: { querystring: filterQuerySchema } },
    async (request, reply) => sendFile(reply, await exports.applicationsCsv(request.query))
  );

  app.get(
    "/api/v1/admin/exports/applications.xlsx",
    { schema: { querystring: filterQuerySchema } },
    async (request, reply) => sendFile(reply, await exports.applicationsXlsx(request.query))
  );

  app.get(
    "/api/v1/admin/exports/duplicates.csv",
    { schema: { querystring: filterQuerySchema } },
    async (request, reply) => sendFile(reply, await exports.duplicatesCsv(request.query))
  );

  app.get(
    "/api/v1/admin/exports/analytics.csv",
    { schema: { querystring: emptyQuerySchema } },
    async (_request, reply) => sendFile(reply, await exports.analyticsCsv())
  );

  app.get("/api/v1/admin/analytics/overview", { schema: { querystring: emptyQuerySchema } }, async () =>
    analytics.overview()
  );

  app.get(
    "/api/v1/admin/analytics/comprehensive",
    { schema: { querystring: filterQuerySchema } },
    async (request) => {
      const { status, ward, startDate, endDate } = parseOrThrow(ListQuerySchema, request.query, "Invalid analytics filters");
      return analytics.comprehensive({ status, ward, startDate, endDate });
    }
  );
}
