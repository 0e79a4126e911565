/**
 * Admin sub-module: messages to applicants and notification queue counters.
 */
import { FastifyInstance } from "fastify";
import type { Services } from "../services";
import {
  customEmailBodySchema,
  customSmsBodySchema,
  deadlineReminderBodySchema,
  documentRequestBodySchema,
  emptyQuerySchema,
} from "./schemas";

export async function registerCommunicationRoutes(app: FastifyInstance, services: Services) {
  const { communications } = services;

  app.post(
    "/api/v1/admin/communications/email",
    { schema: { body: customEmailBodySchema } },
    async (request) => communications.customEmail(request.body)
  );

  app.post(
    "/api/v1/admin/communications/deadline-reminder",
    { schema: { body: deadlineReminderBodySchema } },
    async (request) => communications.deadlineReminder(request.body ?? {})
  );

  app.post(
    "/api/v1/admin/communications/document-request",
    { schema: { body: documentRequestBodySchema } },
    async (request) => communications.documentRequest(request.body)
  );

  app.post(
    "/api/v1/admin/communications/sms",
    { schema: { body: customSmsBodySchema } },
    async (request) => communications.customSms(request.body)
  );

  app.get("/api/v1/admin/notifications/stats", { schema: { querystring: emptyQuerySchema } }, async () =>
    services.queue.stats()
  );
}
