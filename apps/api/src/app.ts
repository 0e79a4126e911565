import { randomUUID } from "node:crypto";
import Fastify, { FastifyInstance, FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { isPublicRoutePath, registerAuthMiddleware } from "./middleware/auth";
import { registerApplicationRoutes } from "./routes/application.routes";
import { registerDocumentRoutes } from "./routes/document.routes";
import { registerAdminApplicationRoutes } from "./routes/admin-application.routes";
import { registerAdminReportRoutes } from "./routes/admin-reports.routes";
import { registerCommunicationRoutes } from "./routes/communication.routes";
import { registerDeadlineRoutes } from "./routes/deadline.routes";
import { evaluateRuntimeAdapterPreflight, runRuntimeAdapterPreflightOrThrow } from "./runtime-adapter-preflight";
import { isDomainError, send400, sendDomainError, sendError } from "./errors";
import { logError, logWarn } from "./logger";
import { setLogContext } from "./log-context";
import {
  getMetricsContentType,
  getMetricsSnapshot,
  recordHttpRequestMetric,
  updateDbPoolMetric,
} from "./observability/metrics";
import { isTestRuntime, parsePositiveIntEnv } from "./runtime-safety";
import { createServices, shutdownServices, type Services } from "./services";
import { resolveStorageMaxFileBytes } from "./storage";

declare module "fastify" {
  interface FastifyContextConfig {
    /** Multipart and body-less mutations validate their input by hand. */
    skipStrictMutationBodySchema?: boolean;
    skipStrictReadSchema?: boolean;
  }
}

export interface BuildAppOptions {
  logger?: boolean;
  /** Defaults to the Postgres-backed container from `createServices()`. */
  services?: Services;
  /** Readiness probe; defaults to `SELECT 1` against the pool. */
  checkReady?: () => Promise<void>;
}

const DEFAULT_API_SUCCESS_RESPONSE_SCHEMA = {
  type: "object",
  additionalProperties: true,
  description: "Generic success payload. Route-specific response schema is recommended.",
};

const DEFAULT_API_ERROR_RESPONSE_SCHEMA = {
  type: "object",
  required: ["error", "message", "statusCode"],
  additionalProperties: true,
  properties: {
    error: { type: "string" },
    message: { type: "string" },
    statusCode: { type: "integer", minimum: 400, maximum: 599 },
    fieldErrors: { type: "object", additionalProperties: { type: "array", items: { type: "string" } } },
    existingReference: { type: "string" },
    matchType: { type: "string" },
  },
};

const DEFAULT_API_ERROR_RESPONSE_STATUS_CODES = ["400", "401", "403", "404", "409", "429", "500"] as const;

function isRecord(node: unknown): node is Record<string, unknown> {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

function normalizeRouteMethods(method: unknown): string[] {
  if (Array.isArray(method)) {
    return method.map((entry) => String(entry).toUpperCase());
  }
  if (method == null) return [];
  return [String(method).toUpperCase()];
}

function inferApiTag(url: string): string {
  if (url.startsWith("/api/v1/admin/exports/") || url.startsWith("/api/v1/admin/analytics/")) return "reports";
  if (url.startsWith("/api/v1/admin/communications/") || url.startsWith("/api/v1/admin/notifications/")) {
    return "communications";
  }
  if (url.startsWith("/api/v1/admin/deadlines") || url === "/api/v1/deadline") return "deadlines";
  if (url.includes("/documents/")) return "documents";
  if (url.startsWith("/api/v1/admin/")) return "admin";
  if (url.startsWith("/api/v1/applications")) return "applications";
  return "api";
}

function inferOperationId(method: string, url: string): string {
  const cleanedPath = url
    .replace(/^\/+/, "")
    .replace(/\/+$/, "")
    .split("/")
    .filter(Boolean)
    .map((segment) => {
      if (segment === "*") return "wildcard";
      if (segment.startsWith(":")) return `by_${segment.slice(1)}`;
      return segment.replace(/[^A-Za-z0-9]+/g, "_");
    })
    .join("_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
  return `${method.toLowerCase()}_${cleanedPath}` || `${method.toLowerCase()}_root`;
}

function ensureOpenApiContractDefaults(input: {
  schema: unknown;
  url: string;
  method: string;
}): Record<string, unknown> {
  const nextSchema: Record<string, unknown> = isRecord(input.schema) ? { ...input.schema } : {};

  if (!input.url.startsWith("/api/v1/")) {
    return nextSchema;
  }

  const currentOperationId = nextSchema.operationId;
  if (typeof currentOperationId !== "string" || currentOperationId.trim().length === 0) {
    nextSchema.operationId = inferOperationId(input.method, input.url);
  }

  const currentTags = nextSchema.tags;
  if (!Array.isArray(currentTags) || currentTags.length === 0) {
    nextSchema.tags = [inferApiTag(input.url)];
  }

  const currentSecurity = nextSchema.security;
  if (!isPublicRoutePath(input.url)) {
    if (!Array.isArray(currentSecurity) || currentSecurity.length === 0) {
      nextSchema.security = [{ bearerAuth: [] }];
    }
  }

  const responseSchemas: Record<string, unknown> = isRecord(nextSchema.response) ? { ...nextSchema.response } : {};
  const has2xx = Object.keys(responseSchemas).some((statusCode) => /^2\d\d$/.test(statusCode));
  if (!has2xx) {
    responseSchemas["200"] = DEFAULT_API_SUCCESS_RESPONSE_SCHEMA;
  }
  for (const statusCode of DEFAULT_API_ERROR_RESPONSE_STATUS_CODES) {
    if (!responseSchemas[statusCode]) {
      responseSchemas[statusCode] = DEFAULT_API_ERROR_RESPONSE_SCHEMA;
    }
  }
  nextSchema.response = responseSchemas;

  return nextSchema;
}

function routeLabelForMetrics(request: FastifyRequest): string {
  return request.routeOptions.url || request.url.split("?")[0] || "UNKNOWN_ROUTE";
}

function isStrictObjectSchema(node: unknown): boolean {
  return isRecord(node) && node.type === "object" && node.additionalProperties === false;
}

function containsStrictObjectSchema(node: unknown): boolean {
  if (!isRecord(node)) return false;
  if (isStrictObjectSchema(node)) return true;
  const unionNodes = [node.anyOf, node.oneOf, node.allOf];
  return unionNodes.some(
    (entry) => Array.isArray(entry) && entry.some((item) => containsStrictObjectSchema(item))
  );
}

function hasStrictRouteSchemaSection(routeSchema: unknown, section: "body" | "params" | "querystring"): boolean {
  return isRecord(routeSchema) && containsStrictObjectSchema(routeSchema[section]);
}

/** Build and return the Fastify app with all routes (no listen). Used by server and tests. */
export async function buildApp(options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const services = options.services ?? createServices();
  const checkReady =
    options.checkReady ??
    (async () => {
      const { query: dbQuery } = await import("./db");
      await dbQuery("SELECT 1");
    });
  const docsEnabled = process.env.ENABLE_API_DOCS === "true" || process.env.NODE_ENV !== "production";
  const requestTimeoutMs = parsePositiveIntEnv(process.env.REQUEST_TIMEOUT_MS, 30_000);
  const shutdownTimeoutMs = parsePositiveIntEnv(process.env.SHUTDOWN_TIMEOUT_MS, 15_000);
  const requestStartedAt = new WeakMap<FastifyRequest, bigint>();

  const app = Fastify({
    logger: options.logger ?? false,
    requestTimeout: requestTimeoutMs,
    requestIdHeader: "x-request-id",
    genReqId: (req) => {
      const incomingHeader = req.headers["x-request-id"];
      if (typeof incomingHeader === "string" && incomingHeader.trim().length > 0) {
        return incomingHeader.trim();
      }
      if (Array.isArray(incomingHeader) && incomingHeader[0]?.trim().length) {
        return incomingHeader[0].trim();
      }
      return randomUUID();
    },
    ajv: {
      customOptions: {
        // Keep unknown keys so strict schemas (additionalProperties: false)
        // return 400 instead of silently dropping fields.
        removeAdditional: false,
      },
    },
  });

  app.addHook("onRequest", async (request, reply) => {
    requestStartedAt.set(request, process.hrtime.bigint());
    setLogContext({ requestId: request.id });
    reply.header("x-request-id", request.id);
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      activeSpan.setAttribute("request.id", request.id);
    }
  });

  app.addHook("onError", async (request, _reply, error) => {
    const activeSpan = trace.getActiveSpan();
    if (activeSpan) {
      activeSpan.recordException(error);
      activeSpan.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    }
    setLogContext({ requestId: request.id });
  });

  app.addHook("onResponse", async (request, reply) => {
    setLogContext({ requestId: request.id });
    const startedAt = requestStartedAt.get(request);
    if (startedAt === undefined) return;
    const durationSeconds = Number(process.hrtime.bigint() - startedAt) / 1_000_000_000;
    recordHttpRequestMetric({
      method: request.method,
      route: routeLabelForMetrics(request),
      statusCode: reply.statusCode,
      durationSeconds,
    });
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "Bursary Application API",
        description: "Applicant intake and administrator review of bursary applications.",
        version: "1.0.0",
      },
      tags: [
        { name: "health", description: "Service health and readiness" },
        { name: "applications", description: "Applicant intake, duplicate check, self-edit and tracking" },
        { name: "documents", description: "Supporting document upload and download" },
        { name: "deadlines", description: "Application deadline windows" },
        { name: "admin", description: "Application review and status changes" },
        { name: "reports", description: "CSV/XLSX exports and analytics" },
        { name: "communications", description: "Email and SMS to applicants" },
      ],
      components: {
        securitySchemes: {
          bearerAuth: {
            type: "http",
            scheme: "bearer",
            bearerFormat: "JWT",
          },
        },
      },
    },
    transform: ({ schema, url, route }) => {
      const methods = normalizeRouteMethods(route.method);
      const transformedSchema = ensureOpenApiContractDefaults({
        schema,
        url,
        method: methods[0] || "GET",
      });
      return { schema: transformedSchema, url };
    },
  });

  if (docsEnabled) {
    await app.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: {
        docExpansion: "list",
        deepLinking: false,
      },
      staticCSP: true,
      transformStaticCSP: (header) => header,
    });
  }

  app.setErrorHandler((error, _request, reply) => {
    if (isDomainError(error)) {
      return reply.send(sendDomainError(reply, error));
    }
    if (error.validation) {
      const context = error.validationContext;
      const errorCode =
        context === "querystring"
          ? "INVALID_QUERY_PARAMS"
          : context === "params"
            ? "INVALID_PATH_PARAMS"
            : "INVALID_REQUEST_BODY";
      return reply.send(send400(reply, errorCode, error.message || "Request validation failed"));
    }
    const statusCode = error.statusCode || 500;
    // Never expose internal error details to clients
    if (statusCode >= 500) {
      logError("Unhandled request error", {
        message: error.message,
        stack: error.stack,
        statusCode,
      });
      return reply.send(sendError(reply, 500, "INTERNAL_ERROR", "An unexpected error occurred"));
    }
    // For 4xx errors from Fastify and its plugins (e.g. 413, 415, 429), return a clean message
    return reply.send(sendError(reply, statusCode, error.code || "ERROR", error.message));
  });

  // Fail app boot early if runtime adapter configuration is unsafe.
  const runtimeAdapterPreflight = evaluateRuntimeAdapterPreflight(process.env);
  for (const warning of runtimeAdapterPreflight.warnings) {
    logWarn("Runtime adapter preflight warning", { code: warning.code, detail: warning.message });
  }
  runRuntimeAdapterPreflightOrThrow(process.env);

  // Enforce strict schemas on every API route. Multipart and body-less
  // mutations opt out with `config.skipStrictMutationBodySchema`.
  app.addHook("onRoute", (routeOptions) => {
    if (!routeOptions.url.startsWith("/api/v1/")) return;
    const methods = normalizeRouteMethods(routeOptions.method);
    const isMutation = methods.some((method) => method !== "GET" && method !== "HEAD" && method !== "OPTIONS");
    const hasPathParams = routeOptions.url.includes(":") || routeOptions.url.includes("*");
    if (hasPathParams && !hasStrictRouteSchemaSection(routeOptions.schema, "params")) {
      throw new Error(
        `[PARAMS_SCHEMA_REQUIRED] ${methods.join(",")} ${routeOptions.url} must define a strict params schema (object + additionalProperties=false)`
      );
    }

    if (isMutation) {
      if (
        !routeOptions.config?.skipStrictMutationBodySchema &&
        !hasStrictRouteSchemaSection(routeOptions.schema, "body")
      ) {
        throw new Error(
          `[MUTATION_SCHEMA_REQUIRED] ${methods.join(",")} ${routeOptions.url} must define a strict body schema (additionalProperties=false object, optionally within anyOf/oneOf/allOf)`
        );
      }
      return;
    }

    if (!methods.includes("GET") || routeOptions.config?.skipStrictReadSchema) return;
    if (!hasStrictRouteSchemaSection(routeOptions.schema, "querystring")) {
      throw new Error(
        `[READ_QUERY_SCHEMA_REQUIRED] GET ${routeOptions.url} must define a strict querystring schema (object + additionalProperties=false)`
      );
    }
  });

  // CORS: require explicit allowed origins outside tests.
  const rawAllowedOrigins = process.env.ALLOWED_ORIGINS;
  if (!rawAllowedOrigins && !isTestRuntime()) {
    throw new Error("FATAL: ALLOWED_ORIGINS must be set in non-test runtime");
  }
  const allowedOrigins = rawAllowedOrigins
    ? rawAllowedOrigins.split(",").map((o) => o.trim()).filter(Boolean)
    : true;
  await app.register(cors, { origin: allowedOrigins });

  // One byte over the storage limit so the size check in storage reports it.
  await app.register(multipart, {
    limits: { fileSize: resolveStorageMaxFileBytes() + 1, files: 1, fields: 5 },
  });

  await app.register(rateLimit, {
    max: parsePositiveIntEnv(process.env.RATE_LIMIT_MAX, 100),
    timeWindow: process.env.RATE_LIMIT_WINDOW || "1 minute",
  });

  registerAuthMiddleware(app);

  app.get("/health", async () => {
    return { status: "ok" };
  });

  app.get("/ready", async (_request, reply) => {
    try {
      await checkReady();
      return { status: "ok" };
    } catch (error) {
      logWarn("Readiness check failed", { error });
      reply.code(503);
      return { status: "degraded", reason: "database_unreachable" };
    }
  });

  app.get(
    "/metrics",
    {
      schema: {
        querystring: {
          type: "object",
          additionalProperties: false,
          properties: {},
        },
      },
    },
    async (_request, reply) => {
      if (!options.services) {
        const { pool } = await import("./db");
        updateDbPoolMetric({
          totalClients: pool.totalCount,
          idleClients: pool.idleCount,
          waitingClients: pool.waitingCount,
        });
      }
      reply.header("content-type", getMetricsContentType());
      reply.header("cache-control", "no-store");
      return getMetricsSnapshot();
    }
  );

  await registerApplicationRoutes(app, services);
  await registerDocumentRoutes(app, services);
  await registerDeadlineRoutes(app, services);
  await registerAdminApplicationRoutes(app, services);
  await registerAdminReportRoutes(app, services);
  await registerCommunicationRoutes(app, services);

  if (docsEnabled) {
    app.get("/api/v1/openapi.json", { config: { skipStrictReadSchema: true } }, async (_request, reply) => {
      reply.header("cache-control", "no-store");
      return app.swagger();
    });
  }

  services.queue.start();

  app.addHook("onClose", async () => {
    await shutdownServices(services, shutdownTimeoutMs);
  });

  return app;
}
