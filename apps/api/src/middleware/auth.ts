/**
 * JWT Authentication Middleware for Fastify
 *
 * Deny by default: only the routes listed below are public. The check runs
 * on the matched route pattern, so encoded spellings of a path resolve to
 * the same decision as the router's. Applicant routes prove ownership per
 * request with the applicant's email. Officers may read; only
 * administrators may change anything.
 */
import { randomUUID } from "node:crypto";
import { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import jwt, { JwtPayload } from "jsonwebtoken";
import { isTestRuntime, parsePositiveIntEnv } from "../runtime-safety";

// Fail explicitly if JWT_SECRET is not set outside tests
function getJwtSecret(): string {
  const secret = process.env.JWT_SECRET;
  if (!secret && !isTestRuntime()) {
    throw new Error("FATAL: JWT_SECRET environment variable must be set in non-test runtime");
  }
  return secret || "bursary-dev-secret-DO-NOT-USE-IN-PRODUCTION";
}

const JWT_SECRET = getJwtSecret();
const JWT_EXPIRES_IN_SECONDS = parsePositiveIntEnv(process.env.JWT_EXPIRES_IN_SECONDS, 8 * 60 * 60);

const READ_METHODS = new Set(["GET", "HEAD", "OPTIONS"]);

/** Route patterns that do NOT require authentication */
export const PUBLIC_ROUTES = [
  "/health",
  "/ready",
  "/metrics",
  "/api/v1/openapi.json",
  "/api/v1/deadline",
  "/api/v1/applications",
  "/api/v1/applications/check-duplicate",
  "/api/v1/applications/check-edit-eligibility",
  "/api/v1/applications/get-for-edit",
  "/api/v1/applications/:referenceNumber",
  "/api/v1/applications/:referenceNumber/status",
  "/api/v1/applications/:referenceNumber/documents/:slot",
];

const PUBLIC_ROUTE_PREFIXES = ["/docs"];

export type StaffRole = "ADMIN" | "OFFICER";

export function isPublicRoutePath(routeUrl: string): boolean {
  if (PUBLIC_ROUTES.includes(routeUrl)) {
    return true;
  }
  return PUBLIC_ROUTE_PREFIXES.some((prefix) => routeUrl === prefix || routeUrl.startsWith(`${prefix}/`));
}

export interface AuthPayload {
  userId: string;
  userType: StaffRole;
  login: string;
  jti: string;
  iat?: number;
  exp?: number;
}

declare module "fastify" {
  interface FastifyRequest {
    authUser?: AuthPayload;
  }
}

export interface StaffIdentity {
  userId: string;
  userType: StaffRole;
  login: string;
}

/** Generate a JWT token for a staff member */
export function generateToken(user: StaffIdentity, expiresInSeconds = JWT_EXPIRES_IN_SECONDS): string {
  const payload: AuthPayload = {
    userId: user.userId,
    userType: user.userType,
    login: user.login,
    jti: randomUUID(),
  };
  return jwt.sign(payload, JWT_SECRET, { expiresIn: expiresInSeconds });
}

function parseAuthPayload(tokenPayload: string | JwtPayload): AuthPayload | null {
  if (!tokenPayload || typeof tokenPayload !== "object") return null;
  const userId = tokenPayload.userId;
  const userType = tokenPayload.userType;
  const login = tokenPayload.login;
  const jti = tokenPayload.jti;
  if (
    typeof userId !== "string" ||
    typeof login !== "string" ||
    typeof jti !== "string" ||
    (userType !== "OFFICER" && userType !== "ADMIN")
  ) {
    return null;
  }
  return {
    userId,
    userType,
    login,
    jti,
    iat: typeof tokenPayload.iat === "number" ? tokenPayload.iat : undefined,
    exp: typeof tokenPayload.exp === "number" ? tokenPayload.exp : undefined,
  };
}

/** Verify a JWT token and return the payload */
export function verifyToken(token: string): AuthPayload | null {
  try {
    return parseAuthPayload(jwt.verify(token, JWT_SECRET));
  } catch {
    return null;
  }
}

/** Name recorded as `changedBy` in the status log. */
export function actorOf(request: FastifyRequest): string | null {
  return request.authUser?.login ?? null;
}

/** Register the auth middleware on a Fastify instance */
export function registerAuthMiddleware(app: FastifyInstance): void {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    const routeUrl = request.routeOptions.url;
    // Unmatched paths have no handler and fall through to the 404 response.
    // CORS preflights carry no credentials.
    if (routeUrl === undefined || request.method === "OPTIONS" || isPublicRoutePath(routeUrl)) {
      return;
    }

    const authHeader = request.headers.authorization;
    const token = authHeader?.startsWith("Bearer ") ? authHeader.slice(7) : null;
    if (!token) {
      return reply.code(401).send({ error: "AUTHENTICATION_REQUIRED", message: "Missing or invalid authentication", statusCode: 401 });
    }
    const payload = verifyToken(token);
    if (!payload) {
      return reply.code(401).send({ error: "INVALID_TOKEN", message: "Token is invalid or expired", statusCode: 401 });
    }
    if (payload.userType !== "ADMIN" && !READ_METHODS.has(request.method)) {
      return reply.code(403).send({ error: "ADMIN_REQUIRED", message: "Only administrators can make changes", statusCode: 403 });
    }

    request.authUser = payload;
  });
}
