/**
 * JWT Authentication Middleware for Fastify
 *
 * Provides token generation, verification, and route protection.
 * Public routes (health, auth endpoints) are whitelisted.
 */
import { randomUUID } from "node:crypto";
import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import jwt, { type JwtPayload } from "jsonwebtoken";
import { FarmerCodeSchema, FarmerRoleEnum, type FarmerRole } from "@agroscheme/shared";
import type { Farmer } from "../auth";
import { requireRuntimeSecret } from "../runtime-safety";

const JWT_SECRET = requireRuntimeSecret("JWT_SECRET", "test-secret");
const DURATION_UNITS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** "3600", "45m", "24h" or "7d" in seconds. */
export function parseTokenLifetime(value: string | undefined, fallbackSeconds: number): number {
  const match = /^(\d+)([smhd]?)$/.exec((value || "").trim());
  if (!match) return fallbackSeconds;
  const seconds = Number(match[1]) * DURATION_UNITS[match[2] || "s"];
  return seconds > 0 ? seconds : fallbackSeconds;
}

const JWT_EXPIRES_IN_SECONDS = parseTokenLifetime(process.env.JWT_EXPIRES_IN, 24 * 3600);

/** Routes available only outside production (API docs, metrics) */
const DEV_ONLY_ROUTES = ["/metrics", "/docs", "/api/v1/openapi.json"];
const DEV_ONLY_PREFIXES = ["/docs/"];

/** Routes that do NOT require authentication */
export const PUBLIC_ROUTES = [
  "/health",
  "/ready",
  "/api/v1/auth/login",
  "/api/v1/auth/register",
  ...(process.env.NODE_ENV !== "production" ? DEV_ONLY_ROUTES : []),
];

const PUBLIC_ROUTE_PREFIXES = [...(process.env.NODE_ENV !== "production" ? DEV_ONLY_PREFIXES : [])];

export function isPublicRoutePath(url: string): boolean {
  if (PUBLIC_ROUTES.some((route) => url === route)) {
    return true;
  }
  return PUBLIC_ROUTE_PREFIXES.some((prefix) => url.startsWith(prefix));
}

export interface AuthPayload {
  farmerId: number;
  farmerCode: string;
  role: FarmerRole;
  jti: string;
  iat?: number;
  exp?: number;
}

declare module "fastify" {
  interface FastifyRequest {
    authFarmer?: AuthPayload;
  }
}

/** Generate a JWT token for a farmer */
export function generateToken(farmer: Pick<Farmer, "id" | "farmer_code" | "role">): string {
  const payload: AuthPayload = {
    farmerId: farmer.id,
    farmerCode: farmer.farmer_code,
    role: farmer.role,
    jti: randomUUID(),
  };
  return jwt.sign(payload, JWT_SECRET, { expiresIn: JWT_EXPIRES_IN_SECONDS });
}

function parseAuthPayload(tokenPayload: string | JwtPayload): AuthPayload | null {
  if (!tokenPayload || typeof tokenPayload !== "object") return null;
  const { farmerId, jti } = tokenPayload;
  const farmerCode = FarmerCodeSchema.safeParse(tokenPayload.farmerCode);
  const role = FarmerRoleEnum.safeParse(tokenPayload.role);
  if (
    typeof farmerId !== "number" ||
    !Number.isInteger(farmerId) ||
    !farmerCode.success ||
    typeof jti !== "string" ||
    !role.success
  ) {
    return null;
  }
  return {
    farmerId,
    farmerCode: farmerCode.data,
    role: role.data,
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

/** Register the auth middleware on a Fastify instance */
export function registerAuthMiddleware(app: FastifyInstance): void {
  app.addHook("onRequest", async (request: FastifyRequest, reply: FastifyReply) => {
    const url = request.url.split("?")[0];
    if (isPublicRoutePath(url)) {
      return;
    }

    const authHeader = request.headers.authorization;
    const token = authHeader?.startsWith("Bearer ") ? authHeader.slice(7) : null;
    if (!token) {
      reply.code(401).send({ error: "AUTHENTICATION_REQUIRED", message: "Missing or invalid authentication", statusCode: 401 });
      return;
    }
    const payload = verifyToken(token);
    if (!payload) {
      reply.code(401).send({ error: "INVALID_TOKEN", message: "Token is invalid or expired", statusCode: 401 });
      return;
    }

    request.authFarmer = payload;
  });
}
