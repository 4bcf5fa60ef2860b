import { randomUUID } from "node:crypto";
import Fastify, { type FastifyInstance, type FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import { SpanStatusCode, trace } from "@opentelemetry/api";
import { pool, query } from "./db";
import { getDocumentCatalog } from "./document-catalog";
import { send400, sendError } from "./errors";
import { setLogContext } from "./log-context";
import { logError } from "./logger";
import { registerAuthMiddleware } from "./middleware/auth";
import {
  getMetricsContentType,
  getMetricsSnapshot,
  recordHttpRequestMetric,
  updateDbPoolMetric,
} from "./observability/metrics";
import { isTestRuntime } from "./runtime-safety";
import { resolveStorageMaxFileBytes } from "./storage";
import { registerAdminRoutes } from "./routes/admin.routes";
import { registerApplicationRoutes } from "./routes/application.routes";
import { registerAuthRoutes } from "./routes/auth.routes";
import { registerDocumentRoutes } from "./routes/document.routes";
import { registerNotificationRoutes } from "./routes/notification.routes";
import { registerProfileRoutes } from "./routes/profile.routes";
import { registerSchemeRoutes } from "./routes/scheme.routes";

declare module "fastify" {
  interface FastifyRequest {
    metricsStartedAtNs?: bigint;
  }
  interface FastifyContextConfig {
    /** Multipart routes validate their payload by hand. */
    skipStrictMutationBodySchema?: boolean;
  }
}

function isRecord(node: unknown): node is Record<string, unknown> {
  return typeof node === "object" && node !== null && !Array.isArray(node);
}

function isStrictObjectSchema(node: unknown): boolean {
  return isRecord(node) && node.type === "object" && node.additionalProperties === false;
}

function containsStrictObjectSchema(node: unknown): boolean {
  if (!isRecord(node)) return false;
  if (isStrictObjectSchema(node)) return true;
  return [node.anyOf, node.oneOf, node.allOf].some(
    (entry) => Array.isArray(entry) && entry.some((item) => containsStrictObjectSchema(item))
  );
}

function hasStrictSchemaSection(routeSchema: unknown, section: "body" | "params" | "querystring"): boolean {
  return isRecord(routeSchema) && containsStrictObjectSchema(routeSchema[section]);
}

function routeLabelForMetrics(request: FastifyRequest): string {
  return request.routeOptions.url || request.url.split("?")[0] || "UNKNOWN_ROUTE";
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw || "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/** Build and return the Fastify app with all routes (no listen). Used by server and tests. */
export async function buildApp(logger = true): Promise<FastifyInstance> {
  const testRuntime = isTestRuntime();
  const docsEnabled = process.env.ENABLE_API_DOCS === "true" || process.env.NODE_ENV !== "production";

  // Fail boot on a malformed document catalog rather than on the first upload.
  getDocumentCatalog();

  const app = Fastify({
    logger,
    requestTimeout: parsePositiveInt(process.env.REQUEST_TIMEOUT_MS, 30_000),
    requestIdHeader: "x-request-id",
    genReqId: (req) => {
      const incomingHeader = req.headers["x-request-id"];
      if (typeof incomingHeader === "string" && incomingHeader.trim().length > 0) {
        return incomingHeader.trim();
      }
      return randomUUID();
    },
    ajv: {
      customOptions: {
        // Strict schemas (additionalProperties: false) must reject unknown keys, not drop them.
        removeAdditional: false,
      },
    },
  });

  app.addHook("onRequest", async (request, reply) => {
    request.metricsStartedAtNs = process.hrtime.bigint();
    setLogContext({ requestId: request.id });
    reply.header("x-request-id", request.id);
    trace.getActiveSpan()?.setAttribute("request.id", request.id);
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
    if (!request.metricsStartedAtNs) return;
    const elapsedNs = process.hrtime.bigint() - request.metricsStartedAtNs;
    recordHttpRequestMetric({
      method: request.method,
      route: routeLabelForMetrics(request),
      statusCode: reply.statusCode,
      durationSeconds: Number(elapsedNs) / 1_000_000_000,
    });
  });

  await app.register(swagger, {
    openapi: {
      info: {
        title: "AgroScheme Portal API",
        description: "Farmer document intake, scheme eligibility and applications.",
        version: "1.0.0",
      },
      components: {
        securitySchemes: {
          bearerAuth: { type: "http", scheme: "bearer", bearerFormat: "JWT" },
        },
      },
      security: [{ bearerAuth: [] }],
    },
  });

  if (docsEnabled) {
    await app.register(swaggerUi, {
      routePrefix: "/docs",
      uiConfig: { docExpansion: "list", deepLinking: false },
      staticCSP: true,
    });
  }

  app.setErrorHandler((error, _request, reply) => {
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
    logError("Unhandled request error", {
      message: error.message,
      stack: error.stack,
      statusCode: error.statusCode,
    });
    const statusCode = error.statusCode || 500;
    if (statusCode >= 500) {
      return reply.send(sendError(reply, 500, "INTERNAL_ERROR", "An unexpected error occurred"));
    }
    // 4xx raised by Fastify itself (404, 413, 429 ...)
    return reply.send(sendError(reply, statusCode, error.code || "ERROR", error.message));
  });

  // Mutations must declare a strict body schema; GETs with path params a strict params schema.
  app.addHook("onRoute", (routeOptions) => {
    const methods = (Array.isArray(routeOptions.method) ? routeOptions.method : [routeOptions.method]).map(
      (method) => String(method).toUpperCase()
    );
    const isMutation = methods.some((method) => method !== "GET" && method !== "HEAD" && method !== "OPTIONS");
    if (isMutation) {
      if (!routeOptions.config?.skipStrictMutationBodySchema && !hasStrictSchemaSection(routeOptions.schema, "body")) {
        throw new Error(
          `[MUTATION_SCHEMA_REQUIRED] ${methods.join(",")} ${routeOptions.url} must define a strict body schema (additionalProperties=false object)`
        );
      }
      return;
    }
    if (
      methods.includes("GET") &&
      routeOptions.url.startsWith("/api/") &&
      routeOptions.url.includes(":") &&
      !hasStrictSchemaSection(routeOptions.schema, "params")
    ) {
      throw new Error(`[READ_PARAMS_SCHEMA_REQUIRED] GET ${routeOptions.url} must define a strict params schema`);
    }
  });

  const rawAllowedOrigins = process.env.ALLOWED_ORIGINS;
  if (!rawAllowedOrigins && !testRuntime) {
    throw new Error("FATAL: ALLOWED_ORIGINS must be set in non-test runtime");
  }
  const allowedOrigins = rawAllowedOrigins
    ? rawAllowedOrigins.split(",").map((origin) => origin.trim()).filter(Boolean)
    : true;
  await app.register(cors, { origin: allowedOrigins });

  await app.register(multipart, {
    limits: { fileSize: resolveStorageMaxFileBytes(), files: 1 },
  });

  await app.register(rateLimit, {
    max: parsePositiveInt(process.env.RATE_LIMIT_MAX, 100),
    timeWindow: process.env.RATE_LIMIT_WINDOW || "1 minute",
  });

  registerAuthMiddleware(app);

  app.get("/health", async () => {
    return { status: "ok" };
  });

  app.get("/ready", async (_request, reply) => {
    try {
      await query("SELECT 1");
      return { status: "ok" };
    } catch {
      reply.code(503);
      return { status: "degraded", reason: "database_unreachable" };
    }
  });

  app.get("/metrics", async (_request, reply) => {
    updateDbPoolMetric({
      totalClients: pool.totalCount,
      idleClients: pool.idleCount,
      waitingClients: pool.waitingCount,
    });
    reply.header("content-type", getMetricsContentType());
    reply.header("cache-control", "no-store");
    return getMetricsSnapshot();
  });

  await registerAuthRoutes(app);
  await registerProfileRoutes(app);
  await registerSchemeRoutes(app);
  await registerApplicationRoutes(app);
  await registerNotificationRoutes(app);
  await registerDocumentRoutes(app);
  await registerAdminRoutes(app);

  if (docsEnabled) {
    app.get("/api/v1/openapi.json", async (_request, reply) => {
      reply.header("cache-control", "no-store");
      return app.swagger();
    });
  }

  return app;
}
