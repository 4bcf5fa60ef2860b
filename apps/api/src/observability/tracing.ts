import { diag, DiagConsoleLogger, DiagLogLevel } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { FastifyInstrumentation } from "@opentelemetry/instrumentation-fastify";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { TRACER_NAME } from "./spans";

let sdk: NodeSDK | null = null;
let started = false;

const DIAG_LEVELS: Record<string, DiagLogLevel> = {
  ALL: DiagLogLevel.ALL,
  VERBOSE: DiagLogLevel.VERBOSE,
  DEBUG: DiagLogLevel.DEBUG,
  INFO: DiagLogLevel.INFO,
  WARN: DiagLogLevel.WARN,
  ERROR: DiagLogLevel.ERROR,
  NONE: DiagLogLevel.NONE,
};

function parseDiagLogLevel(rawLevel: string | undefined): DiagLogLevel | null {
  if (!rawLevel) return null;
  return DIAG_LEVELS[rawLevel.trim().toUpperCase()] ?? null;
}

export function isTracingEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.OTEL_ENABLED === "false") return false;
  if (env.OTEL_ENABLED === "true") return true;
  return env.NODE_ENV !== "test" && env.VITEST !== "true";
}

function buildTraceExporter(): OTLPTraceExporter | undefined {
  const endpoint = (process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT || process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "").trim();
  return endpoint ? new OTLPTraceExporter({ url: endpoint }) : undefined;
}

/** Starts the SDK before Fastify and pg are loaded so their instrumentations patch them. */
export function startTracing(): void {
  if (started || !isTracingEnabled()) return;

  const diagLevel = parseDiagLogLevel(process.env.OTEL_DIAG_LOG_LEVEL);
  if (diagLevel !== null) {
    diag.setLogger(new DiagConsoleLogger(), diagLevel);
  }

  try {
    sdk = new NodeSDK({
      serviceName: process.env.OTEL_SERVICE_NAME || TRACER_NAME,
      traceExporter: buildTraceExporter(),
      instrumentations: [
        new FastifyInstrumentation({
          requestHook: (span, info) => {
            const reqId = String(info.request.id || "").trim();
            if (reqId) span.setAttribute("request.id", reqId);
            const farmerId = info.request.authFarmer?.farmerId;
            if (farmerId !== undefined) span.setAttribute("farmer.id", farmerId);
          },
        }),
        getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-fs": { enabled: false },
          "@opentelemetry/instrumentation-fastify": { enabled: false },
          // Statement text only; bound values carry farmer identity data.
          "@opentelemetry/instrumentation-pg": { enhancedDatabaseReporting: false },
        }),
      ],
    });
    sdk.start();
    started = true;
  } catch (error) {
    // Tracing never blocks startup.
    console.error("Failed to initialize OpenTelemetry tracing", error);
  }
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk || !started) return;
  await sdk.shutdown();
  started = false;
  sdk = null;
}
