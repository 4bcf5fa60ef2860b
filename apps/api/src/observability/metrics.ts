import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";
import type { ApplicationOrigin } from "@agroscheme/shared";

const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: "agroscheme_api_" });

const httpRequestDurationSeconds = new Histogram({
  name: "agroscheme_api_http_request_duration_seconds",
  help: "HTTP request latency in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: "agroscheme_api_http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

const httpErrorsTotal = new Counter({
  name: "agroscheme_api_http_errors_total",
  help: "Total HTTP requests resulting in 5xx responses",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

const dbQueryDurationSeconds = new Histogram({
  name: "agroscheme_api_db_query_duration_seconds",
  help: "DB query latency in seconds",
  labelNames: ["operation", "success"] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2],
  registers: [registry],
});

const dbQueriesTotal = new Counter({
  name: "agroscheme_api_db_queries_total",
  help: "Total DB queries",
  labelNames: ["operation", "success"] as const,
  registers: [registry],
});

const dbPoolTotalClients = new Gauge({
  name: "agroscheme_api_db_pool_total_clients",
  help: "Total PostgreSQL clients in pool",
  registers: [registry],
});

const dbPoolIdleClients = new Gauge({
  name: "agroscheme_api_db_pool_idle_clients",
  help: "Idle PostgreSQL clients in pool",
  registers: [registry],
});

const dbPoolWaitingClients = new Gauge({
  name: "agroscheme_api_db_pool_waiting_clients",
  help: "Waiting PostgreSQL client requests in pool queue",
  registers: [registry],
});

// ── Outbound HTTP (resilientFetch) metrics ──

const outboundRequestsTotal = new Counter({
  name: "agroscheme_api_outbound_requests_total",
  help: "Total outbound HTTP requests (includes retries)",
  labelNames: ["host", "result"] as const, // result: success | retry | failure
  registers: [registry],
});

const outboundRetryAttemptsTotal = new Counter({
  name: "agroscheme_api_outbound_retry_attempts_total",
  help: "Total retry attempts on outbound HTTP requests",
  labelNames: ["host", "reason"] as const, // reason: timeout | 5xx | network
  registers: [registry],
});

const outboundCircuitBreakerState = new Gauge({
  name: "agroscheme_api_outbound_circuit_breaker_open",
  help: "Whether the circuit breaker is open (1) or closed (0) per host",
  labelNames: ["host"] as const,
  registers: [registry],
});

// ── Eligibility / applications ──

const eligibilityEvaluationsTotal = new Counter({
  name: "agroscheme_api_eligibility_evaluations_total",
  help: "Eligibility evaluations by outcome",
  labelNames: ["outcome"] as const, // eligible | ineligible | not_found
  registers: [registry],
});

const applicationsCreatedTotal = new Counter({
  name: "agroscheme_api_applications_created_total",
  help: "Applications created",
  labelNames: ["origin"] as const,
  registers: [registry],
});

const applicationIdCollisionsTotal = new Counter({
  name: "agroscheme_api_application_id_collisions_total",
  help: "Application identifier collisions that triggered a regeneration",
  registers: [registry],
});

const autoApplySweepDurationSeconds = new Histogram({
  name: "agroscheme_api_auto_apply_sweep_duration_seconds",
  help: "Duration of one auto-apply sweep over all opted-in farmers",
  buckets: [0.05, 0.1, 0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [registry],
});

const documentExtractionsTotal = new Counter({
  name: "agroscheme_api_document_extractions_total",
  help: "Document field extractions by document type",
  labelNames: ["document_type"] as const,
  registers: [registry],
});

function normalizeOperation(sql: string): string {
  const trimmed = sql.trim();
  if (!trimmed) return "UNKNOWN";
  const match = trimmed.match(/^([A-Za-z]+)/);
  return (match?.[1] || "UNKNOWN").toUpperCase();
}

export function recordHttpRequestMetric(input: {
  method: string;
  route: string;
  statusCode: number;
  durationSeconds: number;
}): void {
  const labels = {
    method: input.method.toUpperCase(),
    route: input.route,
    status_code: String(input.statusCode),
  };
  httpRequestsTotal.inc(labels, 1);
  httpRequestDurationSeconds.observe(labels, input.durationSeconds);
  if (input.statusCode >= 500) {
    httpErrorsTotal.inc(labels, 1);
  }
}

export function recordDbQueryMetric(sql: string, durationSeconds: number, success: boolean): void {
  const labels = {
    operation: normalizeOperation(sql),
    success: success ? "true" : "false",
  };
  dbQueriesTotal.inc(labels, 1);
  dbQueryDurationSeconds.observe(labels, durationSeconds);
}

export function updateDbPoolMetric(input: {
  totalClients: number;
  idleClients: number;
  waitingClients: number;
}): void {
  dbPoolTotalClients.set(input.totalClients);
  dbPoolIdleClients.set(input.idleClients);
  dbPoolWaitingClients.set(input.waitingClients);
}

export function recordOutboundRequest(host: string, result: "success" | "retry" | "failure"): void {
  outboundRequestsTotal.inc({ host, result }, 1);
}

export function recordOutboundRetry(host: string, reason: "timeout" | "5xx" | "network"): void {
  outboundRetryAttemptsTotal.inc({ host, reason }, 1);
}

export function setOutboundCircuitState(host: string, isOpen: boolean): void {
  outboundCircuitBreakerState.set({ host }, isOpen ? 1 : 0);
}

export type EvaluationOutcome = "eligible" | "ineligible" | "not_found";

export function recordEligibilityEvaluation(outcome: EvaluationOutcome): void {
  eligibilityEvaluationsTotal.inc({ outcome }, 1);
}

export function recordApplicationCreated(origin: ApplicationOrigin): void {
  applicationsCreatedTotal.inc({ origin }, 1);
}

export function recordApplicationIdCollision(): void {
  applicationIdCollisionsTotal.inc(1);
}

export function observeAutoApplySweep(durationSeconds: number): void {
  autoApplySweepDurationSeconds.observe(durationSeconds);
}

export function recordDocumentExtraction(documentType: string): void {
  documentExtractionsTotal.inc({ document_type: documentType }, 1);
}

export function getMetricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
