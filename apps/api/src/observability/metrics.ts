import {
  collectDefaultMetrics,
  Counter,
  Gauge,
  Histogram,
  Registry,
} from "prom-client";

const registry = new Registry();
collectDefaultMetrics({ register: registry, prefix: "bursary_api_" });

const httpRequestDurationSeconds = new Histogram({
  name: "bursary_api_http_request_duration_seconds",
  help: "HTTP request latency in seconds",
  labelNames: ["method", "route", "status_code"] as const,
  buckets: [0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

const httpRequestsTotal = new Counter({
  name: "bursary_api_http_requests_total",
  help: "Total HTTP requests",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

const httpErrorsTotal = new Counter({
  name: "bursary_api_http_errors_total",
  help: "Total HTTP requests resulting in 5xx responses",
  labelNames: ["method", "route", "status_code"] as const,
  registers: [registry],
});

const dbQueryDurationSeconds = new Histogram({
  name: "bursary_api_db_query_duration_seconds",
  help: "DB query latency in seconds",
  labelNames: ["operation", "success"] as const,
  buckets: [0.001, 0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2],
  registers: [registry],
});

const dbQueriesTotal = new Counter({
  name: "bursary_api_db_queries_total",
  help: "Total DB queries",
  labelNames: ["operation", "success"] as const,
  registers: [registry],
});

const dbPoolTotalClients = new Gauge({
  name: "bursary_api_db_pool_total_clients",
  help: "Total PostgreSQL clients in pool",
  registers: [registry],
});

const dbPoolIdleClients = new Gauge({
  name: "bursary_api_db_pool_idle_clients",
  help: "Idle PostgreSQL clients in pool",
  registers: [registry],
});

const dbPoolWaitingClients = new Gauge({
  name: "bursary_api_db_pool_waiting_clients",
  help: "Waiting PostgreSQL client requests in pool queue",
  registers: [registry],
});

// ── Outbound HTTP (resilientFetch) metrics, used by the SMS gateway ──

const outboundRequestsTotal = new Counter({
  name: "bursary_api_outbound_requests_total",
  help: "Total outbound HTTP requests (includes retries)",
  labelNames: ["host", "result"] as const, // result: success | retry | failure
  registers: [registry],
});

const outboundRetryAttemptsTotal = new Counter({
  name: "bursary_api_outbound_retry_attempts_total",
  help: "Total retry attempts on outbound HTTP requests",
  labelNames: ["host", "reason"] as const, // reason: timeout | 5xx | network
  registers: [registry],
});

const outboundCircuitBreakerState = new Gauge({
  name: "bursary_api_outbound_circuit_breaker_open",
  help: "Whether the circuit breaker is open (1) or closed (0) per host",
  labelNames: ["host"] as const,
  registers: [registry],
});

// ── Application lifecycle metrics ──

const duplicateChecksTotal = new Counter({
  name: "bursary_api_duplicate_checks_total",
  help: "Duplicate screening outcomes",
  labelNames: ["result", "match_type"] as const, // result: blocked | suspicious | clean
  registers: [registry],
});

const statusTransitionsTotal = new Counter({
  name: "bursary_api_status_transitions_total",
  help: "Applied status transitions",
  labelNames: ["from", "to"] as const,
  registers: [registry],
});

// ── Notification queue metrics ──

const notificationTasksTotal = new Counter({
  name: "bursary_api_notification_tasks_total",
  help: "Notification tasks by lifecycle event",
  labelNames: ["event"] as const, // event: queued | succeeded | failed | rejected
  registers: [registry],
});

const notificationDeliveriesTotal = new Counter({
  name: "bursary_api_notification_deliveries_total",
  help: "Individual email/SMS deliveries",
  labelNames: ["channel", "result"] as const, // result: sent | suppressed | failed
  registers: [registry],
});

const notificationQueueDepth = new Gauge({
  name: "bursary_api_notification_queue_depth",
  help: "Notification tasks waiting or running",
  labelNames: ["state"] as const, // state: active | pending
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

export function recordDuplicateCheck(result: "blocked" | "suspicious" | "clean", matchType: string | null): void {
  duplicateChecksTotal.inc({ result, match_type: matchType ?? "none" }, 1);
}

export function recordStatusTransition(from: string, to: string): void {
  statusTransitionsTotal.inc({ from, to }, 1);
}

export function recordNotificationTask(event: "queued" | "succeeded" | "failed" | "rejected"): void {
  notificationTasksTotal.inc({ event }, 1);
}

export function recordNotificationDelivery(
  channel: "email" | "sms",
  result: "sent" | "suppressed" | "failed"
): void {
  notificationDeliveriesTotal.inc({ channel, result }, 1);
}

export function updateNotificationQueueMetric(input: { active: number; pending: number }): void {
  notificationQueueDepth.set({ state: "active" }, input.active);
  notificationQueueDepth.set({ state: "pending" }, input.pending);
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

export function getMetricsContentType(): string {
  return registry.contentType;
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
