import { diag, DiagConsoleLogger, DiagLogLevel, SpanStatusCode, trace } from "@opentelemetry/api";
import { getNodeAutoInstrumentations } from "@opentelemetry/auto-instrumentations-node";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { FastifyInstrumentation } from "@opentelemetry/instrumentation-fastify";
import { NodeSDK } from "@opentelemetry/sdk-node";
import { logError } from "../logger";

const TRACER_NAME = "bursary-api";

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

/** Probe endpoints hit every few seconds by the orchestrator; traced they only add noise. */
const UNTRACED_PATHS = new Set(["/health", "/ready", "/metrics"]);

export function isUntracedPath(url: string | undefined): boolean {
  if (!url) return false;
  return UNTRACED_PATHS.has(url.split("?")[0]);
}

function shouldEnableTracing(): boolean {
  const explicit = process.env.OTEL_ENABLED;
  if (explicit === "false") return false;
  if (explicit === "true") return true;
  return process.env.NODE_ENV !== "test" && process.env.VITEST !== "true";
}

function buildTraceExporter(): OTLPTraceExporter | undefined {
  const endpoint = (process.env.OTEL_EXPORTER_OTLP_TRACES_ENDPOINT || process.env.OTEL_EXPORTER_OTLP_ENDPOINT || "").trim();
  return endpoint ? new OTLPTraceExporter({ url: endpoint }) : undefined;
}

export function startTracing(): void {
  if (started || !shouldEnableTracing()) return;

  const diagLevel = DIAG_LEVELS[(process.env.OTEL_DIAG_LOG_LEVEL || "").trim().toUpperCase()];
  if (diagLevel !== undefined) {
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
          },
        }),
        getNodeAutoInstrumentations({
          "@opentelemetry/instrumentation-fs": { enabled: false },
          // Registered above with the request id hook.
          "@opentelemetry/instrumentation-fastify": { enabled: false },
          "@opentelemetry/instrumentation-http": {
            ignoreIncomingRequestHook: (request) => isUntracedPath(request.url),
          },
          "@opentelemetry/instrumentation-pg": { enhancedDatabaseReporting: false },
        }),
      ],
    });
    sdk.start();
    started = true;
  } catch (error) {
    // Startup continues untraced.
    logError("Failed to initialize OpenTelemetry tracing", { error });
  }
}

export async function shutdownTracing(): Promise<void> {
  if (!sdk || !started) return;
  await sdk.shutdown();
  started = false;
  sdk = null;
}

/**
 * Run `fn` inside an active span. Exceptions are recorded on the span and rethrown.
 * Without a started SDK the API's no-op tracer makes this a plain call.
 */
export async function withSpan<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: () => Promise<T>
): Promise<T> {
  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { attributes }, async (span) => {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof Error) {
        span.recordException(error);
        span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
      }
      throw error;
    } finally {
      span.end();
    }
  });
}
