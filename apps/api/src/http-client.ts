/**
 * Outbound HTTP for notification gateways: per-attempt timeout, bounded
 * retries with exponential backoff, and a per-host circuit breaker.
 *
 * 4xx responses are returned to the caller as-is; only network errors,
 * timeouts and (optionally) 5xx responses are retried.
 */
import { logError, logWarn } from "./logger";
import { recordOutboundRequest, recordOutboundRetry, setOutboundCircuitState } from "./observability/metrics";

export interface ResilientFetchOptions extends RequestInit {
  timeoutMs?: number;
  /** Retries after the first attempt. */
  maxRetries?: number;
  retryOn5xx?: boolean;
  backoffMs?: number;
}

export interface HttpClientDeps {
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  failureThreshold?: number;
  resetAfterMs?: number;
}

export class CircuitOpenError extends Error {
  constructor(readonly host: string) {
    super(`Circuit breaker open for ${host}: upstream service unavailable`);
    this.name = "CircuitOpenError";
  }
}

const MAX_BACKOFF_MS = 4_000;

/** Opens after `threshold` consecutive failures; lets a probe through once `resetAfterMs` has passed. */
export class HostCircuitBreaker {
  private readonly hosts = new Map<string, { failures: number; lastFailure: number; open: boolean }>();

  constructor(
    private readonly threshold: number,
    private readonly resetAfterMs: number,
    private readonly now: () => number
  ) {}

  isOpen(host: string): boolean {
    const state = this.hosts.get(host);
    if (!state?.open) return false;
    return this.now() - state.lastFailure <= this.resetAfterMs;
  }

  success(host: string): void {
    const state = this.hosts.get(host);
    if (!state) return;
    if (state.open) setOutboundCircuitState(host, false);
    this.hosts.delete(host);
  }

  failure(host: string): void {
    const state = this.hosts.get(host) ?? { failures: 0, lastFailure: 0, open: false };
    state.failures++;
    state.lastFailure = this.now();
    if (state.failures >= this.threshold && !state.open) {
      state.open = true;
      setOutboundCircuitState(host, true);
      logWarn("Circuit breaker opened", { host, failures: state.failures });
    }
    this.hosts.set(host, state);
  }

  reset(): void {
    this.hosts.clear();
  }
}

function hostOf(url: string): string {
  try {
    return new URL(url).host;
  } catch {
    return url;
  }
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function createResilientFetch(deps: HttpClientDeps = {}) {
  const fetchImpl = deps.fetchImpl ?? fetch;
  const sleep = deps.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
  const breaker = new HostCircuitBreaker(deps.failureThreshold ?? 5, deps.resetAfterMs ?? 60_000, deps.now ?? Date.now);

  async function resilient(url: string, options: ResilientFetchOptions = {}): Promise<Response> {
    const { timeoutMs = 30_000, maxRetries = 3, retryOn5xx = true, backoffMs = 500, ...init } = options;
    const host = hostOf(url);

    if (breaker.isOpen(host)) {
      recordOutboundRequest(host, "failure");
      throw new CircuitOpenError(host);
    }

    let lastError: Error = new Error(`Request to ${host} failed`);
    for (let attempt = 0; attempt <= maxRetries; attempt++) {
      if (attempt > 0) {
        await sleep(Math.min(backoffMs * 2 ** (attempt - 1), MAX_BACKOFF_MS));
      }

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);
      let reason: "timeout" | "5xx" | "network";
      try {
        const response = await fetchImpl(url, { ...init, signal: controller.signal });
        if (!(retryOn5xx && response.status >= 500)) {
          breaker.success(host);
          recordOutboundRequest(host, "success");
          return response;
        }
        if (attempt === maxRetries) {
          breaker.failure(host);
          recordOutboundRequest(host, "failure");
          return response;
        }
        lastError = new Error(`HTTP ${response.status} from ${host}`);
        reason = "5xx";
      } catch (error) {
        lastError = isAbortError(error)
          ? new Error(`Request to ${host} timed out after ${timeoutMs}ms`)
          : error instanceof Error
            ? error
            : new Error(String(error));
        reason = isAbortError(error) ? "timeout" : "network";
      } finally {
        clearTimeout(timer);
      }

      breaker.failure(host);
      if (attempt < maxRetries) {
        recordOutboundRequest(host, "retry");
        recordOutboundRetry(host, reason);
        logWarn("Outbound request failed, retrying", { host, attempt: attempt + 1, error: lastError.message });
      }
    }

    recordOutboundRequest(host, "failure");
    logError("Outbound request failed after all retries", { host, maxRetries, error: lastError.message });
    throw lastError;
  }

  return Object.assign(resilient, { breaker });
}

export type ResilientFetch = ReturnType<typeof createResilientFetch>;

/** Process-wide client used by the gateway transports. */
export const resilientFetch: ResilientFetch = createResilientFetch();
