/**
 * Bounded worker pool for notification sends.
 *
 * Keeps slow SMTP/SMS calls off the request path. Tasks are fire-and-forget
 * through `enqueue`, or awaited through `run` for bulk operations that report
 * per-recipient results. Pending tasks are not cancellable; `shutdown` stops
 * intake and waits, up to a bound, for the work already accepted.
 */
import pLimit from "p-limit";
import { getLogContext, runWithLogContext } from "./log-context";
import { logError, logInfo, logWarn } from "./logger";
import { recordNotificationTask, updateNotificationQueueMetric } from "./observability/metrics";
import { parseBoundedIntEnv } from "./runtime-safety";

export const MIN_NOTIFY_CONCURRENCY = 2;
export const MAX_NOTIFY_CONCURRENCY = 5;
export const DEFAULT_NOTIFY_CONCURRENCY = 3;

export type NotificationQueueStats = {
  concurrency: number;
  accepting: boolean;
  queued: number;
  active: number;
  pending: number;
  succeeded: number;
  failed: number;
  rejected: number;
};

export class QueueClosedError extends Error {
  constructor() {
    super("Notification queue is not accepting tasks");
    this.name = "QueueClosedError";
  }
}

export function resolveNotifyConcurrency(raw: string | undefined = process.env.NOTIFY_CONCURRENCY): number {
  return parseBoundedIntEnv(raw, DEFAULT_NOTIFY_CONCURRENCY, MIN_NOTIFY_CONCURRENCY, MAX_NOTIFY_CONCURRENCY);
}

export class NotificationQueue {
  readonly concurrency: number;
  private readonly limit: pLimit.Limit;
  private readonly inFlight = new Set<Promise<unknown>>();
  private accepting = false;
  private counts = { queued: 0, succeeded: 0, failed: 0, rejected: 0 };

  constructor(concurrency: number = resolveNotifyConcurrency()) {
    this.concurrency = Math.min(MAX_NOTIFY_CONCURRENCY, Math.max(MIN_NOTIFY_CONCURRENCY, Math.trunc(concurrency)));
    this.limit = pLimit(this.concurrency);
  }

  start(): void {
    if (this.accepting) return;
    this.accepting = true;
    logInfo("Notification queue started", { concurrency: this.concurrency });
  }

  get isAccepting(): boolean {
    return this.accepting;
  }

  /**
   * Schedule a task without waiting for it. Failures are logged and counted.
   * Returns false when the queue is not accepting work.
   */
  enqueue(name: string, task: () => Promise<void>): boolean {
    if (!this.accepting) {
      this.counts.rejected++;
      recordNotificationTask("rejected");
      logWarn("Notification task rejected, queue not accepting", { task: name });
      return false;
    }
    this.schedule(name, task).catch((error: unknown) => {
      logError("Notification task failed", { task: name, error });
    });
    return true;
  }

  /** Schedule a task and wait for its result. Rejects with `QueueClosedError` after shutdown. */
  async run<T>(name: string, task: () => Promise<T>): Promise<T> {
    if (!this.accepting) {
      this.counts.rejected++;
      recordNotificationTask("rejected");
      throw new QueueClosedError();
    }
    return this.schedule(name, task);
  }

  /** Resolves once every accepted task has settled. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  /** Stop accepting tasks and wait up to `timeoutMs` for accepted ones. Returns whether they all settled. */
  async shutdown(timeoutMs: number): Promise<boolean> {
    this.accepting = false;
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      const drained = await Promise.race([this.drain().then((): true => true), timedOut]);
      if (!drained) {
        logWarn("Notification queue shutdown timed out", {
          timeoutMs,
          active: this.limit.activeCount,
          pending: this.limit.pendingCount,
        });
      } else {
        logInfo("Notification queue drained", this.stats());
      }
      return drained;
    } finally {
      clearTimeout(timer);
    }
  }

  stats(): NotificationQueueStats {
    return {
      concurrency: this.concurrency,
      accepting: this.accepting,
      queued: this.counts.queued,
      active: this.limit.activeCount,
      pending: this.limit.pendingCount,
      succeeded: this.counts.succeeded,
      failed: this.counts.failed,
      rejected: this.counts.rejected,
    };
  }

  private schedule<T>(name: string, task: () => Promise<T>): Promise<T> {
    const context = getLogContext();
    this.counts.queued++;
    recordNotificationTask("queued");

    const promise = this.limit(() =>
      runWithLogContext(context, async () => {
        this.publishDepth();
        try {
          const result = await task();
          this.counts.succeeded++;
          recordNotificationTask("succeeded");
          return result;
        } catch (error) {
          this.counts.failed++;
          recordNotificationTask("failed");
          throw error;
        }
      })
    );

    this.inFlight.add(promise);
    const settle = () => {
      this.inFlight.delete(promise);
      this.publishDepth();
    };
    void promise.then(settle, settle);
    this.publishDepth();
    return promise;
  }

  private publishDepth(): void {
    updateNotificationQueueMetric({ active: this.limit.activeCount, pending: this.limit.pendingCount });
  }
}
