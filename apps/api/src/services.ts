/**
 * Service container: one instance of each store and service, wired to the
 * Postgres stores and the transports configured in the environment.
 * Tests build their own container from in-memory stores.
 */
import { AnalyticsService } from "./analytics";
import { PgApplicationStore, type ApplicationStore } from "./application-store";
import { ApplicationService } from "./applications";
import { CommunicationService } from "./communications";
import { PgDeadlineStore, type DeadlineStore } from "./deadlines";
import { DocumentService } from "./documents";
import { DuplicateDetector } from "./duplicate-detection";
import { ExportService } from "./exports";
import { NotificationQueue } from "./notification-queue";
import { NotificationDispatcher } from "./notifications";
import { StatusTransitionService } from "./status-transitions";
import { createStorageFromEnv, type StorageAdapter } from "./storage";
import { createEmailTransport, type EmailTransport } from "./transports/email";
import { createSmsTransport, type SmsTransport } from "./transports/sms";

export interface Services {
  store: ApplicationStore;
  deadlines: DeadlineStore;
  queue: NotificationQueue;
  notifier: NotificationDispatcher;
  storage: StorageAdapter;
  applications: ApplicationService;
  documents: DocumentService;
  transitions: StatusTransitionService;
  analytics: AnalyticsService;
  exports: ExportService;
  communications: CommunicationService;
  clock: () => Date;
}

export interface ServiceOverrides {
  store?: ApplicationStore;
  deadlines?: DeadlineStore;
  storage?: StorageAdapter;
  email?: EmailTransport;
  sms?: SmsTransport;
  queue?: NotificationQueue;
  clock?: () => Date;
  signature?: string;
}

export function createServices(overrides: ServiceOverrides = {}): Services {
  const clock = overrides.clock ?? (() => new Date());
  const store = overrides.store ?? new PgApplicationStore();
  const deadlines = overrides.deadlines ?? new PgDeadlineStore();
  const storage = overrides.storage ?? createStorageFromEnv();
  const queue = overrides.queue ?? new NotificationQueue();
  const notifier = new NotificationDispatcher({
    email: overrides.email ?? createEmailTransport(),
    sms: overrides.sms ?? createSmsTransport(),
    queue,
    signature: overrides.signature,
  });
  const analytics = new AnalyticsService({ store, clock });
  const onChange = () => analytics.invalidate();

  return {
    store,
    deadlines,
    queue,
    notifier,
    storage,
    clock,
    analytics,
    applications: new ApplicationService({
      store,
      deadlines,
      detector: new DuplicateDetector(store),
      notifier,
      storage,
      clock,
      onChange,
    }),
    documents: new DocumentService({ store, deadlines, storage, clock }),
    transitions: new StatusTransitionService({ store, notifier, clock, onChange }),
    exports: new ExportService({ store, analytics, clock }),
    communications: new CommunicationService({ store, deadlines, notifier, clock }),
  };
}

/** Stop intake and give queued notifications up to `timeoutMs` to finish. */
export async function shutdownServices(services: Services, timeoutMs: number): Promise<boolean> {
  return services.queue.shutdown(timeoutMs);
}
