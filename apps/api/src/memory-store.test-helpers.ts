import type {
  ApplicationFields,
  ApplicationStatus,
  DeadlineInput,
  DeadlineWindow,
  DocumentSlot,
  StatusLogEntry,
  StoredDocument,
} from "@bursary/shared";
import type {
  ApplicationListFilters,
  ApplicationRecord,
  ApplicationStore,
  DecisionTiming,
  DocumentAttachment,
  FieldMatchQuery,
  NewApplication,
  Page,
  PageRequest,
  StatusChange,
  UpdateOptions,
} from "./application-store";
import type { DeadlineStore } from "./deadlines";
import { duplicateReason } from "./duplicate-detection";
import { ConflictError, DuplicateBlockedError, NotFoundError } from "./errors";
import { generateReferenceNumber, withUniqueReference } from "./reference-number";

// ── Fixtures ──────────────────────────────────────────────────────────────────

export const FIXED_NOW = new Date("2026-03-10T12:00:00.000Z");

export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

export function hoursBefore(now: Date, hours: number): Date {
  return new Date(now.getTime() - hours * HOUR_MS);
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/** Parsed applicant fields, as intake stores them. */
export function sampleFields(overrides: Partial<ApplicationFields> = {}): ApplicationFields {
  return {
    fullName: "Jane Mwende",
    gender: "female",
    disability: false,
    idNumber: "12345678",
    phoneNumber: "+254712345678",
    email: "jane.mwende@example.com",
    guardianPhone: "+254722000111",
    guardianId: "87654321",
    ward: "kivaa",
    village: "Kivaa Market",
    chiefName: "Peter Musyoka",
    chiefPhone: "+254733000222",
    subChiefName: "Mary Ndunge",
    subChiefPhone: "+254744000333",
    levelOfStudy: "degree",
    institutionType: "university",
    institutionName: "Machakos University",
    admissionNumber: "MU/2025/001",
    amount: 45000,
    modeOfStudy: "full-time",
    yearOfStudy: "first-year",
    familyStatus: "single-parent",
    fatherIncome: null,
    motherIncome: "low",
    confirmation: true,
    dataConsent: true,
    communicationConsent: true,
    ...overrides,
  };
}

// ── Application store ─────────────────────────────────────────────────────────

class ReferenceTaken extends Error {}

function copy<T>(value: T): T {
  return structuredClone(value);
}

function matchesText(stored: string, wanted: string): boolean {
  return stored.toLowerCase() === wanted.toLowerCase();
}

function byNewest(a: ApplicationRecord, b: ApplicationRecord): number {
  return b.submittedAt.getTime() - a.submittedAt.getTime() || b.id - a.id;
}

interface StoredLog extends StatusLogEntry {
  applicationId: number;
}

export class InMemoryApplicationStore implements ApplicationStore {
  private readonly records = new Map<string, ApplicationRecord>();
  private readonly logs: StoredLog[] = [];
  private nextId = 1;
  private nextLogId = 1;

  constructor(private readonly generate: () => string = generateReferenceNumber) {}

  /** Insert a record directly, bypassing intake. */
  seed(
    overrides: Partial<ApplicationFields> & {
      referenceNumber?: string;
      status?: ApplicationStatus;
      submittedAt?: Date;
      documents?: ApplicationRecord["documents"];
    } = {}
  ): ApplicationRecord {
    const { referenceNumber, status, submittedAt, documents, ...fields } = overrides;
    const submitted = submittedAt ?? FIXED_NOW;
    const record: ApplicationRecord = {
      ...sampleFields(fields),
      id: this.nextId++,
      referenceNumber: referenceNumber ?? this.generate(),
      status: status ?? "pending",
      documents: documents ?? {},
      submittedAt: submitted,
      updatedAt: submitted,
    };
    this.records.set(record.referenceNumber, record);
    return copy(record);
  }

  /** Append a log row directly, e.g. a historical decision. */
  seedLog(referenceNumber: string, entry: Omit<StatusLogEntry, "id" | "referenceNumber">): StatusLogEntry {
    const record = this.records.get(referenceNumber);
    if (!record) throw new NotFoundError();
    const log: StoredLog = { ...entry, id: this.nextLogId++, referenceNumber, applicationId: record.id };
    this.logs.push(log);
    return copy(log);
  }

  /** Overwrite fields without going through the service, e.g. to simulate another writer. */
  patch(referenceNumber: string, changes: Partial<ApplicationRecord>): void {
    const record = this.records.get(referenceNumber);
    if (!record) throw new NotFoundError();
    this.records.set(referenceNumber, { ...record, ...changes });
  }

  get size(): number {
    return this.records.size;
  }

  get logCount(): number {
    return this.logs.length;
  }

  async findByReferenceNumber(referenceNumber: string): Promise<ApplicationRecord | null> {
    const record = this.records.get(referenceNumber);
    return record ? copy(record) : null;
  }

  async findById(id: number): Promise<ApplicationRecord | null> {
    const record = [...this.records.values()].find((r) => r.id === id);
    return record ? copy(record) : null;
  }

  async queryByFields(match: FieldMatchQuery): Promise<ApplicationRecord[]> {
    const hasField = [
      match.idNumber,
      match.email,
      match.phoneNumber,
      match.institutionName,
      match.admissionNumber,
      match.fullName,
      match.ward,
    ].some((value) => value !== undefined);
    if (!hasField) return [];

    return [...this.records.values()]
      .filter((r) => match.idNumber === undefined || r.idNumber === match.idNumber)
      .filter((r) => match.email === undefined || matchesText(r.email, match.email))
      .filter((r) => match.phoneNumber === undefined || r.phoneNumber === match.phoneNumber)
      .filter((r) => match.institutionName === undefined || matchesText(r.institutionName, match.institutionName))
      .filter((r) => match.admissionNumber === undefined || r.admissionNumber === match.admissionNumber)
      .filter((r) => match.fullName === undefined || matchesText(r.fullName, match.fullName))
      .filter((r) => match.ward === undefined || r.ward === match.ward)
      .filter((r) => !match.submittedSince || r.submittedAt.getTime() >= match.submittedSince.getTime())
      .filter((r) => !match.excludeStatuses || !match.excludeStatuses.includes(r.status))
      .sort((a, b) => a.submittedAt.getTime() - b.submittedAt.getTime() || a.id - b.id)
      .map(copy);
  }

  async create(input: NewApplication): Promise<ApplicationRecord> {
    const { submittedAt, ...fields } = input;
    return withUniqueReference(
      async (referenceNumber) => {
        if (this.records.has(referenceNumber)) throw new ReferenceTaken(referenceNumber);
        const existing = [...this.records.values()].find((r) => r.idNumber === fields.idNumber);
        if (existing) {
          throw new DuplicateBlockedError(
            duplicateReason("exact_id", existing.referenceNumber, { idNumber: fields.idNumber }),
            existing.referenceNumber,
            "exact_id"
          );
        }
        const record: ApplicationRecord = {
          ...fields,
          id: this.nextId++,
          referenceNumber,
          status: "pending",
          documents: {},
          submittedAt,
          updatedAt: submittedAt,
        };
        this.records.set(referenceNumber, record);
        return copy(record);
      },
      (error) => error instanceof ReferenceTaken,
      this.generate
    );
  }

  async update(
    referenceNumber: string,
    changes: Partial<ApplicationFields>,
    options: UpdateOptions
  ): Promise<ApplicationRecord> {
    const current = this.records.get(referenceNumber);
    if (!current) throw new NotFoundError();
    if (options.expectedStatus && current.status !== options.expectedStatus) {
      throw new ConflictError(
        `Application status changed from ${options.expectedStatus} to ${current.status} by another request`
      );
    }
    const updated: ApplicationRecord = { ...current, ...changes, updatedAt: options.at };
    this.records.set(referenceNumber, updated);
    if (options.log) {
      this.logs.push({ ...options.log, id: this.nextLogId++, referenceNumber, applicationId: current.id });
    }
    return copy(updated);
  }

  async recordStatusChange(
    referenceNumber: string,
    from: ApplicationStatus,
    to: ApplicationStatus,
    actor: string | null,
    reason: string | null,
    at: Date
  ): Promise<StatusChange> {
    const current = this.records.get(referenceNumber);
    if (!current) throw new NotFoundError();
    if (current.status !== from) {
      throw new ConflictError(`Application status changed from ${from} to ${current.status} by another request`);
    }
    const updated: ApplicationRecord = { ...current, status: to, updatedAt: at };
    this.records.set(referenceNumber, updated);
    const log: StoredLog = {
      id: this.nextLogId++,
      referenceNumber,
      applicationId: current.id,
      oldStatus: from,
      newStatus: to,
      changedBy: actor,
      reason,
      changedAt: at,
    };
    this.logs.push(log);
    const { applicationId: _applicationId, ...entry } = log;
    return { record: copy(updated), log: copy(entry) };
  }

  async delete(referenceNumber: string): Promise<ApplicationRecord | null> {
    const record = this.records.get(referenceNumber);
    if (!record) return null;
    this.records.delete(referenceNumber);
    for (let i = this.logs.length - 1; i >= 0; i--) {
      if (this.logs[i].applicationId === record.id) this.logs.splice(i, 1);
    }
    return copy(record);
  }

  async listStatusLogs(referenceNumber: string): Promise<StatusLogEntry[]> {
    const record = this.records.get(referenceNumber);
    if (!record) return [];
    return this.logs
      .filter((log) => log.applicationId === record.id)
      .sort((a, b) => b.changedAt.getTime() - a.changedAt.getTime() || b.id - a.id)
      .map(({ applicationId: _applicationId, ...entry }) => copy(entry));
  }

  async list(filters: ApplicationListFilters, page: PageRequest): Promise<Page<ApplicationRecord>> {
    const all = await this.listForReport(filters);
    const offset = (page.page - 1) * page.pageSize;
    return { items: all.slice(offset, offset + page.pageSize), total: all.length, ...page };
  }

  async listForReport(filters: ApplicationListFilters): Promise<ApplicationRecord[]> {
    const search = filters.search?.toLowerCase();
    return [...this.records.values()]
      .filter((r) => !filters.status || r.status === filters.status)
      .filter((r) => !filters.ward || r.ward === filters.ward)
      .filter((r) => !filters.startDate || r.submittedAt.getTime() >= filters.startDate.getTime())
      .filter((r) => !filters.endDate || r.submittedAt.getTime() <= filters.endDate.getTime())
      .filter(
        (r) =>
          !search ||
          [r.referenceNumber, r.fullName, r.idNumber, r.email, r.institutionName]
            .join(" ")
            .toLowerCase()
            .includes(search)
      )
      .sort(byNewest)
      .map(copy);
  }

  async listDecisionTimings(): Promise<DecisionTiming[]> {
    const timings: DecisionTiming[] = [];
    for (const record of this.records.values()) {
      const decisions = this.logs
        .filter(
          (log) =>
            log.applicationId === record.id &&
            (log.newStatus === "approved" || log.newStatus === "rejected") &&
            log.oldStatus !== log.newStatus
        )
        .map((log) => log.changedAt.getTime());
      if (decisions.length === 0) continue;
      timings.push({
        referenceNumber: record.referenceNumber,
        submittedAt: record.submittedAt,
        decidedAt: new Date(Math.min(...decisions)),
      });
    }
    return timings;
  }

  async attachDocument(
    referenceNumber: string,
    slot: DocumentSlot,
    document: StoredDocument,
    at: Date
  ): Promise<DocumentAttachment> {
    const current = this.records.get(referenceNumber);
    if (!current) throw new NotFoundError();
    const previous = current.documents[slot] ?? null;
    const updated: ApplicationRecord = {
      ...current,
      documents: { ...current.documents, [slot]: document },
      updatedAt: at,
    };
    this.records.set(referenceNumber, updated);
    return { record: copy(updated), previous: previous ? copy(previous) : null };
  }
}

// ── Deadline store ────────────────────────────────────────────────────────────

export class InMemoryDeadlineStore implements DeadlineStore {
  private readonly windows: DeadlineWindow[] = [];
  private nextId = 1;

  async getActive(): Promise<DeadlineWindow | null> {
    const active = this.windows.find((w) => w.isActive);
    return active ? copy(active) : null;
  }

  async list(): Promise<DeadlineWindow[]> {
    return [...this.windows]
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id)
      .map(copy);
  }

  async create(input: DeadlineInput, at: Date): Promise<DeadlineWindow> {
    if (input.isActive) this.deactivateAll(at);
    const window: DeadlineWindow = { id: this.nextId++, ...input, createdAt: at, updatedAt: at };
    this.windows.push(window);
    return copy(window);
  }

  async activate(id: number, at: Date): Promise<DeadlineWindow> {
    const target = this.find(id);
    this.deactivateAll(at);
    target.isActive = true;
    target.updatedAt = at;
    return copy(target);
  }

  async deactivate(id: number, at: Date): Promise<DeadlineWindow> {
    const target = this.find(id);
    target.isActive = false;
    target.updatedAt = at;
    return copy(target);
  }

  private find(id: number): DeadlineWindow {
    const target = this.windows.find((w) => w.id === id);
    if (!target) throw new NotFoundError(`Deadline ${id} not found`, "DEADLINE_NOT_FOUND");
    return target;
  }

  private deactivateAll(at: Date): void {
    for (const window of this.windows) {
      if (window.isActive) {
        window.isActive = false;
        window.updatedAt = at;
      }
    }
  }
}

// ── Assertions ────────────────────────────────────────────────────────────────

/** The error a promise rejects with; fails the test if it resolves. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected promise to reject");
}
