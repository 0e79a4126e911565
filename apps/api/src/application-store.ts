/**
 * Persistence for bursary applications and their status log.
 *
 * `ApplicationStore` is the seam the services depend on. `PgApplicationStore`
 * is the production implementation; tests use the in-memory one from
 * `memory-store.test-helpers.ts`.
 */
import type { PoolClient, QueryResultRow } from "pg";
import type {
  ApplicationDocuments,
  ApplicationFields,
  ApplicationStatus,
  DocumentSlot,
  StatusLogEntry,
  StoredDocument,
  Ward,
} from "@bursary/shared";
import { isUniqueViolation, query, withTransaction } from "./db";
import { duplicateReason } from "./duplicate-detection";
import { ConflictError, DuplicateBlockedError, NotFoundError } from "./errors";
import { withUniqueReference } from "./reference-number";

export interface ApplicationRecord extends ApplicationFields {
  id: number;
  referenceNumber: string;
  status: ApplicationStatus;
  documents: ApplicationDocuments;
  submittedAt: Date;
  updatedAt: Date;
}

export type NewApplication = ApplicationFields & { submittedAt: Date };

export interface NewStatusLog {
  oldStatus: ApplicationStatus | null;
  newStatus: ApplicationStatus;
  changedBy: string | null;
  reason: string | null;
  changedAt: Date;
}

/** Exact-field lookup used by duplicate detection. Text comparisons on email, institution and name ignore case. */
export interface FieldMatchQuery {
  idNumber?: string;
  email?: string;
  phoneNumber?: string;
  institutionName?: string;
  admissionNumber?: string;
  fullName?: string;
  ward?: Ward;
  submittedSince?: Date;
  excludeStatuses?: ApplicationStatus[];
}

export interface ApplicationListFilters {
  status?: ApplicationStatus;
  ward?: Ward;
  /** Inclusive bounds on `submittedAt`. */
  startDate?: Date;
  endDate?: Date;
  search?: string;
}

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface Page<T> {
  items: T[];
  total: number;
  page: number;
  pageSize: number;
}

export interface UpdateOptions {
  at: Date;
  /** Refuse the write with `ConflictError` if the status moved since it was read. */
  expectedStatus?: ApplicationStatus;
  log?: NewStatusLog;
}

export interface StatusChange {
  record: ApplicationRecord;
  log: StatusLogEntry;
}

export interface DocumentAttachment {
  record: ApplicationRecord;
  previous: StoredDocument | null;
}

export interface DecisionTiming {
  referenceNumber: string;
  submittedAt: Date;
  decidedAt: Date;
}

export interface ApplicationStore {
  findByReferenceNumber(referenceNumber: string): Promise<ApplicationRecord | null>;
  findById(id: number): Promise<ApplicationRecord | null>;
  /** Matching records, earliest submission first. */
  queryByFields(match: FieldMatchQuery): Promise<ApplicationRecord[]>;
  create(input: NewApplication): Promise<ApplicationRecord>;
  update(referenceNumber: string, changes: Partial<ApplicationFields>, options: UpdateOptions): Promise<ApplicationRecord>;
  /** Lock the record, verify it is still in `from`, move it to `to` and append one log entry. */
  recordStatusChange(
    referenceNumber: string,
    from: ApplicationStatus,
    to: ApplicationStatus,
    actor: string | null,
    reason: string | null,
    at: Date
  ): Promise<StatusChange>;
  /** Deletes the record and, by cascade, its log. Returns what was deleted. */
  delete(referenceNumber: string): Promise<ApplicationRecord | null>;
  /** Newest first. */
  listStatusLogs(referenceNumber: string): Promise<StatusLogEntry[]>;
  list(filters: ApplicationListFilters, page: PageRequest): Promise<Page<ApplicationRecord>>;
  /** Every matching record, newest first. */
  listForReport(filters: ApplicationListFilters): Promise<ApplicationRecord[]>;
  /** First approve/reject decision per decided application. */
  listDecisionTimings(): Promise<DecisionTiming[]>;
  attachDocument(
    referenceNumber: string,
    slot: DocumentSlot,
    document: StoredDocument,
    at: Date
  ): Promise<DocumentAttachment>;
}

// ── PostgreSQL implementation ──

export const REFERENCE_CONSTRAINT = "bursary_application_reference_number_key";
export const ID_NUMBER_CONSTRAINT = "bursary_application_id_number_key";

/** Field → column, in insert order. */
const FIELD_COLUMNS: ReadonlyArray<readonly [keyof ApplicationFields, string]> = [
  ["fullName", "full_name"],
  ["gender", "gender"],
  ["disability", "disability"],
  ["idNumber", "id_number"],
  ["phoneNumber", "phone_number"],
  ["email", "email"],
  ["guardianPhone", "guardian_phone"],
  ["guardianId", "guardian_id"],
  ["ward", "ward"],
  ["village", "village"],
  ["chiefName", "chief_name"],
  ["chiefPhone", "chief_phone"],
  ["subChiefName", "sub_chief_name"],
  ["subChiefPhone", "sub_chief_phone"],
  ["levelOfStudy", "level_of_study"],
  ["institutionType", "institution_type"],
  ["institutionName", "institution_name"],
  ["admissionNumber", "admission_number"],
  ["amount", "amount"],
  ["modeOfStudy", "mode_of_study"],
  ["yearOfStudy", "year_of_study"],
  ["familyStatus", "family_status"],
  ["fatherIncome", "father_income"],
  ["motherIncome", "mother_income"],
  ["confirmation", "confirmation"],
  ["dataConsent", "data_consent"],
  ["communicationConsent", "communication_consent"],
];

export interface ApplicationRow extends QueryResultRow {
  id: string;
  reference_number: string;
  full_name: string;
  gender: ApplicationFields["gender"];
  disability: boolean;
  id_number: string;
  phone_number: string;
  email: string;
  guardian_phone: string;
  guardian_id: string;
  ward: Ward;
  village: string;
  chief_name: string;
  chief_phone: string;
  sub_chief_name: string;
  sub_chief_phone: string;
  level_of_study: ApplicationFields["levelOfStudy"];
  institution_type: ApplicationFields["institutionType"];
  institution_name: string;
  admission_number: string;
  amount: number;
  mode_of_study: ApplicationFields["modeOfStudy"];
  year_of_study: ApplicationFields["yearOfStudy"];
  family_status: ApplicationFields["familyStatus"];
  father_income: ApplicationFields["fatherIncome"];
  mother_income: ApplicationFields["motherIncome"];
  confirmation: boolean;
  data_consent: boolean;
  communication_consent: boolean;
  documents: ApplicationDocuments | null;
  status: ApplicationStatus;
  submitted_at: Date;
  updated_at: Date;
}

export interface StatusLogRow extends QueryResultRow {
  id: string;
  reference_number: string;
  old_status: ApplicationStatus | null;
  new_status: ApplicationStatus;
  changed_by: string | null;
  reason: string | null;
  changed_at: Date;
}

interface DecisionTimingRow extends QueryResultRow {
  reference_number: string;
  submitted_at: Date;
  decided_at: Date;
}

export function rowToApplication(row: ApplicationRow): ApplicationRecord {
  return {
    id: Number(row.id),
    referenceNumber: row.reference_number,
    fullName: row.full_name,
    gender: row.gender,
    disability: row.disability,
    idNumber: row.id_number,
    phoneNumber: row.phone_number,
    email: row.email,
    guardianPhone: row.guardian_phone,
    guardianId: row.guardian_id,
    ward: row.ward,
    village: row.village,
    chiefName: row.chief_name,
    chiefPhone: row.chief_phone,
    subChiefName: row.sub_chief_name,
    subChiefPhone: row.sub_chief_phone,
    levelOfStudy: row.level_of_study,
    institutionType: row.institution_type,
    institutionName: row.institution_name,
    admissionNumber: row.admission_number,
    amount: Number(row.amount),
    modeOfStudy: row.mode_of_study,
    yearOfStudy: row.year_of_study,
    familyStatus: row.family_status,
    fatherIncome: row.father_income ?? null,
    motherIncome: row.mother_income ?? null,
    confirmation: row.confirmation,
    dataConsent: row.data_consent,
    communicationConsent: row.communication_consent,
    documents: row.documents ?? {},
    status: row.status,
    submittedAt: new Date(row.submitted_at),
    updatedAt: new Date(row.updated_at),
  };
}

export function rowToStatusLog(row: StatusLogRow): StatusLogEntry {
  return {
    id: Number(row.id),
    referenceNumber: row.reference_number,
    oldStatus: row.old_status,
    newStatus: row.new_status,
    changedBy: row.changed_by,
    reason: row.reason,
    changedAt: new Date(row.changed_at),
  };
}

/** WHERE clause shared by the paged list and the report query. */
export function buildFilterClause(
  filters: ApplicationListFilters,
  firstParam = 1
): { where: string; params: unknown[] } {
  const conditions: string[] = [];
  const params: unknown[] = [];
  let idx = firstParam;

  if (filters.status) {
    conditions.push(`status = $${idx++}`);
    params.push(filters.status);
  }
  if (filters.ward) {
    conditions.push(`ward = $${idx++}`);
    params.push(filters.ward);
  }
  if (filters.startDate) {
    conditions.push(`submitted_at >= $${idx++}`);
    params.push(filters.startDate);
  }
  if (filters.endDate) {
    conditions.push(`submitted_at <= $${idx++}`);
    params.push(filters.endDate);
  }
  if (filters.search) {
    conditions.push(
      `(reference_number || ' ' || full_name || ' ' || id_number || ' ' || email || ' ' || institution_name) ILIKE $${idx++}`
    );
    params.push(`%${filters.search}%`);
  }

  return { where: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "", params };
}

async function lockByReference(client: PoolClient, referenceNumber: string): Promise<ApplicationRow> {
  const locked = await client.query<ApplicationRow>(
    "SELECT * FROM bursary_application WHERE reference_number = $1 FOR UPDATE",
    [referenceNumber]
  );
  const row = locked.rows[0];
  if (!row) throw new NotFoundError();
  return row;
}

async function insertStatusLog(
  client: PoolClient,
  applicationId: string,
  referenceNumber: string,
  log: NewStatusLog
): Promise<StatusLogEntry> {
  const inserted = await client.query<StatusLogRow>(
    `INSERT INTO application_status_log (application_id, old_status, new_status, changed_by, reason, changed_at)
     VALUES ($1, $2, $3, $4, $5, $6)
     RETURNING id, $7::text AS reference_number, old_status, new_status, changed_by, reason, changed_at`,
    [applicationId, log.oldStatus, log.newStatus, log.changedBy, log.reason, log.changedAt, referenceNumber]
  );
  return rowToStatusLog(inserted.rows[0]);
}

export class PgApplicationStore implements ApplicationStore {
  async findByReferenceNumber(referenceNumber: string): Promise<ApplicationRecord | null> {
    const result = await query<ApplicationRow>(
      "SELECT * FROM bursary_application WHERE reference_number = $1",
      [referenceNumber]
    );
    return result.rows[0] ? rowToApplication(result.rows[0]) : null;
  }

  async findById(id: number): Promise<ApplicationRecord | null> {
    const result = await query<ApplicationRow>("SELECT * FROM bursary_application WHERE id = $1", [id]);
    return result.rows[0] ? rowToApplication(result.rows[0]) : null;
  }

  async queryByFields(match: FieldMatchQuery): Promise<ApplicationRecord[]> {
    const conditions: string[] = [];
    const params: unknown[] = [];
    const add = (sql: (placeholder: string) => string, value: unknown) => {
      params.push(value);
      conditions.push(sql(`$${params.length}`));
    };

    if (match.idNumber !== undefined) add((p) => `id_number = ${p}`, match.idNumber);
    if (match.email !== undefined) add((p) => `LOWER(email) = LOWER(${p})`, match.email);
    if (match.phoneNumber !== undefined) add((p) => `phone_number = ${p}`, match.phoneNumber);
    if (match.institutionName !== undefined) {
      add((p) => `LOWER(institution_name) = LOWER(${p})`, match.institutionName);
    }
    if (match.admissionNumber !== undefined) add((p) => `admission_number = ${p}`, match.admissionNumber);
    if (match.fullName !== undefined) add((p) => `LOWER(full_name) = LOWER(${p})`, match.fullName);
    if (match.ward !== undefined) add((p) => `ward = ${p}`, match.ward);
    if (conditions.length === 0) return [];

    if (match.submittedSince) add((p) => `submitted_at >= ${p}`, match.submittedSince);
    if (match.excludeStatuses && match.excludeStatuses.length > 0) {
      add((p) => `status <> ALL(${p}::text[])`, match.excludeStatuses);
    }

    const result = await query<ApplicationRow>(
      `SELECT * FROM bursary_application WHERE ${conditions.join(" AND ")} ORDER BY submitted_at ASC, id ASC`,
      params
    );
    return result.rows.map(rowToApplication);
  }

  async create(input: NewApplication): Promise<ApplicationRecord> {
    const columns = FIELD_COLUMNS.map(([, column]) => column);
    const values: unknown[] = FIELD_COLUMNS.map(([field]) => input[field]);
    const placeholders = values.map((_, i) => `$${i + 2}`);
    const submittedAtParam = `$${values.length + 2}`;
    const sql = `INSERT INTO bursary_application (reference_number, ${columns.join(", ")}, status, submitted_at, updated_at)
      VALUES ($1, ${placeholders.join(", ")}, 'pending', ${submittedAtParam}, ${submittedAtParam})
      RETURNING *`;

    try {
      return await withUniqueReference(
        async (referenceNumber) => {
          const result = await query<ApplicationRow>(sql, [referenceNumber, ...values, input.submittedAt]);
          return rowToApplication(result.rows[0]);
        },
        (error) => isUniqueViolation(error, REFERENCE_CONSTRAINT)
      );
    } catch (error) {
      if (!isUniqueViolation(error, ID_NUMBER_CONSTRAINT)) throw error;
      const existing = await query<{ reference_number: string }>(
        "SELECT reference_number FROM bursary_application WHERE id_number = $1",
        [input.idNumber]
      );
      const existingReference = existing.rows[0]?.reference_number ?? "";
      throw new DuplicateBlockedError(duplicateReason("exact_id", existingReference, { idNumber: input.idNumber }), existingReference, "exact_id");
    }
  }

  async update(
    referenceNumber: string,
    changes: Partial<ApplicationFields>,
    options: UpdateOptions
  ): Promise<ApplicationRecord> {
    return withTransaction(async (client) => {
      const current = await lockByReference(client, referenceNumber);
      if (options.expectedStatus && current.status !== options.expectedStatus) {
        throw new ConflictError(
          `Application status changed from ${options.expectedStatus} to ${current.status} by another request`
        );
      }

      const assignments: string[] = [];
      const params: unknown[] = [];
      for (const [field, column] of FIELD_COLUMNS) {
        const value = changes[field];
        if (value === undefined) continue;
        params.push(value);
        assignments.push(`${column} = $${params.length}`);
      }
      params.push(options.at);
      assignments.push(`updated_at = $${params.length}`);
      params.push(current.id);

      const updated = await client.query<ApplicationRow>(
        `UPDATE bursary_application SET ${assignments.join(", ")} WHERE id = $${params.length} RETURNING *`,
        params
      );
      if (options.log) {
        await insertStatusLog(client, current.id, referenceNumber, options.log);
      }
      return rowToApplication(updated.rows[0]);
    });
  }

  async recordStatusChange(
    referenceNumber: string,
    from: ApplicationStatus,
    to: ApplicationStatus,
    actor: string | null,
    reason: string | null,
    at: Date
  ): Promise<StatusChange> {
    return withTransaction(async (client) => {
      const current = await lockByReference(client, referenceNumber);
      if (current.status !== from) {
        throw new ConflictError(`Application status changed from ${from} to ${current.status} by another request`);
      }
      const updated = await client.query<ApplicationRow>(
        "UPDATE bursary_application SET status = $1, updated_at = $2 WHERE id = $3 RETURNING *",
        [to, at, current.id]
      );
      const log = await insertStatusLog(client, current.id, referenceNumber, {
        oldStatus: from,
        newStatus: to,
        changedBy: actor,
        reason,
        changedAt: at,
      });
      return { record: rowToApplication(updated.rows[0]), log };
    });
  }

  async delete(referenceNumber: string): Promise<ApplicationRecord | null> {
    const result = await query<ApplicationRow>(
      "DELETE FROM bursary_application WHERE reference_number = $1 RETURNING *",
      [referenceNumber]
    );
    return result.rows[0] ? rowToApplication(result.rows[0]) : null;
  }

  async listStatusLogs(referenceNumber: string): Promise<StatusLogEntry[]> {
    const result = await query<StatusLogRow>(
      `SELECT l.id, a.reference_number, l.old_status, l.new_status, l.changed_by, l.reason, l.changed_at
       FROM application_status_log l
       JOIN bursary_application a ON a.id = l.application_id
       WHERE a.reference_number = $1
       ORDER BY l.changed_at DESC, l.id DESC`,
      [referenceNumber]
    );
    return result.rows.map(rowToStatusLog);
  }

  async list(filters: ApplicationListFilters, page: PageRequest): Promise<Page<ApplicationRecord>> {
    const { where, params } = buildFilterClause(filters);
    const countResult = await query<{ total: string }>(
      `SELECT COUNT(*) AS total FROM bursary_application ${where}`,
      params
    );
    const offset = (page.page - 1) * page.pageSize;
    const limitParam = params.length + 1;
    const result = await query<ApplicationRow>(
      `SELECT * FROM bursary_application ${where}
       ORDER BY submitted_at DESC, id DESC
       LIMIT $${limitParam} OFFSET $${limitParam + 1}`,
      [...params, page.pageSize, offset]
    );
    return {
      items: result.rows.map(rowToApplication),
      total: Number(countResult.rows[0]?.total ?? 0),
      page: page.page,
      pageSize: page.pageSize,
    };
  }

  async listForReport(filters: ApplicationListFilters): Promise<ApplicationRecord[]> {
    const { where, params } = buildFilterClause(filters);
    const result = await query<ApplicationRow>(
      `SELECT * FROM bursary_application ${where} ORDER BY submitted_at DESC, id DESC`,
      params
    );
    return result.rows.map(rowToApplication);
  }

  async listDecisionTimings(): Promise<DecisionTiming[]> {
    const result = await query<DecisionTimingRow>(
      `SELECT a.reference_number, a.submitted_at, MIN(l.changed_at) AS decided_at
       FROM bursary_application a
       JOIN application_status_log l ON l.application_id = a.id
       WHERE l.new_status IN ('approved', 'rejected')
         AND l.old_status IS DISTINCT FROM l.new_status
       GROUP BY a.id`
    );
    return result.rows.map((row) => ({
      referenceNumber: row.reference_number,
      submittedAt: new Date(row.submitted_at),
      decidedAt: new Date(row.decided_at),
    }));
  }

  async attachDocument(
    referenceNumber: string,
    slot: DocumentSlot,
    document: StoredDocument,
    at: Date
  ): Promise<DocumentAttachment> {
    return withTransaction(async (client) => {
      const current = await lockByReference(client, referenceNumber);
      const previous = current.documents?.[slot] ?? null;
      const updated = await client.query<ApplicationRow>(
        `UPDATE bursary_application
         SET documents = documents || jsonb_build_object($1::text, $2::jsonb), updated_at = $3
         WHERE id = $4
         RETURNING *`,
        [slot, JSON.stringify(document), at, current.id]
      );
      return { record: rowToApplication(updated.rows[0]), previous };
    });
  }
}
