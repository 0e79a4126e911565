import { beforeEach, describe, expect, it, vi } from "vitest";
import type { QueryResult, QueryResultRow } from "pg";
import {
  buildFilterClause,
  ID_NUMBER_CONSTRAINT,
  PgApplicationStore,
  REFERENCE_CONSTRAINT,
  rowToApplication,
  type ApplicationRow,
} from "./application-store";
import { query } from "./db";
import { DuplicateBlockedError } from "./errors";
import { FIXED_NOW, rejectionOf, sampleFields } from "./memory-store.test-helpers";

vi.mock("./db", async (importOriginal) => {
  const actual = await importOriginal<typeof import("./db")>();
  return { ...actual, query: vi.fn(), withTransaction: vi.fn() };
});

function result<R extends QueryResultRow>(rows: R[]): QueryResult<R> {
  return { command: "SELECT", rowCount: rows.length, oid: 0, fields: [], rows };
}

function uniqueViolation(constraint: string): Error {
  return Object.assign(new Error("duplicate key value violates unique constraint"), { code: "23505", constraint });
}

function row(overrides: Partial<ApplicationRow> = {}): ApplicationRow {
  const f = sampleFields();
  return {
    id: "7",
    reference_number: "BUR-1A2B3C4D",
    full_name: f.fullName,
    gender: f.gender,
    disability: f.disability,
    id_number: f.idNumber,
    phone_number: f.phoneNumber,
    email: f.email,
    guardian_phone: f.guardianPhone,
    guardian_id: f.guardianId,
    ward: f.ward,
    village: f.village,
    chief_name: f.chiefName,
    chief_phone: f.chiefPhone,
    sub_chief_name: f.subChiefName,
    sub_chief_phone: f.subChiefPhone,
    level_of_study: f.levelOfStudy,
    institution_type: f.institutionType,
    institution_name: f.institutionName,
    admission_number: f.admissionNumber,
    amount: f.amount,
    mode_of_study: f.modeOfStudy,
    year_of_study: f.yearOfStudy,
    family_status: f.familyStatus,
    father_income: f.fatherIncome,
    mother_income: f.motherIncome,
    confirmation: f.confirmation,
    data_consent: f.dataConsent,
    communication_consent: f.communicationConsent,
    documents: null,
    status: "pending",
    submitted_at: FIXED_NOW,
    updated_at: FIXED_NOW,
    ...overrides,
  };
}

describe("buildFilterClause", () => {
  it("returns an empty clause without filters", () => {
    expect(buildFilterClause({})).toEqual({ where: "", params: [] });
  });

  it("numbers placeholders from the given position", () => {
    const since = new Date("2026-01-01T00:00:00.000Z");
    expect(buildFilterClause({ status: "pending", ward: "kivaa", startDate: since, search: "jane" }, 3)).toEqual({
      where:
        "WHERE status = $3 AND ward = $4 AND submitted_at >= $5 AND " +
        "(reference_number || ' ' || full_name || ' ' || id_number || ' ' || email || ' ' || institution_name) ILIKE $6",
      params: ["pending", "kivaa", since, "%jane%"],
    });
  });
});

describe("rowToApplication", () => {
  it("maps snake_case columns and fills missing documents", () => {
    const record = rowToApplication(row());
    expect(record).toEqual({
      ...sampleFields(),
      id: 7,
      referenceNumber: "BUR-1A2B3C4D",
      status: "pending",
      documents: {},
      submittedAt: FIXED_NOW,
      updatedAt: FIXED_NOW,
    });
  });
});

describe("PgApplicationStore", () => {
  const store = new PgApplicationStore();

  beforeEach(() => {
    vi.mocked(query).mockReset();
  });

  it("skips the query when no identifying field is given", async () => {
    expect(await store.queryByFields({ submittedSince: FIXED_NOW })).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });

  it("matches email case-insensitively inside the window", async () => {
    vi.mocked(query).mockResolvedValueOnce(result([row()]));

    const matches = await store.queryByFields({
      email: "jane.mwende@example.com",
      phoneNumber: "+254712345678",
      submittedSince: FIXED_NOW,
      excludeStatuses: ["rejected"],
    });

    expect(matches.map((m) => m.referenceNumber)).toEqual(["BUR-1A2B3C4D"]);
    expect(query).toHaveBeenCalledWith(
      "SELECT * FROM bursary_application WHERE LOWER(email) = LOWER($1) AND phone_number = $2 AND submitted_at >= $3 AND status <> ALL($4::text[]) ORDER BY submitted_at ASC, id ASC",
      ["jane.mwende@example.com", "+254712345678", FIXED_NOW, ["rejected"]]
    );
  });

  it("retries the insert with a new reference after a collision", async () => {
    vi.mocked(query)
      .mockRejectedValueOnce(uniqueViolation(REFERENCE_CONSTRAINT))
      .mockResolvedValueOnce(result([row({ reference_number: "BUR-0000000F" })]));

    const created = await store.create({ ...sampleFields(), submittedAt: FIXED_NOW });

    expect(created.referenceNumber).toBe("BUR-0000000F");
    expect(query).toHaveBeenCalledTimes(2);
    const firstReference = vi.mocked(query).mock.calls[0][1]?.[0];
    const secondReference = vi.mocked(query).mock.calls[1][1]?.[0];
    expect(firstReference).not.toBe(secondReference);
  });

  it("turns an ID number violation into a blocked duplicate citing the existing record", async () => {
    vi.mocked(query)
      .mockRejectedValueOnce(uniqueViolation(ID_NUMBER_CONSTRAINT))
      .mockResolvedValueOnce(result([{ reference_number: "BUR-00000009" }]));

    const error = await rejectionOf(store.create({ ...sampleFields(), submittedAt: FIXED_NOW }));

    expect(error).toBeInstanceOf(DuplicateBlockedError);
    if (!(error instanceof DuplicateBlockedError)) return;
    expect(error.existingReference).toBe("BUR-00000009");
    expect(error.matchType).toBe("exact_id");
    expect(error.message).toBe("An application with ID number 12345678 already exists. Reference: BUR-00000009");
  });

  it("pages newest first with the filter parameters ahead of LIMIT and OFFSET", async () => {
    vi.mocked(query)
      .mockResolvedValueOnce(result([{ total: "41" }]))
      .mockResolvedValueOnce(result([row()]));

    const page = await store.list({ status: "approved" }, { page: 3, pageSize: 20 });

    expect(page.total).toBe(41);
    expect(page.items).toHaveLength(1);
    expect(page.page).toBe(3);
    expect(vi.mocked(query).mock.calls[0]).toEqual([
      "SELECT COUNT(*) AS total FROM bursary_application WHERE status = $1",
      ["approved"],
    ]);
    expect(vi.mocked(query).mock.calls[1][1]).toEqual(["approved", 20, 40]);
  });
});
