/**
 * Administrator exports: the application register as CSV or XLSX, the
 * duplicate report, and the overview statistics as `Metric,Value` rows.
 */
import ExcelJS from "exceljs";
import { z } from "zod";
import { ApplicationStatusEnum, WardEnum } from "@bursary/shared";
import type { ApplicationListFilters, ApplicationRecord, ApplicationStore } from "./application-store";
import { metricLabel, type AnalyticsService } from "./analytics";
import { assertDateRange } from "./applications";
import { parseOrThrow } from "./errors";
import { formatTimestamp } from "./format";
import { logInfo } from "./logger";

export const UTF8_BOM = "\uFEFF";

export const EXPORT_HEADERS = [
  "Reference Number",
  "Full Name",
  "Gender",
  "Disability",
  "ID Number",
  "Phone Number",
  "Guardian Phone",
  "Guardian ID",
  "Ward",
  "Village",
  "Chief Name",
  "Chief Phone",
  "Sub Chief Name",
  "Sub Chief Phone",
  "Level of Study",
  "Institution Type",
  "Institution Name",
  "Admission Number",
  "Amount",
  "Mode of Study",
  "Year of Study",
  "Family Status",
  "Father Income",
  "Mother Income",
  "Status",
  "Submitted At",
  "Email",
  "Confirmation",
  "Data Consent",
  "Communication Consent",
] as const;

export const DUPLICATE_HEADERS = [
  "Reference Number",
  "Full Name",
  "ID Number",
  "Email",
  "Phone",
  "Institution",
  "Status",
  "Submitted At",
] as const;

export const ExportQuerySchema = z
  .object({
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
    status: ApplicationStatusEnum.optional(),
    ward: WardEnum.optional(),
  })
  .strict();

type Cell = string | number;

function yesNo(value: boolean): string {
  return value ? "Yes" : "No";
}

/** Quote per RFC 4180 and neutralise spreadsheet formula prefixes. */
export function escapeCsvValue(raw: Cell | null | undefined): string {
  const value = raw === null || raw === undefined ? "" : String(raw);
  const safeValue = /^[=+\-@\t\r]/.test(value) ? `'${value}` : value;
  return /[",\r\n]/.test(safeValue) ? `"${safeValue.replace(/"/g, '""')}"` : safeValue;
}

function toCsv(headers: readonly string[], rows: Cell[][]): string {
  const table: Cell[][] = [[...headers], ...rows];
  const lines = table.map((row) => row.map((cell) => escapeCsvValue(cell)).join(","));
  return `${UTF8_BOM}${lines.join("\r\n")}\r\n`;
}

export function applicationRow(record: ApplicationRecord): Cell[] {
  return [
    record.referenceNumber,
    record.fullName,
    record.gender,
    yesNo(record.disability),
    record.idNumber,
    record.phoneNumber,
    record.guardianPhone,
    record.guardianId,
    record.ward,
    record.village,
    record.chiefName,
    record.chiefPhone,
    record.subChiefName,
    record.subChiefPhone,
    record.levelOfStudy,
    record.institutionType,
    record.institutionName,
    record.admissionNumber,
    record.amount,
    record.modeOfStudy,
    record.yearOfStudy,
    record.familyStatus,
    record.fatherIncome ?? "",
    record.motherIncome ?? "",
    record.status,
    formatTimestamp(record.submittedAt),
    record.email,
    yesNo(record.confirmation),
    yesNo(record.dataConsent),
    yesNo(record.communicationConsent),
  ];
}

/**
 * Records sharing an ID number or (case-insensitively) an email with another
 * record. Each record appears once, newest first.
 */
export function findDuplicateGroups(records: ApplicationRecord[]): ApplicationRecord[] {
  const byId = new Map<string, number>();
  const byEmail = new Map<string, number>();
  for (const record of records) {
    byId.set(record.idNumber, (byId.get(record.idNumber) ?? 0) + 1);
    const email = record.email.toLowerCase();
    byEmail.set(email, (byEmail.get(email) ?? 0) + 1);
  }
  return records.filter(
    (record) => (byId.get(record.idNumber) ?? 0) > 1 || (byEmail.get(record.email.toLowerCase()) ?? 0) > 1
  );
}

export interface ExportFile {
  fileName: string;
  contentType: string;
  body: string | Buffer;
  rows: number;
}

export interface ExportServiceDeps {
  store: Pick<ApplicationStore, "listForReport">;
  analytics: Pick<AnalyticsService, "overview">;
  clock: () => Date;
}

function fileStamp(now: Date): string {
  return now.toISOString().slice(0, 19).replace(/[-:]/g, "").replace("T", "_");
}

export class ExportService {
  constructor(private readonly deps: ExportServiceDeps) {}

  parseFilters(query: unknown): ApplicationListFilters {
    const filters = parseOrThrow(ExportQuerySchema, query, "Invalid export filters");
    assertDateRange(filters);
    return filters;
  }

  async applicationsCsv(query: unknown): Promise<ExportFile> {
    const records = await this.deps.store.listForReport(this.parseFilters(query));
    logInfo("Applications exported", { format: "csv", rows: records.length });
    return {
      fileName: `bursary_applications_${fileStamp(this.deps.clock())}.csv`,
      contentType: "text/csv; charset=utf-8",
      body: toCsv(EXPORT_HEADERS, records.map(applicationRow)),
      rows: records.length,
    };
  }

  async applicationsXlsx(query: unknown): Promise<ExportFile> {
    const records = await this.deps.store.listForReport(this.parseFilters(query));
    const workbook = new ExcelJS.Workbook();
    workbook.created = this.deps.clock();
    const sheet = workbook.addWorksheet("Applications");
    sheet.addRow([...EXPORT_HEADERS]);
    for (const record of records) {
      sheet.addRow(applicationRow(record));
    }
    const body = Buffer.from(await workbook.xlsx.writeBuffer());
    logInfo("Applications exported", { format: "xlsx", rows: records.length });
    return {
      fileName: `bursary_applications_${fileStamp(this.deps.clock())}.xlsx`,
      contentType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
      body,
      rows: records.length,
    };
  }

  async duplicatesCsv(query: unknown): Promise<ExportFile> {
    const duplicates = findDuplicateGroups(await this.deps.store.listForReport(this.parseFilters(query)));
    logInfo("Duplicate applications exported", { rows: duplicates.length });
    return {
      fileName: "duplicate_applications.csv",
      contentType: "text/csv; charset=utf-8",
      body: toCsv(
        DUPLICATE_HEADERS,
        duplicates.map((record) => [
          record.referenceNumber,
          record.fullName,
          record.idNumber,
          record.email,
          record.phoneNumber,
          record.institutionName,
          record.status,
          formatTimestamp(record.submittedAt),
        ])
      ),
      rows: duplicates.length,
    };
  }

  async analyticsCsv(): Promise<ExportFile> {
    const overview = await this.deps.analytics.overview();
    const rows: Cell[][] = Object.entries(overview).map(([key, value]) => [metricLabel(key), value]);
    return {
      fileName: "analytics_report.csv",
      contentType: "text/csv; charset=utf-8",
      body: toCsv(["Metric", "Value"], rows),
      rows: rows.length,
    };
  }
}
