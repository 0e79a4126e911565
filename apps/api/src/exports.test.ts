import ExcelJS from "exceljs";
import { describe, expect, it } from "vitest";
import type { OverviewStats } from "./analytics";
import { ValidationError } from "./errors";
import { EXPORT_HEADERS, ExportService, UTF8_BOM, escapeCsvValue } from "./exports";
import { FIXED_NOW, InMemoryApplicationStore, hoursBefore, rejectionOf } from "./memory-store.test-helpers";

const OVERVIEW: OverviewStats = {
  totalApplications: 4,
  totalAmountRequested: 150002,
  averageAmount: 37500.5,
  pendingCount: 2,
  approvedCount: 1,
  rejectedCount: 1,
  approvedAmount: 50000,
  approvalRate: 25,
  rejectionRate: 25,
  pendingRate: 50,
};

function setup() {
  const store = new InMemoryApplicationStore();
  const service = new ExportService({
    store,
    analytics: { overview: async () => OVERVIEW },
    clock: () => FIXED_NOW,
  });
  return { store, service };
}

function lines(body: string | Buffer): string[] {
  return body.toString().split("\r\n");
}

describe("escapeCsvValue", () => {
  it("neutralises formula prefixes and quotes separators", () => {
    expect(escapeCsvValue("=SUM(A1:A9)")).toBe("'=SUM(A1:A9)");
    expect(escapeCsvValue("+254712345678")).toBe("'+254712345678");
    expect(escapeCsvValue('Say "hi", then leave')).toBe('"Say ""hi"", then leave"');
    expect(escapeCsvValue("line one\nline two")).toBe('"line one\nline two"');
    expect(escapeCsvValue(null)).toBe("");
    expect(escapeCsvValue(45000)).toBe("45000");
  });
});

describe("ExportService", () => {
  it("writes the application register with a BOM and one row per record", async () => {
    const { store, service } = setup();
    store.seed({ referenceNumber: "BUR-1A2B3C4D" });

    const file = await service.applicationsCsv({});

    expect(file.fileName).toBe("bursary_applications_20260310_120000.csv");
    expect(file.rows).toBe(1);
    expect(lines(file.body)).toEqual([
      `${UTF8_BOM}${EXPORT_HEADERS.join(",")}`,
      [
        "BUR-1A2B3C4D",
        "Jane Mwende",
        "female",
        "No",
        "12345678",
        "'+254712345678",
        "'+254722000111",
        "87654321",
        "kivaa",
        "Kivaa Market",
        "Peter Musyoka",
        "'+254733000222",
        "Mary Ndunge",
        "'+254744000333",
        "degree",
        "university",
        "Machakos University",
        "MU/2025/001",
        "45000",
        "full-time",
        "first-year",
        "single-parent",
        "",
        "low",
        "pending",
        "2026-03-10 12:00:00",
        "jane.mwende@example.com",
        "Yes",
        "Yes",
        "Yes",
      ].join(","),
      "",
    ]);
  });

  it("applies the status and ward filters", async () => {
    const { store, service } = setup();
    store.seed({ referenceNumber: "BUR-00000001", status: "approved", ward: "kivaa" });
    store.seed({ referenceNumber: "BUR-00000002", idNumber: "20000002", status: "approved", ward: "muthesya" });
    store.seed({ referenceNumber: "BUR-00000003", idNumber: "20000003", status: "pending", ward: "kivaa" });

    const file = await service.applicationsCsv({ status: "approved", ward: "kivaa" });

    expect(file.rows).toBe(1);
    expect(lines(file.body)[1].startsWith("BUR-00000001,")).toBe(true);
  });

  it("refuses a start date after the end date", async () => {
    const { service } = setup();

    const error = await rejectionOf(service.applicationsCsv({ startDate: "2026-03-10", endDate: "2026-03-01" }));

    expect(error).toBeInstanceOf(ValidationError);
    if (!(error instanceof ValidationError)) return;
    expect(error.fieldErrors).toEqual({ startDate: ["startDate must not be after endDate"] });
  });

  it("writes the same rows to an Applications worksheet", async () => {
    const { store, service } = setup();
    store.seed({ referenceNumber: "BUR-1A2B3C4D" });

    const file = await service.applicationsXlsx({});
    if (!Buffer.isBuffer(file.body)) throw new Error("expected a binary workbook");

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.load(file.body);
    const sheet = workbook.getWorksheet("Applications");

    expect(file.fileName).toBe("bursary_applications_20260310_120000.xlsx");
    expect(sheet?.rowCount).toBe(2);
    expect(sheet?.getRow(1).getCell(30).value).toBe("Communication Consent");
    expect(sheet?.getRow(2).getCell(1).value).toBe("BUR-1A2B3C4D");
    expect(sheet?.getRow(2).getCell(19).value).toBe(45000);
  });

  it("lists records sharing an ID number or email, newest first", async () => {
    const { store, service } = setup();
    store.seed({ referenceNumber: "BUR-00000001", idNumber: "10000001", email: "one@example.com", submittedAt: hoursBefore(FIXED_NOW, 4) });
    store.seed({ referenceNumber: "BUR-00000002", idNumber: "10000001", email: "two@example.com", submittedAt: hoursBefore(FIXED_NOW, 3) });
    store.seed({ referenceNumber: "BUR-00000003", idNumber: "10000003", email: "Three@Example.com", submittedAt: hoursBefore(FIXED_NOW, 2) });
    store.seed({ referenceNumber: "BUR-00000004", idNumber: "10000004", email: "three@example.com", submittedAt: hoursBefore(FIXED_NOW, 1) });
    store.seed({ referenceNumber: "BUR-00000005", idNumber: "10000005", email: "five@example.com", submittedAt: FIXED_NOW });

    const file = await service.duplicatesCsv({});

    expect(file.rows).toBe(4);
    expect(lines(file.body)[0]).toBe(`${UTF8_BOM}Reference Number,Full Name,ID Number,Email,Phone,Institution,Status,Submitted At`);
    expect(
      lines(file.body)
        .slice(1, -1)
        .map((line) => line.split(",")[0])
    ).toEqual(["BUR-00000004", "BUR-00000003", "BUR-00000002", "BUR-00000001"]);
  });

  it("exports the overview as metric rows", async () => {
    const { service } = setup();

    const file = await service.analyticsCsv();

    expect(lines(file.body)).toEqual([
      `${UTF8_BOM}Metric,Value`,
      "Total Applications,4",
      "Total Amount Requested,150002",
      "Average Amount,37500.5",
      "Pending Count,2",
      "Approved Count,1",
      "Rejected Count,1",
      "Approved Amount,50000",
      "Approval Rate,25",
      "Rejection Rate,25",
      "Pending Rate,50",
      "",
    ]);
  });
});
