/**
 * Application statistics for the admin dashboard and its CSV export.
 *
 * Figures are computed from the filtered record set the store returns. The
 * unfiltered overview is cached for `ANALYTICS_CACHE_TTL_MS` and dropped
 * whenever an application is created, deleted or changes status.
 */
import type { ApplicationStatus } from "@bursary/shared";
import type { ApplicationListFilters, ApplicationRecord, ApplicationStore, DecisionTiming } from "./application-store";
import { assertDateRange } from "./applications";
import { logInfo } from "./logger";
import { withSpan } from "./observability/tracing";
import { parsePositiveIntEnv } from "./runtime-safety";

export const DEFAULT_ANALYTICS_CACHE_TTL_MS = 5 * 60 * 1000;
const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_INSTITUTIONS = 10;
const TREND_MONTHS = 6;

export interface OverviewStats {
  totalApplications: number;
  totalAmountRequested: number;
  averageAmount: number;
  pendingCount: number;
  approvedCount: number;
  rejectedCount: number;
  approvedAmount: number;
  approvalRate: number;
  rejectionRate: number;
  pendingRate: number;
}

export interface WardStats {
  ward: string;
  count: number;
  totalAmount: number;
  approved: number;
  pending: number;
  rejected: number;
}

export interface InstitutionStats {
  institutionName: string;
  institutionType: string;
  count: number;
  totalAmount: number;
  averageAmount: number;
  approvedCount: number;
}

export interface GroupStats {
  value: string;
  count: number;
  totalAmount: number;
  averageAmount: number;
  approved: number;
}

export interface ShareStats {
  count: number;
  totalAmount: number;
  approved: number;
  percentage: number;
}

export const AMOUNT_BUCKETS = [
  { label: "0-10K", min: 0, max: 10_000 },
  { label: "10K-30K", min: 10_000, max: 30_000 },
  { label: "30K-50K", min: 30_000, max: 50_000 },
  { label: "50K-100K", min: 50_000, max: 100_000 },
  { label: "100K+", min: 100_000, max: Number.POSITIVE_INFINITY },
] as const;

export type AmountBucket = (typeof AMOUNT_BUCKETS)[number]["label"];

export interface ProcessingTimeStats {
  averageDays: number;
  fastestDays: number;
  slowestDays: number;
}

export interface MonthlyTrend {
  month: string;
  totalApplications: number;
  approved: number;
  rejected: number;
  totalAmount: number;
}

export interface ComprehensiveReport {
  overview: OverviewStats;
  wardDistribution: WardStats[];
  topInstitutions: InstitutionStats[];
  levelDistribution: GroupStats[];
  genderStats: Record<string, ShareStats>;
  familyStatus: GroupStats[];
  disabilityStats: ShareStats;
  amountDistribution: Record<AmountBucket, number>;
  processingTime: ProcessingTimeStats;
  monthlyTrends: MonthlyTrend[];
  generatedAt: string;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function sum(records: ApplicationRecord[]): number {
  return records.reduce((total, record) => total + record.amount, 0);
}

function countStatus(records: ApplicationRecord[], status: ApplicationStatus): number {
  return records.filter((record) => record.status === status).length;
}

function percentage(part: number, total: number): number {
  return round((part / (total || 1)) * 100, 2);
}

function groupBy<K extends string>(records: ApplicationRecord[], key: (record: ApplicationRecord) => K): Map<K, ApplicationRecord[]> {
  const groups = new Map<K, ApplicationRecord[]>();
  for (const record of records) {
    const k = key(record);
    const group = groups.get(k);
    if (group) group.push(record);
    else groups.set(k, [record]);
  }
  return groups;
}

/** Largest group first; ties by name. */
function byCountThenName<T extends { count: number }>(name: (item: T) => string): (a: T, b: T) => number {
  return (a, b) => b.count - a.count || name(a).localeCompare(name(b));
}

export function computeOverview(records: ApplicationRecord[]): OverviewStats {
  const total = records.length;
  const approved = records.filter((record) => record.status === "approved");
  const totalAmountRequested = sum(records);
  return {
    totalApplications: total,
    totalAmountRequested,
    averageAmount: total > 0 ? round(totalAmountRequested / total, 2) : 0,
    pendingCount: countStatus(records, "pending"),
    approvedCount: approved.length,
    rejectedCount: countStatus(records, "rejected"),
    approvedAmount: sum(approved),
    approvalRate: percentage(approved.length, total),
    rejectionRate: percentage(countStatus(records, "rejected"), total),
    pendingRate: percentage(countStatus(records, "pending"), total),
  };
}

export function computeWardDistribution(records: ApplicationRecord[]): WardStats[] {
  return [...groupBy(records, (record) => record.ward)]
    .map(([ward, group]) => ({
      ward,
      count: group.length,
      totalAmount: sum(group),
      approved: countStatus(group, "approved"),
      pending: countStatus(group, "pending"),
      rejected: countStatus(group, "rejected"),
    }))
    .sort(byCountThenName((item) => item.ward));
}

export function computeTopInstitutions(records: ApplicationRecord[], limit = TOP_INSTITUTIONS): InstitutionStats[] {
  return [...groupBy(records, (record) => `${record.institutionName}\u0000${record.institutionType}`).values()]
    .map((group) => ({
      institutionName: group[0].institutionName,
      institutionType: group[0].institutionType,
      count: group.length,
      totalAmount: sum(group),
      averageAmount: round(sum(group) / group.length, 2),
      approvedCount: countStatus(group, "approved"),
    }))
    .sort(byCountThenName((item) => item.institutionName))
    .slice(0, limit);
}

function computeGroups(records: ApplicationRecord[], key: (record: ApplicationRecord) => string): GroupStats[] {
  return [...groupBy(records, key)]
    .map(([value, group]) => ({
      value,
      count: group.length,
      totalAmount: sum(group),
      averageAmount: round(sum(group) / group.length, 2),
      approved: countStatus(group, "approved"),
    }))
    .sort(byCountThenName((item) => item.value));
}

function share(group: ApplicationRecord[], total: number): ShareStats {
  return {
    count: group.length,
    totalAmount: sum(group),
    approved: countStatus(group, "approved"),
    percentage: percentage(group.length, total),
  };
}

export function computeAmountDistribution(records: ApplicationRecord[]): Record<AmountBucket, number> {
  const distribution: Record<AmountBucket, number> = {
    "0-10K": 0,
    "10K-30K": 0,
    "30K-50K": 0,
    "50K-100K": 0,
    "100K+": 0,
  };
  for (const record of records) {
    const bucket = AMOUNT_BUCKETS.find((b) => record.amount >= b.min && record.amount < b.max);
    if (bucket) distribution[bucket.label]++;
  }
  return distribution;
}

/** Whole days from submission to the first approve/reject decision. */
export function computeProcessingTime(timings: DecisionTiming[]): ProcessingTimeStats {
  if (timings.length === 0) {
    return { averageDays: 0, fastestDays: 0, slowestDays: 0 };
  }
  const days = timings.map((t) => Math.floor((t.decidedAt.getTime() - t.submittedAt.getTime()) / DAY_MS));
  return {
    averageDays: round(days.reduce((a, b) => a + b, 0) / days.length, 1),
    fastestDays: Math.min(...days),
    slowestDays: Math.max(...days),
  };
}

/** Per calendar month (UTC) over the last six months, oldest first. */
export function computeMonthlyTrends(records: ApplicationRecord[], now: Date): MonthlyTrend[] {
  const cutoff = now.getTime() - TREND_MONTHS * 30 * DAY_MS;
  const recent = records.filter((record) => record.submittedAt.getTime() >= cutoff);
  return [...groupBy(recent, (record) => record.submittedAt.toISOString().slice(0, 7))]
    .map(([month, group]) => ({
      month,
      totalApplications: group.length,
      approved: countStatus(group, "approved"),
      rejected: countStatus(group, "rejected"),
      totalAmount: sum(group),
    }))
    .sort((a, b) => a.month.localeCompare(b.month));
}

export function buildReport(records: ApplicationRecord[], timings: DecisionTiming[], now: Date): ComprehensiveReport {
  const included = new Set(records.map((record) => record.referenceNumber));
  const genderStats: Record<string, ShareStats> = {};
  for (const [gender, group] of groupBy(records, (record) => record.gender)) {
    genderStats[gender] = share(group, records.length);
  }
  return {
    overview: computeOverview(records),
    wardDistribution: computeWardDistribution(records),
    topInstitutions: computeTopInstitutions(records),
    levelDistribution: computeGroups(records, (record) => record.levelOfStudy),
    genderStats,
    familyStatus: computeGroups(records, (record) => record.familyStatus),
    disabilityStats: share(
      records.filter((record) => record.disability),
      records.length
    ),
    amountDistribution: computeAmountDistribution(records),
    processingTime: computeProcessingTime(timings.filter((t) => included.has(t.referenceNumber))),
    monthlyTrends: computeMonthlyTrends(records, now),
    generatedAt: now.toISOString(),
  };
}

export interface AnalyticsServiceDeps {
  store: Pick<ApplicationStore, "listForReport" | "listDecisionTimings">;
  clock: () => Date;
  cacheTtlMs?: number;
}

export class AnalyticsService {
  private readonly ttlMs: number;
  private cached: { at: number; overview: OverviewStats } | null = null;

  constructor(private readonly deps: AnalyticsServiceDeps) {
    this.ttlMs = deps.cacheTtlMs ?? parsePositiveIntEnv(process.env.ANALYTICS_CACHE_TTL_MS, DEFAULT_ANALYTICS_CACHE_TTL_MS);
  }

  async overview(): Promise<OverviewStats> {
    const now = this.deps.clock().getTime();
    if (this.cached && now - this.cached.at < this.ttlMs) {
      return this.cached.overview;
    }
    const overview = computeOverview(await this.deps.store.listForReport({}));
    this.cached = { at: now, overview };
    return overview;
  }

  async comprehensive(filters: ApplicationListFilters = {}): Promise<ComprehensiveReport> {
    assertDateRange(filters);
    return withSpan("analytics.comprehensive", {}, async () => {
      const [records, timings] = await Promise.all([
        this.deps.store.listForReport(filters),
        this.deps.store.listDecisionTimings(),
      ]);
      const report = buildReport(records, timings, this.deps.clock());
      logInfo("Analytics report generated", { applications: records.length });
      return report;
    });
  }

  invalidate(): void {
    this.cached = null;
  }
}

/** `totalApplications` → `Total Applications` */
export function metricLabel(key: string): string {
  return key.replace(/([a-z0-9])([A-Z])/g, "$1 $2").replace(/^./, (c) => c.toUpperCase());
}
