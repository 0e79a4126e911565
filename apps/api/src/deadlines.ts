import type { QueryResultRow } from "pg";
import type { DeadlineInput, DeadlineWindow } from "@bursary/shared";
import { query, withTransaction } from "./db";
import { NotFoundError } from "./errors";

const DAY_MS = 24 * 60 * 60 * 1000;

export function isDeadlineOpen(deadline: DeadlineWindow, now: Date): boolean {
  const at = now.getTime();
  return deadline.isActive && deadline.startDate.getTime() <= at && at <= deadline.endDate.getTime();
}

/** Whole days until the window closes; 0 when it is not open. */
export function daysRemaining(deadline: DeadlineWindow, now: Date): number {
  if (!isDeadlineOpen(deadline, now)) return 0;
  return Math.floor((deadline.endDate.getTime() - now.getTime()) / DAY_MS);
}

export type PublicDeadlineStatus =
  | { isOpen: boolean; name: string; startDate: string; endDate: string; daysRemaining: number }
  | { isOpen: false; message: string };

export function describeDeadline(deadline: DeadlineWindow | null, now: Date): PublicDeadlineStatus {
  if (!deadline) {
    return { isOpen: false, message: "No active application deadline" };
  }
  return {
    isOpen: isDeadlineOpen(deadline, now),
    name: deadline.name,
    startDate: deadline.startDate.toISOString(),
    endDate: deadline.endDate.toISOString(),
    daysRemaining: daysRemaining(deadline, now),
  };
}

export interface DeadlineStore {
  getActive(): Promise<DeadlineWindow | null>;
  /** Newest first. */
  list(): Promise<DeadlineWindow[]>;
  /** Creating an active window deactivates any other. */
  create(input: DeadlineInput, at: Date): Promise<DeadlineWindow>;
  activate(id: number, at: Date): Promise<DeadlineWindow>;
  deactivate(id: number, at: Date): Promise<DeadlineWindow>;
}

interface DeadlineRow extends QueryResultRow {
  id: string;
  name: string;
  start_date: Date;
  end_date: Date;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

function rowToDeadline(row: DeadlineRow): DeadlineWindow {
  return {
    id: Number(row.id),
    name: row.name,
    startDate: new Date(row.start_date),
    endDate: new Date(row.end_date),
    isActive: row.is_active,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at),
  };
}

function deadlineNotFound(id: number): NotFoundError {
  return new NotFoundError(`Deadline ${id} not found`, "DEADLINE_NOT_FOUND");
}

export class PgDeadlineStore implements DeadlineStore {
  async getActive(): Promise<DeadlineWindow | null> {
    const result = await query<DeadlineRow>(
      "SELECT * FROM application_deadline WHERE is_active = TRUE ORDER BY updated_at DESC LIMIT 1"
    );
    return result.rows[0] ? rowToDeadline(result.rows[0]) : null;
  }

  async list(): Promise<DeadlineWindow[]> {
    const result = await query<DeadlineRow>("SELECT * FROM application_deadline ORDER BY created_at DESC, id DESC");
    return result.rows.map(rowToDeadline);
  }

  async create(input: DeadlineInput, at: Date): Promise<DeadlineWindow> {
    return withTransaction(async (client) => {
      if (input.isActive) {
        await client.query(
          "UPDATE application_deadline SET is_active = FALSE, updated_at = $1 WHERE is_active = TRUE",
          [at]
        );
      }
      const result = await client.query<DeadlineRow>(
        `INSERT INTO application_deadline (name, start_date, end_date, is_active, created_at, updated_at)
         VALUES ($1, $2, $3, $4, $5, $5)
         RETURNING *`,
        [input.name, input.startDate, input.endDate, input.isActive, at]
      );
      return rowToDeadline(result.rows[0]);
    });
  }

  async activate(id: number, at: Date): Promise<DeadlineWindow> {
    return withTransaction(async (client) => {
      await client.query(
        "UPDATE application_deadline SET is_active = FALSE, updated_at = $1 WHERE is_active = TRUE AND id <> $2",
        [at, id]
      );
      const result = await client.query<DeadlineRow>(
        "UPDATE application_deadline SET is_active = TRUE, updated_at = $1 WHERE id = $2 RETURNING *",
        [at, id]
      );
      if (!result.rows[0]) throw deadlineNotFound(id);
      return rowToDeadline(result.rows[0]);
    });
  }

  async deactivate(id: number, at: Date): Promise<DeadlineWindow> {
    const result = await query<DeadlineRow>(
      "UPDATE application_deadline SET is_active = FALSE, updated_at = $1 WHERE id = $2 RETURNING *",
      [at, id]
    );
    if (!result.rows[0]) throw deadlineNotFound(id);
    return rowToDeadline(result.rows[0]);
  }
}
