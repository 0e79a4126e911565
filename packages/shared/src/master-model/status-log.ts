/**
 * Status log entry: one immutable audit record per status change or self-edit.
 * A self-edit is recorded with `oldStatus === newStatus` and no actor.
 */
import { z } from "zod";
import { NonEmptyString } from "./primitives";
import { ApplicationStatusEnum } from "./application";

export const StatusLogEntrySchema = z.object({
  id: z.number().int().positive(),
  referenceNumber: NonEmptyString,
  oldStatus: ApplicationStatusEnum.nullable(),
  newStatus: ApplicationStatusEnum,
  /** Staff user id; null for system actions and applicant self-edits. */
  changedBy: z.string().nullable(),
  reason: z.string().nullable(),
  changedAt: z.date(),
});

export type StatusLogEntry = z.infer<typeof StatusLogEntrySchema>;

export const StatusUpdateSchema = z
  .object({
    status: ApplicationStatusEnum,
    reason: z.string().trim().max(1000).nullish(),
  })
  .strict();

export const BulkStatusUpdateSchema = z
  .object({
    referenceNumbers: z.array(NonEmptyString).min(1).max(500),
    status: ApplicationStatusEnum,
    reason: z.string().trim().max(1000).nullish(),
  })
  .strict();
