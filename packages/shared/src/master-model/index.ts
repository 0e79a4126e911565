/**
 * Bursary application model — barrel export.
 *
 * Usage:
 *   import { ApplicationIntakeSchema, DuplicateCheckSchema } from "@bursary/shared";
 *   import type { ApplicationFields, StatusLogEntry } from "@bursary/shared";
 */

// Primitives
export {
  NonEmptyString,
  ISODateTime,
  Email,
  Phone,
  NationalIdNumber,
  StoredDocumentSchema,
  type StoredDocument,
} from "./primitives";

// Application
export {
  ApplicationStatusEnum,
  TERMINAL_STATUSES,
  isTerminalStatus,
  GenderEnum,
  WardEnum,
  LevelOfStudyEnum,
  InstitutionTypeEnum,
  ModeOfStudyEnum,
  YearOfStudyEnum,
  FamilyStatusEnum,
  IncomeLevelEnum,
  DocumentSlotEnum,
  ApplicationDocumentsSchema,
  DuplicateMatchTypeEnum,
  ApplicationFieldsSchema,
  ApplicationIntakeSchema,
  ApplicationEditSchema,
  TRACKED_EDIT_FIELDS,
  DuplicateCheckSchema,
  type ApplicationStatus,
  type Gender,
  type Ward,
  type LevelOfStudy,
  type InstitutionType,
  type FamilyStatus,
  type DocumentSlot,
  type ApplicationDocuments,
  type DuplicateMatchType,
  type ApplicationFields,
  type ApplicationIntake,
  type ApplicationEdit,
  type TrackedEditField,
  type DuplicateCheckInput,
} from "./application";

// Status log
export {
  StatusLogEntrySchema,
  StatusUpdateSchema,
  BulkStatusUpdateSchema,
  type StatusLogEntry,
} from "./status-log";

// Deadline window
export {
  DeadlineWindowSchema,
  DeadlineInputSchema,
  type DeadlineWindow,
  type DeadlineInput,
} from "./deadline";
