/**
 * Bursary application schemas.
 *
 * `ApplicationFieldsSchema` is the applicant-supplied part of a record.
 * Intake parses the full set; a self-service edit parses the editable subset.
 * Optional values are explicit `null` after parsing, never absent keys.
 */
import { z } from "zod";
import { Email, NationalIdNumber, NonEmptyString, Phone, StoredDocumentSchema } from "./primitives";

export const ApplicationStatusEnum = z.enum(["pending", "approved", "rejected"]);
export type ApplicationStatus = z.infer<typeof ApplicationStatusEnum>;

/** Statuses from which no further transition is permitted. */
export const TERMINAL_STATUSES: readonly ApplicationStatus[] = ["approved", "rejected"];

export function isTerminalStatus(status: ApplicationStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export const GenderEnum = z.enum(["male", "female"]);
export const WardEnum = z.enum(["kivaa", "masinga-central", "ndithini", "ekalakala", "muthesya"]);
export const LevelOfStudyEnum = z.enum(["degree", "certificate", "diploma", "artisan"]);
export const InstitutionTypeEnum = z.enum(["college", "university"]);
export const ModeOfStudyEnum = z.enum(["full-time", "part-time"]);
export const YearOfStudyEnum = z.enum(["first-year", "second-year", "third-year", "final-year"]);
export const FamilyStatusEnum = z.enum([
  "both-parents-alive",
  "single-parent",
  "partial-orphan",
  "total-orphan",
]);
export const IncomeLevelEnum = z.enum(["low", "medium", "high"]);

export type Gender = z.infer<typeof GenderEnum>;
export type Ward = z.infer<typeof WardEnum>;
export type LevelOfStudy = z.infer<typeof LevelOfStudyEnum>;
export type InstitutionType = z.infer<typeof InstitutionTypeEnum>;
export type FamilyStatus = z.infer<typeof FamilyStatusEnum>;

export const DocumentSlotEnum = z.enum([
  "idFront",
  "idBack",
  "admissionLetter",
  "fatherDeathCertificate",
  "motherDeathCertificate",
]);
export type DocumentSlot = z.infer<typeof DocumentSlotEnum>;

export const ApplicationDocumentsSchema = z.record(DocumentSlotEnum, StoredDocumentSchema);
export type ApplicationDocuments = Partial<Record<DocumentSlot, z.infer<typeof StoredDocumentSchema>>>;

/** How an existing record matched a candidate submission. */
export const DuplicateMatchTypeEnum = z.enum(["exact_id", "email_phone", "institution_admission", "fuzzy"]);
export type DuplicateMatchType = z.infer<typeof DuplicateMatchTypeEnum>;

export const ApplicationFieldsSchema = z.object({
  // Personal
  fullName: NonEmptyString.max(255),
  gender: GenderEnum,
  disability: z.boolean().default(false),
  idNumber: NationalIdNumber,
  phoneNumber: Phone,
  email: Email,
  guardianPhone: Phone,
  guardianId: NonEmptyString.max(50),

  // Residence
  ward: WardEnum,
  village: NonEmptyString.max(100),
  chiefName: NonEmptyString.max(255),
  chiefPhone: Phone,
  subChiefName: NonEmptyString.max(255),
  subChiefPhone: Phone,

  // Institution
  levelOfStudy: LevelOfStudyEnum,
  institutionType: InstitutionTypeEnum,
  institutionName: NonEmptyString.max(255),
  admissionNumber: NonEmptyString.max(50),
  amount: z.number().int().positive(),
  modeOfStudy: ModeOfStudyEnum,
  yearOfStudy: YearOfStudyEnum,

  // Family
  familyStatus: FamilyStatusEnum,
  fatherIncome: IncomeLevelEnum.nullable().default(null),
  motherIncome: IncomeLevelEnum.nullable().default(null),

  // Consent
  confirmation: z.boolean(),
  dataConsent: z.boolean(),
  communicationConsent: z.boolean().default(false),
});

export type ApplicationFields = z.infer<typeof ApplicationFieldsSchema>;

/** Full submission payload. Confirmation and data-processing consent are mandatory. */
export const ApplicationIntakeSchema = ApplicationFieldsSchema.strict().superRefine((value, ctx) => {
  if (!value.confirmation) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["confirmation"],
      message: "You must confirm that the information provided is accurate",
    });
  }
  if (!value.dataConsent) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["dataConsent"],
      message: "Consent to data processing is required",
    });
  }
});

export type ApplicationIntake = z.input<typeof ApplicationIntakeSchema>;

/**
 * Fields the applicant may change during the edit window.
 * Identity, consents and documents are excluded; documents have their own upload route.
 */
export const ApplicationEditSchema = ApplicationFieldsSchema.omit({
  idNumber: true,
  confirmation: true,
  dataConsent: true,
  communicationConsent: true,
})
  .partial()
  .strict()
  .refine((value) => Object.keys(value).length > 0, "At least one field must be updated");

export type ApplicationEdit = z.output<typeof ApplicationEditSchema>;

/** Fields whose changes are written to the status log when the applicant edits. */
export const TRACKED_EDIT_FIELDS = [
  "institutionName",
  "amount",
  "ward",
  "phoneNumber",
  "email",
] as const satisfies ReadonlyArray<keyof ApplicationFields>;

export type TrackedEditField = (typeof TRACKED_EDIT_FIELDS)[number];

/** Payload of the duplicate pre-check. Only the three identifying fields are required. */
export const DuplicateCheckSchema = z
  .object({
    idNumber: NationalIdNumber,
    email: Email,
    phoneNumber: Phone,
    institutionName: z.string().trim().nullish(),
    admissionNumber: z.string().trim().nullish(),
    fullName: z.string().trim().nullish(),
    ward: WardEnum.nullish(),
  })
  .strict();

export type DuplicateCheckInput = z.output<typeof DuplicateCheckSchema>;
