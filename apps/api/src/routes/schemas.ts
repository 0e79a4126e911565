/**
 * JSON schemas shared by the route modules. Fastify checks shape and rejects
 * unknown keys; the services validate content with zod and report per-field
 * errors.
 */
import { ApplicationFieldsSchema, ApplicationStatusEnum, DocumentSlotEnum, WardEnum } from "@bursary/shared";

type JsonSchema = Record<string, unknown>;

export function strictObject(properties: Record<string, JsonSchema>, required: string[] = []): JsonSchema {
  return { type: "object", additionalProperties: false, required, properties };
}

const anyValue: JsonSchema = {};
const text: JsonSchema = { type: "string" };
const nullableText: JsonSchema = { type: ["string", "null"], maxLength: 1000 };

export const referenceParamsSchema = strictObject(
  { referenceNumber: { type: "string", minLength: 1, maxLength: 40 } },
  ["referenceNumber"]
);

export const documentParamsSchema = strictObject(
  {
    referenceNumber: { type: "string", minLength: 1, maxLength: 40 },
    slot: { type: "string", enum: [...DocumentSlotEnum.options] },
  },
  ["referenceNumber", "slot"]
);

export const idParamsSchema = strictObject({ id: { type: "integer", minimum: 1 } }, ["id"]);

export const emptyQuerySchema = strictObject({});

/** Every application field is accepted here; intake validation runs in the service. */
export const intakeBodySchema = strictObject(
  Object.fromEntries(Object.keys(ApplicationFieldsSchema.shape).map((key) => [key, anyValue]))
);

export const duplicateCheckBodySchema = strictObject(
  {
    idNumber: text,
    email: text,
    phoneNumber: text,
    institutionName: anyValue,
    admissionNumber: anyValue,
    fullName: anyValue,
    ward: anyValue,
  },
  ["idNumber", "email", "phoneNumber"]
);

export const ownershipBodySchema = strictObject({ referenceNumber: text, email: text }, ["referenceNumber", "email"]);

export const editBodySchema = strictObject({ email: text, updates: { type: "object" } }, ["email", "updates"]);

export const statusBodySchema = strictObject(
  { status: { type: "string", enum: [...ApplicationStatusEnum.options] }, reason: nullableText },
  ["status"]
);

export const bulkStatusBodySchema = strictObject(
  {
    referenceNumbers: { type: "array", minItems: 1, maxItems: 500, items: text },
    status: { type: "string", enum: [...ApplicationStatusEnum.options] },
    reason: nullableText,
  },
  ["referenceNumbers", "status"]
);

const filterProperties = {
  status: { type: "string", enum: [...ApplicationStatusEnum.options] },
  ward: { type: "string", enum: [...WardEnum.options] },
  startDate: text,
  endDate: text,
};

export const listQuerySchema = strictObject({
  ...filterProperties,
  search: { type: "string", maxLength: 100 },
  page: { type: "integer", minimum: 1 },
  pageSize: { type: "integer", minimum: 1, maximum: 100 },
});

export const filterQuerySchema = strictObject(filterProperties);

const selectionProperties = {
  referenceNumbers: { type: "array", minItems: 1, items: text },
  status: { type: "string" },
  ward: { type: "string" },
};

export const customEmailBodySchema = strictObject({ ...selectionProperties, subject: text, message: text }, [
  "subject",
  "message",
]);

export const deadlineReminderBodySchema = strictObject({ ...selectionProperties, includeSms: { type: "boolean" } });

export const documentRequestBodySchema = strictObject(
  { ...selectionProperties, documents: { type: "array", items: text } },
  ["documents"]
);

export const customSmsBodySchema = strictObject({ ...selectionProperties, message: text }, ["message"]);

export const deadlineBodySchema = strictObject(
  { name: text, startDate: text, endDate: text, isActive: { type: "boolean" } },
  ["name", "startDate", "endDate"]
);
