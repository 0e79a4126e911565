import { FastifyInstance } from "fastify";
import type { MultipartFields } from "@fastify/multipart";
import { ValidationError } from "../errors";
import type { Services } from "../services";
import { UploadErrorCode, uploadError } from "../upload-errors";
import { documentParamsSchema, emptyQuerySchema } from "./schemas";

type DocumentParams = { referenceNumber: string; slot: string };

const ALLOWED_FORM_FIELDS = new Set(["email"]);

function fieldValue(fields: MultipartFields, name: string): string | undefined {
  const entry = fields[name];
  const first = Array.isArray(entry) ? entry[0] : entry;
  return first && first.type === "field" && typeof first.value === "string" ? first.value : undefined;
}

export async function registerDocumentRoutes(app: FastifyInstance, services: Services) {
  // Multipart body: the `email` field must precede the `file` part.
  app.post<{ Params: DocumentParams }>(
    "/api/v1/applications/:referenceNumber/documents/:slot",
    { schema: { params: documentParamsSchema }, config: { skipStrictMutationBodySchema: true } },
    async (request, reply) => {
      const data = await request.file();
      if (!data) throw uploadError(UploadErrorCode.NO_FILE);

      const unexpected = Object.keys(data.fields).filter(
        (name) => name !== data.fieldname && !ALLOWED_FORM_FIELDS.has(name)
      );
      const email = fieldValue(data.fields, "email");
      if (unexpected.length > 0 || !email) {
        data.file.resume();
        throw new ValidationError("Invalid upload form", {
          ...(email ? {} : { email: ["email is required"] }),
          ...(unexpected.length > 0 ? { _root: [`Unexpected form field(s): ${unexpected.join(", ")}`] } : {}),
        });
      }

      try {
        const result = await services.documents.upload(request.params.referenceNumber, {
          slot: request.params.slot,
          email,
          fileName: data.filename,
          mimeType: data.mimetype,
          stream: data.file,
        });
        reply.code(201);
        return result;
      } catch (error) {
        data.file.resume();
        throw error;
      }
    }
  );

  app.get<{ Params: DocumentParams }>(
    "/api/v1/admin/applications/:referenceNumber/documents/:slot",
    { schema: { params: documentParamsSchema, querystring: emptyQuerySchema } },
    async (request, reply) => {
      const { document, stream } = await services.documents.open(request.params.referenceNumber, request.params.slot);
      reply.header("content-type", document.mimeType);
      reply.header("content-disposition", `attachment; filename="${document.fileName}"`);
      return reply.send(stream);
    }
  );
}
