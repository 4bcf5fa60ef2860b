import type { FastifyInstance } from "fastify";
import type { MultipartFields } from "@fastify/multipart";
import { DOCUMENT_TYPES, isDocumentType, type DocumentType } from "@agroscheme/shared";
import * as documents from "../documents";
import { send400 } from "../errors";
import { requireFarmerId } from "../route-access";
import { UPLOAD_ERROR_DESCRIPTIONS, UploadErrorCode, isUploadError } from "../upload-errors";

const ALLOWED_MIME_TYPES = ["application/pdf", "image/jpeg", "image/png", "text/plain"];
const ALLOWED_EXTENSIONS = [".pdf", ".jpg", ".jpeg", ".png", ".txt"];

const extractSchema = {
  body: {
    type: "object",
    required: ["documentType", "text"],
    additionalProperties: false,
    properties: {
      documentType: { type: "string", enum: [...DOCUMENT_TYPES] },
      text: { type: "string", maxLength: 100_000 },
    },
  },
};

/** The `documentType` part must precede the file part in the form. */
function readFieldValue(fields: MultipartFields, name: string): string | undefined {
  const field = fields[name];
  if (!field || Array.isArray(field) || field.type !== "field") return undefined;
  return typeof field.value === "string" ? field.value : undefined;
}

function isFileTooLargeError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "FST_REQ_FILE_TOO_LARGE";
}

export async function registerDocumentRoutes(app: FastifyInstance) {
  app.post(
    "/api/v1/documents/upload",
    { config: { skipStrictMutationBodySchema: true } },
    async (request, reply) => {
      const farmerId = requireFarmerId(request, reply);
      if (farmerId === null) return;

      const file = await request.file();
      if (!file) {
        return send400(reply, UploadErrorCode.NO_FILE, UPLOAD_ERROR_DESCRIPTIONS.NO_FILE);
      }

      const documentType = readFieldValue(file.fields, "documentType");
      if (!documentType || !isDocumentType(documentType)) {
        return send400(reply, UploadErrorCode.INVALID_DOCUMENT_TYPE, UPLOAD_ERROR_DESCRIPTIONS.INVALID_DOCUMENT_TYPE);
      }
      if (!ALLOWED_MIME_TYPES.includes(file.mimetype)) {
        return send400(reply, UploadErrorCode.INVALID_FILE_TYPE, `${UPLOAD_ERROR_DESCRIPTIONS.INVALID_FILE_TYPE} Received: ${file.mimetype}`);
      }
      const ext = (file.filename || "").toLowerCase().split(".").pop();
      if (ext && !ALLOWED_EXTENSIONS.includes(`.${ext}`)) {
        return send400(reply, UploadErrorCode.INVALID_FILE_EXTENSION, `File extension .${ext} is not allowed.`);
      }

      try {
        const data = await file.toBuffer();
        const result = await documents.uploadFarmerDocument({
          farmerId,
          documentType,
          filename: file.filename,
          mimeType: file.mimetype,
          data,
        });
        reply.code(201);
        return result;
      } catch (error: unknown) {
        if (isFileTooLargeError(error)) {
          return send400(reply, UploadErrorCode.FILE_TOO_LARGE, UPLOAD_ERROR_DESCRIPTIONS.FILE_TOO_LARGE);
        }
        if (error instanceof Error && isUploadError(error.message)) {
          return send400(reply, error.message, UPLOAD_ERROR_DESCRIPTIONS[error.message]);
        }
        throw error;
      }
    }
  );

  app.post<{ Body: { documentType: DocumentType; text: string } }>(
    "/api/v1/documents/extract",
    { schema: extractSchema },
    async (request, reply) => {
      if (requireFarmerId(request, reply) === null) return;
      return documents.previewExtraction(request.body.documentType, request.body.text);
    }
  );

  app.get("/api/v1/documents", async (request, reply) => {
    const farmerId = requireFarmerId(request, reply);
    if (farmerId === null) return;
    const [uploads, fieldSets] = await Promise.all([
      documents.listFarmerDocuments(farmerId),
      documents.listFieldSets(farmerId),
    ]);
    return { documents: uploads, fieldSets };
  });
}
