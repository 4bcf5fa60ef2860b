/**
 * Document catalog: the nine document types a farmer can upload, and the
 * shape of the field set extracted from each one.
 *
 * A field set is flat. Values are strings (dates are `YYYY-MM-DD` strings)
 * or numbers. Re-uploading a document type replaces its field set.
 */
import { z } from "zod";

export const DocumentTypeEnum = z.enum([
  "aadhaar",
  "pan",
  "land_record",
  "bank_passbook",
  "income_certificate",
  "caste_certificate",
  "domicile",
  "crop_insurance",
  "death_certificate",
]);

export type DocumentType = z.infer<typeof DocumentTypeEnum>;

export const DOCUMENT_TYPES: readonly DocumentType[] = DocumentTypeEnum.options;

export const ExtractedFieldValueSchema = z.union([z.string(), z.number().finite()]);

export const ExtractedFieldSetSchema = z.record(z.string(), ExtractedFieldValueSchema);

export type ExtractedFieldValue = z.infer<typeof ExtractedFieldValueSchema>;
export type ExtractedFieldSet = z.infer<typeof ExtractedFieldSetSchema>;

/** Latest field set per document type for one farmer. */
export type FarmerFieldSets = Partial<Record<DocumentType, ExtractedFieldSet>>;

export const DocumentVerificationStatusEnum = z.enum(["PENDING", "VERIFIED", "REJECTED"]);

export type DocumentVerificationStatus = z.infer<typeof DocumentVerificationStatusEnum>;

/** An admin decision on an uploaded document; a rejection needs remarks. */
export const VerifyDocumentInputSchema = z
  .object({
    status: z.enum(["VERIFIED", "REJECTED"]),
    remarks: z.string().trim().max(2000).optional(),
  })
  .refine((input) => input.status !== "REJECTED" || Boolean(input.remarks), {
    message: "Remarks are required when rejecting a document",
    path: ["remarks"],
  });

export type VerifyDocumentInput = z.infer<typeof VerifyDocumentInputSchema>;

export function isDocumentType(value: string): value is DocumentType {
  return DocumentTypeEnum.safeParse(value).success;
}
