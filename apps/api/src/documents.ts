import path from "path";
import { v4 as uuidv4 } from "uuid";
import {
  DocumentTypeEnum,
  DocumentVerificationStatusEnum,
  ExtractedFieldSetSchema,
  type DocumentType,
  type DocumentVerificationStatus,
  type ExtractedFieldSet,
  type VerifyDocumentInput,
} from "@agroscheme/shared";
import { getClient, query } from "./db";
import { getDocumentCatalog } from "./document-catalog";
import {
  createExtractorRegistry,
  extractDocumentFields,
  type ExtractionResult,
  type ExtractorRegistry,
} from "./extraction";
import { logError, logInfo, logWarn } from "./logger";
import { recordDocumentExtraction } from "./observability/metrics";
import { resolveOcrAdapter } from "./providers/ocr";
import { getStorage, storeValidatedUpload } from "./storage";
import { UploadErrorCode } from "./upload-errors";

export interface FarmerDocument {
  document_id: string;
  farmer_id: number;
  document_type: DocumentType;
  storage_key: string;
  original_filename: string;
  mime_type: string;
  size_bytes: number;
  checksum: string;
  confidence: number;
  uploaded_at: Date;
  verification_status: DocumentVerificationStatus;
  verification_remarks: string | null;
  verified_by: number | null;
  verified_at: Date | null;
}

type FarmerDocumentRow = {
  document_id: string;
  farmer_id: number;
  document_type: string;
  storage_key: string;
  original_filename: string;
  mime_type: string;
  size_bytes: number | string;
  checksum: string;
  confidence: number | string;
  uploaded_at: Date;
  verification_status: string;
  verification_remarks: string | null;
  verified_by: number | null;
  verified_at: Date | null;
};

export interface StoredFieldSet {
  document_type: DocumentType;
  fields: ExtractedFieldSet;
  confidence: number;
  document_id: string | null;
  extracted_at: Date;
}

type StoredFieldSetRow = {
  document_type: string;
  fields_jsonb: unknown;
  confidence: number | string;
  document_id: string | null;
  extracted_at: Date;
};

const DOCUMENT_COLUMNS =
  "document_id, farmer_id, document_type, storage_key, original_filename, mime_type, size_bytes, checksum, confidence, uploaded_at, verification_status, verification_remarks, verified_by, verified_at";

function rowToDocument(row: FarmerDocumentRow): FarmerDocument {
  return {
    document_id: row.document_id,
    farmer_id: row.farmer_id,
    document_type: DocumentTypeEnum.parse(row.document_type),
    storage_key: row.storage_key,
    original_filename: row.original_filename,
    mime_type: row.mime_type,
    size_bytes: Number(row.size_bytes),
    checksum: row.checksum,
    confidence: Number(row.confidence),
    uploaded_at: row.uploaded_at,
    verification_status: DocumentVerificationStatusEnum.parse(row.verification_status),
    verification_remarks: row.verification_remarks,
    verified_by: row.verified_by,
    verified_at: row.verified_at,
  };
}

let registry: ExtractorRegistry | null = null;

function getExtractorRegistry(): ExtractorRegistry {
  if (!registry) {
    registry = createExtractorRegistry(getDocumentCatalog());
  }
  return registry;
}

export function sanitizeStorageSegment(value: string, fallback: string): string {
  const base = path.basename(value || "").trim();
  const normalized = base.replace(/[^A-Za-z0-9._-]/g, "_");
  if (!normalized || normalized === "." || normalized === "..") {
    return fallback;
  }
  return normalized;
}

/** Runs the extractor over supplied text. Nothing is stored. */
export function previewExtraction(documentType: DocumentType, text: string): ExtractionResult {
  return extractDocumentFields(getExtractorRegistry(), documentType, text);
}

/** Removes a file whose upload did not complete. Never throws. */
async function discardStoredUpload(storageKey: string): Promise<void> {
  try {
    await getStorage().delete(storageKey);
  } catch (error: unknown) {
    logError("Failed to discard stored upload", {
      storageKey,
      error: error instanceof Error ? error.message : "unknown_error",
    });
  }
}

export interface UploadInput {
  farmerId: number;
  documentType: DocumentType;
  filename: string;
  mimeType: string;
  data: Buffer;
}

export interface UploadResult {
  document: FarmerDocument;
  extraction: ExtractionResult;
}

/**
 * Stores the file, reads its text and replaces the farmer's field set for
 * the document type. The upload row and the field set commit together.
 */
export async function uploadFarmerDocument(input: UploadInput): Promise<UploadResult> {
  const documentId = uuidv4();
  const filename = sanitizeStorageSegment(input.filename, "upload");
  const storageKey = `farmers/${input.farmerId}/${input.documentType}/${documentId}-${filename}`;

  const stored = await storeValidatedUpload(storageKey, input.data, input.mimeType);

  let text: string;
  const ocr = resolveOcrAdapter();
  try {
    text = await ocr.readText({ data: input.data, mimeType: input.mimeType, filename });
  } catch (error: unknown) {
    logWarn("OCR failed, discarding upload", {
      provider: ocr.name,
      documentType: input.documentType,
      error: error instanceof Error ? error.message : "unknown_error",
    });
    await discardStoredUpload(storageKey);
    throw new Error(UploadErrorCode.OCR_FAILED);
  }

  const extraction = previewExtraction(input.documentType, text);

  const client = await getClient();
  let document: FarmerDocument;
  try {
    await client.query("BEGIN");
    const inserted = await client.query<FarmerDocumentRow>(
      `INSERT INTO farmer_document
         (document_id, farmer_id, document_type, storage_key, original_filename, mime_type, size_bytes, checksum, confidence, uploaded_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW())
       RETURNING ${DOCUMENT_COLUMNS}`,
      [
        documentId,
        input.farmerId,
        input.documentType,
        storageKey,
        filename,
        input.mimeType,
        stored.sizeBytes,
        stored.checksum,
        extraction.confidence,
      ]
    );
    // Last upload of a type wins.
    await client.query(
      `INSERT INTO extracted_field_set (farmer_id, document_type, fields_jsonb, confidence, document_id, extracted_at)
       VALUES ($1, $2, $3, $4, $5, NOW())
       ON CONFLICT (farmer_id, document_type)
       DO UPDATE SET fields_jsonb = EXCLUDED.fields_jsonb,
                     confidence = EXCLUDED.confidence,
                     document_id = EXCLUDED.document_id,
                     extracted_at = EXCLUDED.extracted_at`,
      [input.farmerId, input.documentType, JSON.stringify(extraction.fields), extraction.confidence, documentId]
    );
    await client.query("COMMIT");
    document = rowToDocument(inserted.rows[0]);
  } catch (error) {
    await client.query("ROLLBACK");
    await discardStoredUpload(storageKey);
    throw error;
  } finally {
    client.release();
  }

  recordDocumentExtraction(input.documentType);
  logInfo("Document uploaded", {
    documentId,
    farmerId: input.farmerId,
    documentType: input.documentType,
    confidence: extraction.confidence,
    unparsedFields: extraction.unparsedFields,
  });
  return { document, extraction };
}

export async function listFarmerDocuments(farmerId: number): Promise<FarmerDocument[]> {
  const result = await query<FarmerDocumentRow>(
    `SELECT ${DOCUMENT_COLUMNS} FROM farmer_document WHERE farmer_id = $1 ORDER BY uploaded_at DESC`,
    [farmerId]
  );
  return result.rows.map(rowToDocument);
}

/** Current field set per document type. Rows that no longer validate are skipped. */
export async function listFieldSets(farmerId: number): Promise<StoredFieldSet[]> {
  const result = await query<StoredFieldSetRow>(
    `SELECT document_type, fields_jsonb, confidence, document_id, extracted_at
       FROM extracted_field_set WHERE farmer_id = $1 ORDER BY document_type`,
    [farmerId]
  );
  const fieldSets: StoredFieldSet[] = [];
  for (const row of result.rows) {
    const documentType = DocumentTypeEnum.safeParse(row.document_type);
    const fields = ExtractedFieldSetSchema.safeParse(row.fields_jsonb);
    if (!documentType.success || !fields.success) {
      logWarn("Skipping unreadable field set", { farmerId, documentType: row.document_type });
      continue;
    }
    fieldSets.push({
      document_type: documentType.data,
      fields: fields.data,
      confidence: Number(row.confidence),
      document_id: row.document_id,
      extracted_at: row.extracted_at,
    });
  }
  return fieldSets;
}

// ── Admin review ──

export interface PendingDocumentsOptions {
  documentType?: DocumentType;
  limit?: number;
  offset?: number;
}

/** Documents awaiting review across all farmers, oldest upload first. */
export async function listPendingDocuments(options: PendingDocumentsOptions = {}): Promise<FarmerDocument[]> {
  const params: unknown[] = [];
  let sql = `SELECT ${DOCUMENT_COLUMNS} FROM farmer_document WHERE verification_status = 'PENDING'`;
  if (options.documentType) {
    params.push(options.documentType);
    sql += ` AND document_type = $${params.length}`;
  }
  params.push(options.limit ?? 50, options.offset ?? 0);
  sql += ` ORDER BY uploaded_at ASC LIMIT $${params.length - 1} OFFSET $${params.length}`;

  const result = await query<FarmerDocumentRow>(sql, params);
  return result.rows.map(rowToDocument);
}

/**
 * Records an admin decision. A later decision replaces an earlier one.
 * Null when the document does not exist.
 */
export async function verifyDocument(
  documentId: string,
  input: VerifyDocumentInput,
  adminId: number
): Promise<FarmerDocument | null> {
  const result = await query<FarmerDocumentRow>(
    `UPDATE farmer_document
        SET verification_status = $2, verification_remarks = $3, verified_by = $4, verified_at = NOW()
      WHERE document_id = $1
      RETURNING ${DOCUMENT_COLUMNS}`,
    [documentId, input.status, input.remarks || null, adminId]
  );
  if (result.rows.length === 0) return null;
  const document = rowToDocument(result.rows[0]);
  logInfo("Document reviewed", { documentId, status: document.verification_status, adminId });
  return document;
}
